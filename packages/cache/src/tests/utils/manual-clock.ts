import type { Clock } from "../../core/time/clock"
import type { Milliseconds } from "../../ports/time"

export class ManualClock implements Clock {
  constructor(private now: Milliseconds = 1_700_000_000_000) {}

  nowMs(): Milliseconds {
    return this.now
  }

  advanceMs(ms: Milliseconds): void {
    this.now += ms
  }

  advanceSeconds(seconds: number): void {
    this.advanceMs(seconds * 1000)
  }
}
