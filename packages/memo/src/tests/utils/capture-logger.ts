import { Writable } from "node:stream"
import { createPinoLogger, type Logger } from "@memento/logger"

export type CapturedEntry = Record<string, unknown>

export function captureLogger(): { logger: Logger; entries: () => CapturedEntry[] } {
  const captured: CapturedEntry[] = []

  const destination = new Writable({
    write(chunk, _encoding, cb) {
      captured.push(JSON.parse(chunk.toString()))
      cb()
    },
  })

  return {
    logger: createPinoLogger({ level: "debug" }, {}, { destination }),
    entries: () => [...captured],
  }
}
