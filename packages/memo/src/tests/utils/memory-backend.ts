import { MemoryCacheBackend, SystemClock } from "@memento/cache"

export function memoryBackend(): MemoryCacheBackend {
  return new MemoryCacheBackend({ clock: new SystemClock() }, { keyPrefix: "test", version: 1 })
}
