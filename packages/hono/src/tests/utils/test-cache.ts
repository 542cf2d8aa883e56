import {
  CacheRegistry,
  type Clock,
  InlineExecutor,
  LruMemoryMap,
  MemoryBackend,
} from "@stash/cache"
import type { Logger } from "@stash/logger"
import { mock } from "vitest-mock-extended"

export class SteppingClock implements Clock {
  private ms = Date.UTC(2024, 0, 1)

  now(): Date {
    return new Date(this.ms)
  }

  nowMs(): number {
    return this.ms
  }

  advanceSeconds(seconds: number): void {
    this.ms += seconds * 1000
  }
}

export type TestCache = {
  registry: CacheRegistry
  memory: MemoryBackend
  clock: SteppingClock
  logger: Logger
}

export function createTestCache(options: { initialized?: boolean } = {}): TestCache {
  const logger = mock<Logger>()
  const clock = new SteppingClock()
  const memory = new MemoryBackend({ clock, store: new LruMemoryMap() }, { maxEntries: 100 })
  const registry = new CacheRegistry({ logger })

  if (options.initialized ?? true) {
    registry.init({ backend: memory, clock, executor: new InlineExecutor() })
  }

  return { registry, memory, clock, logger }
}
