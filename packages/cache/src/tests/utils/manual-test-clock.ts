import type { Clock } from "../../core/time/clock"
import type { Milliseconds, Seconds } from "../../ports/time"

export class ManualTestClock implements Clock {
  private time: Milliseconds

  constructor(start: Date = new Date("2024-01-01T00:00:00.000Z")) {
    this.time = start.getTime()
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advanceMs(ms: Milliseconds): void {
    this.time += ms
  }

  advanceSeconds(seconds: Seconds): void {
    this.time += seconds * 1000
  }
}
