import type { Clock } from "../ports/clock"
import { type Milliseconds, type Seconds, secondsToMs } from "../ports/time"

/**
 * Manually driven clock for tests. Time only moves when told to.
 */
export class FakeClock implements Clock {
  private time: Milliseconds

  constructor(start: Date | Milliseconds = 0) {
    this.time = toMs(start)
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  advanceSeconds(seconds: Seconds): void {
    this.advance(secondsToMs(seconds))
  }

  set(at: Date | Milliseconds): void {
    this.time = toMs(at)
  }
}

function toMs(at: Date | Milliseconds): Milliseconds {
  return at instanceof Date ? at.getTime() : at
}
