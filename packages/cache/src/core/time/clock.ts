import type { Milliseconds } from "../../ports/time"

export interface Clock {
  nowMs(): Milliseconds
}

export class SystemClock implements Clock {
  nowMs(): Milliseconds {
    return Date.now()
  }
}
