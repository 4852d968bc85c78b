import { Duration } from "./duration.vo"

export type Clock = () => number

/**
 * Measures elapsed wall-clock time from the moment it is started
 */
export class Stopwatch {
  private constructor(
    private readonly startedAt: number,
    private readonly clock: Clock,
  ) {}

  static start(clock: Clock = Date.now): Stopwatch {
    return new Stopwatch(clock(), clock)
  }

  elapsed(): Duration {
    return Duration.fromMilliseconds(this.clock() - this.startedAt)
  }
}
