/**
 * Value object representing a time duration.
 * Used for recording chunk lengths and elapsed task times.
 */
export class Duration {
  private constructor(private readonly milliseconds: number) {}

  /**
   * Create a Duration from seconds
   */
  static fromSeconds(seconds: number): Duration {
    return new Duration(seconds * 1000)
  }

  /**
   * Create a Duration from milliseconds
   */
  static fromMilliseconds(milliseconds: number): Duration {
    return new Duration(milliseconds)
  }

  /**
   * Get duration in seconds
   */
  toSeconds(): number {
    return this.milliseconds / 1000
  }

  /**
   * Get duration in milliseconds
   */
  toMilliseconds(): number {
    return this.milliseconds
  }

  /**
   * Human-readable form: "850ms", "2.35s", "1m", "2m5.5s"
   */
  toString(): string {
    if (this.milliseconds < 1000) {
      return `${Math.round(this.milliseconds)}ms`
    }

    const totalSeconds = this.toSeconds()
    const minutes = Math.floor(totalSeconds / 60)
    // round to centiseconds, strip trailing zeros
    const seconds = Number((totalSeconds - minutes * 60).toFixed(2))

    if (minutes === 0) {
      return `${seconds}s`
    }
    if (seconds === 0) {
      return `${minutes}m`
    }
    return `${minutes}m${seconds}s`
  }
}
