const DECIMAL_SUFFIXES = ["kB", "MB", "GB", "TB", "PB", "EB", "ZB", "YB"]

/**
 * Value object for a file's size in bytes
 */
export class FileSize {
  private constructor(readonly bytes: number) {}

  static fromBytes(bytes: number): FileSize {
    return new FileSize(Math.max(0, Math.floor(bytes)))
  }

  /**
   * Human-readable size in decimal units: "1 Byte", "512 Bytes",
   * "1.5 kB", "2.3 MB"
   */
  get humanReadable(): string {
    if (this.bytes === 1) return "1 Byte"
    if (this.bytes < 1000) return `${this.bytes} Bytes`

    for (const [exponent, suffix] of DECIMAL_SUFFIXES.entries()) {
      const unit = 1000 ** (exponent + 2)
      if (this.bytes < unit || exponent === DECIMAL_SUFFIXES.length - 1) {
        return `${((1000 * this.bytes) / unit).toFixed(1)} ${suffix}`
      }
    }

    return `${this.bytes} Bytes`
  }
}
