import { describe, expect, it } from "vitest"
import { FileSize } from "../value-objects/file-size.vo"

describe("FileSize", () => {
  it("counts bytes below one kilobyte", () => {
    expect(FileSize.fromBytes(0).humanReadable).toBe("0 Bytes")
    expect(FileSize.fromBytes(1).humanReadable).toBe("1 Byte")
    expect(FileSize.fromBytes(999).humanReadable).toBe("999 Bytes")
  })

  it("uses decimal units from one kilobyte up", () => {
    expect(FileSize.fromBytes(1000).humanReadable).toBe("1.0 kB")
    expect(FileSize.fromBytes(1500).humanReadable).toBe("1.5 kB")
    expect(FileSize.fromBytes(2_300_000).humanReadable).toBe("2.3 MB")
    expect(FileSize.fromBytes(4_000_000_000).humanReadable).toBe("4.0 GB")
  })

  it("clamps negative sizes to zero", () => {
    expect(FileSize.fromBytes(-5).bytes).toBe(0)
  })
})
