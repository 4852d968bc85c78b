import {
  mkdir,
  mkdtemp,
  readdir,
  readFile,
  rm,
  writeFile,
} from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import {
  ConfigParseError,
  ConfigValidationError,
} from "../../../domain/config"
import { TomlOverrideAdapter } from "../toml-override.adapter"

describe("TomlOverrideAdapter", () => {
  let dir: string
  let path: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "transcribe-config-test-"))
    path = join(dir, "override.toml")
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("treats a missing file as an empty override layer", async () => {
    const result = await new TomlOverrideAdapter(path).load()

    expect(result).toEqual({ ok: true, value: {} })
  })

  it("loads sections and values", async () => {
    await writeFile(
      path,
      [
        "[OpenAI]",
        'api_key = "test-secret"',
        "",
        "[General]",
        "mic_device_index = 3",
        "disable_speaker = true",
        "transcript_audio_duration_seconds = 2.5",
        "",
      ].join("\n"),
    )

    const result = await new TomlOverrideAdapter(path).load()

    expect(result).toEqual({
      ok: true,
      value: {
        OpenAI: { api_key: "test-secret" },
        General: {
          mic_device_index: 3,
          disable_speaker: true,
          transcript_audio_duration_seconds: 2.5,
        },
      },
    })
  })

  it("passes unknown sections and keys through", async () => {
    await writeFile(path, '[Custom]\nflag = true\n\n[OpenAI]\norg = "acme"\n')

    const result = await new TomlOverrideAdapter(path).load()

    expect(result).toEqual({
      ok: true,
      value: { Custom: { flag: true }, OpenAI: { org: "acme" } },
    })
  })

  it("rejects malformed TOML", async () => {
    await writeFile(path, "[OpenAI\napi_key = \n")

    const result = await new TomlOverrideAdapter(path).load()

    if (result.ok) throw new Error("expected a parse error")
    expect(result.error).toBeInstanceOf(ConfigParseError)
    expect(result.error.code).toBe("CONFIG_PARSE_ERROR")
  })

  it("rejects a known key with the wrong type", async () => {
    await writeFile(path, '[General]\nmic_device_index = "three"\n')

    const result = await new TomlOverrideAdapter(path).load()

    if (result.ok) throw new Error("expected a validation error")
    expect(result.error).toBeInstanceOf(ConfigValidationError)
    expect(result.error.message).toBe(
      `Invalid value for 'General.mic_device_index' in ${path}: expected a number, got string`,
    )
  })

  it("rejects values outside a section", async () => {
    await writeFile(path, 'api_key = "test-secret"\n')

    const result = await new TomlOverrideAdapter(path).load()

    if (result.ok) throw new Error("expected a validation error")
    expect(result.error.message).toBe(
      `Invalid value for 'api_key' in ${path}: expected a [section] table`,
    )
  })

  it("rejects non-scalar values", async () => {
    await writeFile(path, '[General]\nbinaries = ["ffmpeg", "pactl"]\n')

    const result = await new TomlOverrideAdapter(path).load()

    if (result.ok) throw new Error("expected a validation error")
    expect(result.error.message).toBe(
      `Invalid value for 'General.binaries' in ${path}: expected a string, number or boolean`,
    )
  })

  it("saves into a new directory and reads the result back", async () => {
    const nestedPath = join(dir, "nested", "override.toml")
    const adapter = new TomlOverrideAdapter(nestedPath)

    const saved = await adapter.save({
      OpenAI: { api_key: "test-secret" },
      General: { speaker_device_index: 5 },
    })

    expect(saved).toEqual({ ok: true, value: undefined })
    expect(await readdir(join(dir, "nested"))).toEqual(["override.toml"])
    expect(await readFile(nestedPath, "utf8")).toContain(
      'api_key = "test-secret"',
    )
    expect(await adapter.load()).toEqual({
      ok: true,
      value: {
        OpenAI: { api_key: "test-secret" },
        General: { speaker_device_index: 5 },
      },
    })
  })

  it("leaves no temporary file behind when the save fails", async () => {
    const blockedPath = join(dir, "override.toml")
    await mkdir(join(blockedPath, "occupied"), { recursive: true })

    const saved = await new TomlOverrideAdapter(blockedPath).save({
      OpenAI: { api_key: "test-secret" },
    })

    if (saved.ok) throw new Error("expected a failure")
    expect(saved.error.code).toBe("CONFIG_WRITE_ERROR")
    expect(await readdir(dir)).toEqual(["override.toml"])
  })

  it("reports the path it reads from", () => {
    expect(new TomlOverrideAdapter(path).getPath()).toBe(path)
  })
})
