import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { Result } from "../../../domain/shared/result"
import { TranscriptionError } from "../../ports/transcription.port"
import {
  DEFAULT_OUTPUT_FILE,
  type TranscribeFileStart,
  TranscribeFileUseCase,
} from "../transcribe-file"
import { fakeTranscriber } from "./fakes"

describe("TranscribeFileUseCase", () => {
  let dir: string
  let inputPath: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "transcribe-file-test-"))
    inputPath = join(dir, "meeting.wav")
    await writeFile(inputPath, Buffer.alloc(1500))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("writes the transcript with a trailing newline", async () => {
    const transcriber = fakeTranscriber()
    const outputPath = join(dir, "out.txt")

    const result = await new TranscribeFileUseCase(transcriber).execute({
      inputPath,
      outputPath,
      engine: "whisper",
    })

    if (!result.ok) throw result.error
    expect(result.value.outputPath).toBe(outputPath)
    expect(result.value.text).toBe("hello world")
    expect(await readFile(outputPath, "utf8")).toBe("hello world\n")
    expect(transcriber.convertTo16kHz).not.toHaveBeenCalled()
    expect(transcriber.getTranscription).toHaveBeenCalledWith(inputPath)
  })

  it("reports file details before transcribing", async () => {
    const onStart = vi.fn((_details: TranscribeFileStart) => undefined)

    await new TranscribeFileUseCase(fakeTranscriber()).execute({
      inputPath,
      outputPath: join(dir, "out.txt"),
      engine: "whisper",
      onStart,
    })

    expect(onStart).toHaveBeenCalledTimes(1)
    const [details] = onStart.mock.calls[0]
    expect(details.inputPath).toBe(inputPath)
    expect(details.outputPath).toBe(join(dir, "out.txt"))
    expect(details.size.humanReadable).toBe("1.5 kB")
  })

  it("measures elapsed time on the injected clock", async () => {
    let now = 0
    const transcriber = fakeTranscriber()
    transcriber.getTranscription.mockImplementation(async () => {
      now += 2350
      return Result.ok({ text: "hello", segments: [] })
    })

    const result = await new TranscribeFileUseCase(
      transcriber,
      () => now,
    ).execute({
      inputPath,
      outputPath: join(dir, "out.txt"),
      engine: "whisper",
    })

    if (!result.ok) throw result.error
    expect(result.value.elapsed.toString()).toBe("2.35s")
  })

  it("resamples input for whisper.cpp", async () => {
    const transcriber = fakeTranscriber()

    const result = await new TranscribeFileUseCase(transcriber).execute({
      inputPath,
      outputPath: join(dir, "out.txt"),
      engine: "whisper.cpp",
    })

    expect(result.ok).toBe(true)
    expect(transcriber.convertTo16kHz).toHaveBeenCalledWith(inputPath)
    expect(transcriber.getTranscription).toHaveBeenCalledWith(
      `${inputPath}-16khz.wav`,
    )
  })

  function writingConverter(transcriber: ReturnType<typeof fakeTranscriber>) {
    transcriber.convertTo16kHz.mockImplementation(async (filePath: string) => {
      const convertedPath = `${filePath}-16khz.wav`
      await writeFile(convertedPath, Buffer.alloc(320))
      return Result.ok(convertedPath)
    })
  }

  it("removes the resampled copy after transcribing", async () => {
    const transcriber = fakeTranscriber()
    writingConverter(transcriber)

    const result = await new TranscribeFileUseCase(transcriber).execute({
      inputPath,
      outputPath: join(dir, "out.txt"),
      engine: "whisper.cpp",
    })

    expect(result.ok).toBe(true)
    await expect(stat(`${inputPath}-16khz.wav`)).rejects.toThrow()
    expect((await stat(inputPath)).size).toBe(1500)
  })

  it("removes the resampled copy when the engine fails", async () => {
    const transcriber = fakeTranscriber(
      Result.err(new TranscriptionError("whisper-cli failed (1)")),
    )
    writingConverter(transcriber)

    const result = await new TranscribeFileUseCase(transcriber).execute({
      inputPath,
      outputPath: join(dir, "out.txt"),
      engine: "whisper.cpp",
    })

    expect(result.ok).toBe(false)
    await expect(stat(`${inputPath}-16khz.wav`)).rejects.toThrow()
  })

  it("keeps the input when it is transcribed as is", async () => {
    await new TranscribeFileUseCase(fakeTranscriber()).execute({
      inputPath,
      outputPath: join(dir, "out.txt"),
      engine: "deepgram",
    })

    expect((await stat(inputPath)).size).toBe(1500)
  })

  it("writes transcription.txt when no output file is given", async () => {
    const previousDir = process.cwd()
    process.chdir(dir)

    try {
      const result = await new TranscribeFileUseCase(fakeTranscriber()).execute(
        { inputPath, engine: "whisper" },
      )

      if (!result.ok) throw result.error
      expect(result.value.outputPath).toBe(DEFAULT_OUTPUT_FILE)
      expect(await readFile(join(dir, "transcription.txt"), "utf8")).toBe(
        "hello world\n",
      )
    } finally {
      process.chdir(previousDir)
    }
  })

  it("fails on a missing input without writing output", async () => {
    const transcriber = fakeTranscriber()
    const outputPath = join(dir, "out.txt")
    const missing = join(dir, "missing.wav")

    const result = await new TranscribeFileUseCase(transcriber).execute({
      inputPath: missing,
      outputPath,
      engine: "whisper",
    })

    if (result.ok) throw new Error("expected a failure")
    expect(result.error.stage).toBe("read")
    expect(result.error.suspectInput).toBe(true)
    expect(result.error.message).toMatch(/^Could not read .*missing\.wav: /)
    expect(transcriber.getTranscription).not.toHaveBeenCalled()
    await expect(stat(outputPath)).rejects.toThrow()
  })

  it("fails when the engine fails", async () => {
    const outputPath = join(dir, "out.txt")
    const transcriber = fakeTranscriber(
      Result.err(new TranscriptionError("whisper failed (1)")),
    )

    const result = await new TranscribeFileUseCase(transcriber).execute({
      inputPath,
      outputPath,
      engine: "whisper",
    })

    if (result.ok) throw new Error("expected a failure")
    expect(result.error.stage).toBe("transcription")
    expect(result.error.message).toBe("whisper failed (1)")
    await expect(stat(outputPath)).rejects.toThrow()
  })

  it("fails when resampling fails", async () => {
    const transcriber = fakeTranscriber()
    transcriber.convertTo16kHz.mockResolvedValueOnce(
      Result.err(new TranscriptionError("ffmpeg not found in PATH")),
    )

    const result = await new TranscribeFileUseCase(transcriber).execute({
      inputPath,
      outputPath: join(dir, "out.txt"),
      engine: "whisper.cpp",
    })

    if (result.ok) throw new Error("expected a failure")
    expect(result.error.stage).toBe("convert")
    expect(result.error.message).toBe("ffmpeg not found in PATH")
    expect(transcriber.getTranscription).not.toHaveBeenCalled()
  })

  it("fails when nothing was recognised", async () => {
    const outputPath = join(dir, "out.txt")
    const transcriber = fakeTranscriber(
      Result.ok({ text: "   ", segments: [] }),
    )

    const result = await new TranscribeFileUseCase(transcriber).execute({
      inputPath,
      outputPath,
      engine: "whisper",
    })

    if (result.ok) throw new Error("expected a failure")
    expect(result.error.message).toBe("No speech was recognised")
    await expect(stat(outputPath)).rejects.toThrow()
  })

  it("does not blame the input when the output cannot be written", async () => {
    const result = await new TranscribeFileUseCase(fakeTranscriber()).execute({
      inputPath,
      outputPath: join(dir, "no-such-dir", "out.txt"),
      engine: "whisper",
    })

    if (result.ok) throw new Error("expected a failure")
    expect(result.error.stage).toBe("write")
    expect(result.error.suspectInput).toBe(false)
  })
})
