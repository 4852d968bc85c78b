import { mkdtemp, rm, stat, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { Duration } from "../../../domain/recording/value-objects/duration.vo"
import { Result } from "../../../domain/shared/result"
import {
  type AudioRecorderPort,
  RecordingError,
} from "../../ports/audio-recorder.port"
import { TranscriptionError } from "../../ports/transcription.port"
import { LiveTranscriptionUseCase } from "../live-transcription"
import { fakeTranscriber } from "./fakes"

describe("LiveTranscriptionUseCase", () => {
  let dir: string

  function recorderWritingTo(name: string) {
    return {
      setDevice: vi.fn((_index: number) => undefined),
      record: vi.fn(
        async (_duration: Duration): Promise<Result<string, RecordingError>> => {
          const path = join(dir, `${name}.wav`)
          await writeFile(path, Buffer.alloc(16))
          return Result.ok(path)
        },
      ),
      stop: vi.fn(async () => undefined),
    } satisfies AudioRecorderPort
  }

  function bothRecorders() {
    return {
      microphone: recorderWritingTo("mic"),
      speaker: recorderWritingTo("spk"),
    }
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "transcribe-live-test-"))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("refuses to start without a capture source", async () => {
    const useCase = new LiveTranscriptionUseCase(
      bothRecorders(),
      fakeTranscriber(),
    )

    const result = await useCase.execute({
      chunkDuration: Duration.fromSeconds(3),
      sources: [],
    })

    if (result.ok) throw new Error("expected a failure")
    expect(result.error.message).toBe(
      "Both microphone and speaker capture are disabled",
    )
  })

  it("transcribes chunks from every source until stopped", async () => {
    const recorders = bothRecorders()
    const useCase = new LiveTranscriptionUseCase(recorders, fakeTranscriber())
    const transcripts: Array<[string, string]> = []

    const result = await useCase.execute({
      chunkDuration: Duration.fromSeconds(2),
      sources: ["microphone", "speaker"],
      onTranscript: (source, text) => {
        transcripts.push([source, text])
        if (transcripts.length === 2) {
          void useCase.stop()
        }
      },
    })

    expect(result).toEqual({ ok: true, value: 1 })
    // both sources run concurrently, so arrival order is not fixed
    expect([...transcripts].sort()).toEqual([
      ["microphone", "hello world"],
      ["speaker", "hello world"],
    ])
    expect(recorders.microphone.record).toHaveBeenCalledWith(
      Duration.fromSeconds(2),
    )
    expect(recorders.microphone.stop).toHaveBeenCalledTimes(1)
    expect(recorders.speaker.stop).toHaveBeenCalledTimes(1)
  })

  it("removes recorded chunks after transcribing them", async () => {
    const microphone = recorderWritingTo("mic")
    const useCase = new LiveTranscriptionUseCase(
      { microphone, speaker: recorderWritingTo("spk") },
      fakeTranscriber(),
    )

    await useCase.execute({
      chunkDuration: Duration.fromSeconds(1),
      sources: ["microphone"],
      onTranscript: () => {
        void useCase.stop()
      },
    })

    await expect(stat(join(dir, "mic.wav"))).rejects.toThrow()
  })

  it("reports failed transcriptions and keeps going", async () => {
    const transcriber = fakeTranscriber()
    transcriber.getTranscription
      .mockResolvedValueOnce(
        Result.err(new TranscriptionError("engine unavailable")),
      )
      .mockResolvedValueOnce(Result.ok({ text: "second", segments: [] }))
    const useCase = new LiveTranscriptionUseCase(
      bothRecorders(),
      transcriber,
    )
    const errors: string[] = []

    const result = await useCase.execute({
      chunkDuration: Duration.fromSeconds(1),
      sources: ["microphone"],
      onTranscriptionError: (source, message) => {
        errors.push(`${source}: ${message}`)
      },
      onTranscript: () => {
        void useCase.stop()
      },
    })

    expect(errors).toEqual(["microphone: engine unavailable"])
    expect(result).toEqual({ ok: true, value: 2 })
  })

  it("ends the session when a recording fails", async () => {
    const speaker = recorderWritingTo("spk")
    speaker.record.mockResolvedValueOnce(
      Result.err(new RecordingError("no such source")),
    )
    const useCase = new LiveTranscriptionUseCase(
      { microphone: recorderWritingTo("mic"), speaker },
      fakeTranscriber(),
    )

    const result = await useCase.execute({
      chunkDuration: Duration.fromSeconds(1),
      sources: ["microphone", "speaker"],
    })

    if (result.ok) throw new Error("expected a failure")
    expect(result.error.message).toBe("no such source")
    expect(result.error.source).toBe("speaker")
  })
})
