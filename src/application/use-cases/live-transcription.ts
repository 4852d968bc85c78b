import { rm } from "node:fs/promises"
import type { Duration } from "../../domain/recording/value-objects/duration.vo"
import { Result } from "../../domain/shared/result"
import type { CaptureRecorders } from "../ports/audio-recorder.port"
import type { TranscriberPort } from "../ports/transcription.port"
import type { CaptureSource } from "../services/config-merger"

/**
 * Input for the live transcription use case
 */
export interface LiveTranscriptionInput {
  chunkDuration: Duration
  sources: CaptureSource[]
  onTranscript?: (source: CaptureSource, text: string) => void
  onTranscriptionError?: (source: CaptureSource, message: string) => void
}

/**
 * Error that ends a live session
 */
export class LiveTranscriptionError extends Error {
  constructor(
    message: string,
    public readonly source?: CaptureSource,
  ) {
    super(message)
    this.name = "LiveTranscriptionError"
  }
}

type ChunkOutcome = { ok: true } | { ok: false; error: LiveTranscriptionError }

/**
 * Interactive mode: record fixed-length chunks from every enabled source
 * and transcribe each one, until stopped.
 *
 * A failed transcription is reported and skipped; a failed recording
 * ends the session.
 */
export class LiveTranscriptionUseCase {
  private running = false

  constructor(
    private readonly recorders: CaptureRecorders,
    private readonly transcriber: TranscriberPort,
  ) {}

  /**
   * Execute the use case
   * @returns Number of chunks transcribed per source once stopped
   */
  async execute(
    input: LiveTranscriptionInput,
  ): Promise<Result<number, LiveTranscriptionError>> {
    if (input.sources.length === 0) {
      return Result.err(
        new LiveTranscriptionError(
          "Both microphone and speaker capture are disabled",
        ),
      )
    }

    this.running = true
    let rounds = 0

    while (this.running) {
      const outcomes = await Promise.all(
        input.sources.map((source) => this.captureChunk(source, input)),
      )

      for (const outcome of outcomes) {
        if (!outcome.ok) {
          this.running = false
          return Result.err(outcome.error)
        }
      }

      rounds += 1
    }

    return Result.ok(rounds)
  }

  /**
   * Finish after the chunk in progress
   */
  async stop(): Promise<void> {
    this.running = false
    await Promise.all([
      this.recorders.microphone.stop(),
      this.recorders.speaker.stop(),
    ])
  }

  private async captureChunk(
    source: CaptureSource,
    input: LiveTranscriptionInput,
  ): Promise<ChunkOutcome> {
    const recording = await this.recorders[source].record(input.chunkDuration)
    if (!recording.ok) {
      return {
        ok: false,
        error: new LiveTranscriptionError(recording.error.message, source),
      }
    }

    try {
      const response = await this.transcriber.getTranscription(recording.value)
      if (!response.ok) {
        input.onTranscriptionError?.(source, response.error.message)
        return { ok: true }
      }

      const text = this.transcriber.processResponse(response.value)
      if (text.length > 0) {
        input.onTranscript?.(source, text)
      }
      return { ok: true }
    } finally {
      await rm(recording.value, { force: true })
    }
  }
}
