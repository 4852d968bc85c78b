import { readFile } from "node:fs/promises"
import { createClient, type DeepgramClient } from "@deepgram/sdk"
import {
  TranscriptionError,
  type TranscriptionResponse,
} from "../../application/ports/transcription.port"
import { errorMessage, Result } from "../../domain/shared/result"
import { BaseTranscriber, isRecord } from "./base-transcriber"

export interface DeepgramOptions {
  apiKey: string
  model: string
  ffmpegBinary: string
}

/**
 * Read the first alternative of the first channel of a pre-recorded
 * transcription result
 */
export function parseDeepgramResponse(
  body: unknown,
): Result<TranscriptionResponse, TranscriptionError> {
  const results = isRecord(body) ? body.results : undefined
  const channels = isRecord(results) ? results.channels : undefined
  const channel = Array.isArray(channels) ? channels[0] : undefined
  const alternatives = isRecord(channel) ? channel.alternatives : undefined
  const best = Array.isArray(alternatives) ? alternatives[0] : undefined

  if (!isRecord(best) || typeof best.transcript !== "string") {
    return Result.err(
      new TranscriptionError("Deepgram response has no transcript"),
    )
  }

  const metadata = isRecord(body) ? body.metadata : undefined
  const duration =
    isRecord(metadata) && typeof metadata.duration === "number"
      ? metadata.duration
      : 0

  return Result.ok({
    text: best.transcript,
    segments:
      best.transcript.length > 0
        ? [{ start: 0, end: duration, text: best.transcript }]
        : [],
  })
}

/**
 * Remote transcription with the Deepgram pre-recorded audio API
 */
export class DeepgramTranscriber extends BaseTranscriber {
  readonly name = "deepgram"
  private client: DeepgramClient | null = null

  constructor(private readonly options: DeepgramOptions) {
    super(options.ffmpegBinary)
  }

  async getTranscription(
    filePath: string,
  ): Promise<Result<TranscriptionResponse, TranscriptionError>> {
    if (!this.options.apiKey) {
      return Result.err(
        new TranscriptionError(
          "Deepgram API key is not configured. Set api_key in the [Deepgram] section of the override file.",
        ),
      )
    }

    try {
      const audio = await readFile(filePath)
      const { result, error } =
        await this.getClient().listen.prerecorded.transcribeFile(audio, {
          model: this.options.model,
          smart_format: true,
        })

      if (error) {
        return Result.err(
          new TranscriptionError(`Deepgram request failed: ${error.message}`),
        )
      }

      return parseDeepgramResponse(result)
    } catch (error) {
      return Result.err(
        new TranscriptionError(
          `Transcription failed: ${errorMessage(error, "unknown error")}`,
        ),
      )
    }
  }

  private getClient(): DeepgramClient {
    if (!this.client) {
      this.client = createClient(this.options.apiKey)
    }
    return this.client
  }
}
