import { readFile } from "node:fs/promises"
import { basename } from "node:path"
import OpenAI, { toFile } from "openai"
import {
  TranscriptionError,
  type TranscriptionResponse,
} from "../../application/ports/transcription.port"
import { errorMessage, Result } from "../../domain/shared/result"
import { BaseTranscriber, isRecord, readSegments } from "./base-transcriber"

export interface OpenAIApiOptions {
  apiKey: string
  baseUrl: string
  model: string
  ffmpegBinary: string
}

/**
 * Parse a verbose_json transcription response
 */
export function parseOpenAIResponse(
  body: unknown,
): Result<TranscriptionResponse, TranscriptionError> {
  if (!isRecord(body) || typeof body.text !== "string") {
    return Result.err(
      new TranscriptionError("OpenAI response has no transcription text"),
    )
  }

  return Result.ok({ text: body.text, segments: readSegments(body.segments) })
}

/**
 * Remote transcription through the OpenAI audio transcription API.
 * Consumes API credits.
 */
export class OpenAIApiTranscriber extends BaseTranscriber {
  readonly name = "OpenAI API"
  private client: OpenAI | null = null

  constructor(private readonly options: OpenAIApiOptions) {
    super(options.ffmpegBinary)
  }

  async getTranscription(
    filePath: string,
  ): Promise<Result<TranscriptionResponse, TranscriptionError>> {
    if (!this.options.apiKey) {
      return Result.err(
        new TranscriptionError(
          "OpenAI API key is not configured. Use --api_key, or --save_api_key to store one.",
        ),
      )
    }

    let audio: Buffer
    try {
      audio = await readFile(filePath)
    } catch (error) {
      return Result.err(
        new TranscriptionError(
          `Transcription failed: ${errorMessage(error, "unknown error")}`,
        ),
      )
    }

    try {
      const body: unknown = await this.getClient().audio.transcriptions.create(
        {
          file: await toFile(audio, basename(filePath)),
          model: this.options.model,
          response_format: "verbose_json",
        },
      )

      return parseOpenAIResponse(body)
    } catch (error) {
      return Result.err(
        new TranscriptionError(
          `OpenAI request failed: ${errorMessage(error, "unknown error")}`,
        ),
      )
    }
  }

  /**
   * The SDK refuses to start without a key, so the client is built on
   * first use
   */
  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.options.apiKey,
        baseURL: this.options.baseUrl,
      })
    }
    return this.client
  }
}
