import { mkdtemp } from "node:fs/promises"
import { tmpdir } from "node:os"
import { basename, extname, join } from "node:path"
import {
  TranscriptionError,
  type TranscriberPort,
  type TranscriptionResponse,
  type TranscriptSegment,
} from "../../application/ports/transcription.port"
import { errorMessage, Result } from "../../domain/shared/result"
import { runCommand } from "../process/run-command"

/**
 * Shared behaviour of all engines: FFmpeg resampling and
 * response post-processing. Engines only implement recognition.
 */
export abstract class BaseTranscriber implements TranscriberPort {
  abstract readonly name: string

  constructor(
    protected readonly ffmpegBinary: string,
    protected readonly run: typeof runCommand = runCommand,
  ) {}

  abstract getTranscription(
    filePath: string,
  ): Promise<Result<TranscriptionResponse, TranscriptionError>>

  async convertTo16kHz(
    filePath: string,
  ): Promise<Result<string, TranscriptionError>> {
    const stem = basename(filePath, extname(filePath))
    const outputPath = join(tmpdir(), `${stem}-16khz-${Date.now()}.wav`)

    const result = await this.run(this.ffmpegBinary, [
      "-hide_banner",
      "-loglevel",
      "error",
      "-i",
      filePath,
      "-ar",
      "16000",
      "-ac",
      "1",
      "-c:a",
      "pcm_s16le",
      "-y",
      outputPath,
    ])

    if (!result.ok) {
      return Result.err(
        new TranscriptionError(
          `Could not convert ${filePath} to 16 kHz: ${result.error.message}`,
          result.error,
        ),
      )
    }

    return Result.ok(outputPath)
  }

  /**
   * Fresh directory under the system temp dir for engine output files
   */
  protected async createWorkDir(
    prefix: string,
  ): Promise<Result<string, TranscriptionError>> {
    try {
      return Result.ok(await mkdtemp(join(tmpdir(), prefix)))
    } catch (error) {
      return Result.err(
        new TranscriptionError(
          `Could not create a working directory: ${errorMessage(error, "unknown error")}`,
        ),
      )
    }
  }

  /**
   * Whitespace-normalised text; segments win over the flat text when
   * an engine returns both, as they keep sentence boundaries.
   */
  processResponse(response: TranscriptionResponse): string {
    if (response.segments.length > 0) {
      return response.segments
        .map((segment) => segment.text.trim())
        .filter((text) => text.length > 0)
        .join("\n")
    }
    return response.text.trim()
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Read `[{ start, end, text }]` segment lists; entries missing any
 * field are dropped
 */
export function readSegments(value: unknown): TranscriptSegment[] {
  if (!Array.isArray(value)) {
    return []
  }

  const segments: TranscriptSegment[] = []
  for (const item of value) {
    if (
      isRecord(item) &&
      typeof item.start === "number" &&
      typeof item.end === "number" &&
      typeof item.text === "string"
    ) {
      segments.push({ start: item.start, end: item.end, text: item.text })
    }
  }
  return segments
}
