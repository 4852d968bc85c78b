import { readFile, rm } from "node:fs/promises"
import { join } from "node:path"
import {
  TranscriptionError,
  type TranscriptionResponse,
  type TranscriptSegment,
} from "../../application/ports/transcription.port"
import { errorMessage, Result } from "../../domain/shared/result"
import { runCommand } from "../process/run-command"
import { BaseTranscriber, isRecord } from "./base-transcriber"

export interface WhisperCppOptions {
  binary: string
  modelDir: string
  model: string
  ffmpegBinary: string
}

/**
 * Parse the JSON file whisper.cpp writes with -oj.
 * Offsets are in milliseconds.
 */
export function parseWhisperCppJson(
  content: string,
): Result<TranscriptionResponse, TranscriptionError> {
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    return Result.err(
      new TranscriptionError(
        `Unreadable whisper.cpp output: ${errorMessage(error, "invalid JSON")}`,
      ),
    )
  }

  if (!isRecord(raw) || !Array.isArray(raw.transcription)) {
    return Result.err(
      new TranscriptionError("whisper.cpp output has no transcription"),
    )
  }

  const segments: TranscriptSegment[] = []
  for (const item of raw.transcription) {
    if (!isRecord(item) || typeof item.text !== "string") continue
    const offsets = isRecord(item.offsets) ? item.offsets : {}
    const from = typeof offsets.from === "number" ? offsets.from : 0
    const to = typeof offsets.to === "number" ? offsets.to : from
    segments.push({ start: from / 1000, end: to / 1000, text: item.text })
  }

  return Result.ok({
    text: segments.map((segment) => segment.text).join(""),
    segments,
  })
}

/**
 * Local transcription with whisper.cpp's whisper-cli.
 * Expects 16 kHz WAV input and ggml-<tier>.bin in the model directory.
 */
export class WhisperCppTranscriber extends BaseTranscriber {
  readonly name = "whisper.cpp"

  constructor(
    private readonly options: WhisperCppOptions,
    run: typeof runCommand = runCommand,
  ) {
    super(options.ffmpegBinary, run)
  }

  get modelPath(): string {
    return join(this.options.modelDir, `ggml-${this.options.model}.bin`)
  }

  async getTranscription(
    filePath: string,
  ): Promise<Result<TranscriptionResponse, TranscriptionError>> {
    const workDir = await this.createWorkDir("transcribe-whispercpp-")
    if (!workDir.ok) {
      return workDir
    }
    const outputDir = workDir.value
    const outputBase = join(outputDir, "transcript")

    try {
      const result = await this.run(this.options.binary, [
        "-m",
        this.modelPath,
        "-f",
        filePath,
        "-oj",
        "-of",
        outputBase,
        "-np",
      ])

      if (!result.ok) {
        return Result.err(
          new TranscriptionError(result.error.message, result.error),
        )
      }

      const content = await readFile(`${outputBase}.json`, "utf8")
      return parseWhisperCppJson(content)
    } catch (error) {
      return Result.err(
        new TranscriptionError(
          `whisper.cpp produced no output: ${errorMessage(error, "unknown error")}`,
        ),
      )
    } finally {
      await rm(outputDir, { recursive: true, force: true })
    }
  }
}
