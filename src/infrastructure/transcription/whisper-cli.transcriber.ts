import { readFile, rm } from "node:fs/promises"
import { basename, extname, join } from "node:path"
import {
  TranscriptionError,
  type TranscriptionResponse,
} from "../../application/ports/transcription.port"
import { errorMessage, Result } from "../../domain/shared/result"
import { runCommand } from "../process/run-command"
import { BaseTranscriber, isRecord, readSegments } from "./base-transcriber"

export interface WhisperCliOptions {
  binary: string
  model: string
  language: string
  ffmpegBinary: string
}

/**
 * Parse the JSON file the whisper CLI writes with --output_format json
 */
export function parseWhisperJson(
  content: string,
): Result<TranscriptionResponse, TranscriptionError> {
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    return Result.err(
      new TranscriptionError(
        `Unreadable whisper output: ${errorMessage(error, "invalid JSON")}`,
      ),
    )
  }

  if (!isRecord(raw) || typeof raw.text !== "string") {
    return Result.err(new TranscriptionError("Whisper output has no text"))
  }

  return Result.ok({ text: raw.text, segments: readSegments(raw.segments) })
}

/**
 * Local transcription with the openai-whisper command line tool.
 * Model files are downloaded by whisper itself on first use.
 */
export class WhisperCliTranscriber extends BaseTranscriber {
  readonly name = "whisper"

  constructor(
    private readonly options: WhisperCliOptions,
    run: typeof runCommand = runCommand,
  ) {
    super(options.ffmpegBinary, run)
  }

  async getTranscription(
    filePath: string,
  ): Promise<Result<TranscriptionResponse, TranscriptionError>> {
    const workDir = await this.createWorkDir("transcribe-whisper-")
    if (!workDir.ok) {
      return workDir
    }
    const outputDir = workDir.value

    try {
      const result = await this.run(this.options.binary, [
        filePath,
        "--model",
        this.options.model,
        "--language",
        toWhisperLanguage(this.options.language),
        "--output_format",
        "json",
        "--output_dir",
        outputDir,
        "--verbose",
        "False",
      ])

      if (!result.ok) {
        return Result.err(
          new TranscriptionError(result.error.message, result.error),
        )
      }

      const stem = basename(filePath, extname(filePath))
      const content = await readFile(join(outputDir, `${stem}.json`), "utf8")
      return parseWhisperJson(content)
    } catch (error) {
      return Result.err(
        new TranscriptionError(
          `Whisper produced no output: ${errorMessage(error, "unknown error")}`,
        ),
      )
    } finally {
      await rm(outputDir, { recursive: true, force: true })
    }
  }
}

/**
 * whisper takes language names title-cased ("English") or as codes ("en")
 */
function toWhisperLanguage(language: string): string {
  if (language.length <= 3) {
    return language.toLowerCase()
  }
  return language.charAt(0).toUpperCase() + language.slice(1).toLowerCase()
}
