import { rm, stat, writeFile } from "node:fs/promises"
import type { Duration } from "../../domain/recording/value-objects/duration.vo"
import {
  type Clock,
  Stopwatch,
} from "../../domain/recording/value-objects/stopwatch"
import { DomainError, errorMessage, Result } from "../../domain/shared/result"
import {
  EngineOptions,
  type SpeechToTextEngine,
} from "../../domain/transcription/value-objects/engine-options.vo"
import { FileSize } from "../../domain/transcription/value-objects/file-size.vo"
import type { TranscriberPort } from "../ports/transcription.port"

export const DEFAULT_OUTPUT_FILE = "transcription.txt"

export interface TranscribeFileStart {
  inputPath: string
  size: FileSize
  outputPath: string
}

/**
 * Input for the transcribe file use case
 */
export interface TranscribeFileInput {
  inputPath: string
  /** Defaults to transcription.txt */
  outputPath?: string
  engine: SpeechToTextEngine
  onStart?: (details: TranscribeFileStart) => void
}

/**
 * Output from the transcribe file use case
 */
export interface TranscribeFileOutput {
  outputPath: string
  text: string
  elapsed: Duration
}

export type TranscribeFileStage = "read" | "convert" | "transcription" | "write"

export class TranscribeFileError extends DomainError {
  readonly code = "TRANSCRIBE_FILE_ERROR"

  constructor(
    message: string,
    readonly stage: TranscribeFileStage,
    readonly elapsed: Duration,
  ) {
    super(message)
  }

  /**
   * Failures before the output file is written point at the input
   */
  get suspectInput(): boolean {
    return this.stage !== "write"
  }
}

/**
 * Transcribe one audio file into a text file.
 * The output file is only written when some text was recognised.
 */
export class TranscribeFileUseCase {
  constructor(
    private readonly transcriber: TranscriberPort,
    private readonly clock?: Clock,
  ) {}

  async execute(
    input: TranscribeFileInput,
  ): Promise<Result<TranscribeFileOutput, TranscribeFileError>> {
    const stopwatch = Stopwatch.start(this.clock)
    const outputPath = input.outputPath ?? DEFAULT_OUTPUT_FILE
    const fail = (stage: TranscribeFileStage, message: string) =>
      Result.err(new TranscribeFileError(message, stage, stopwatch.elapsed()))

    let size: FileSize
    try {
      size = FileSize.fromBytes((await stat(input.inputPath)).size)
    } catch (error) {
      return fail(
        "read",
        `Could not read ${input.inputPath}: ${errorMessage(error, "unknown error")}`,
      )
    }

    input.onStart?.({ inputPath: input.inputPath, size, outputPath })

    let audioPath = input.inputPath
    if (EngineOptions.requires16kHzInput(input.engine)) {
      const converted = await this.transcriber.convertTo16kHz(input.inputPath)
      if (!converted.ok) {
        return fail("convert", converted.error.message)
      }
      audioPath = converted.value
    }

    try {
      return await this.transcribeAndWrite(
        audioPath,
        outputPath,
        stopwatch,
        fail,
      )
    } finally {
      if (audioPath !== input.inputPath) {
        await rm(audioPath, { force: true })
      }
    }
  }

  private async transcribeAndWrite(
    audioPath: string,
    outputPath: string,
    stopwatch: Stopwatch,
    fail: (
      stage: TranscribeFileStage,
      message: string,
    ) => Result<never, TranscribeFileError>,
  ): Promise<Result<TranscribeFileOutput, TranscribeFileError>> {
    const response = await this.transcriber.getTranscription(audioPath)
    if (!response.ok) {
      return fail("transcription", response.error.message)
    }

    const text = this.transcriber.processResponse(response.value)
    if (text.length === 0) {
      return fail("transcription", "No speech was recognised")
    }

    try {
      await writeFile(outputPath, `${text}\n`, "utf8")
    } catch (error) {
      return fail(
        "write",
        `Could not write ${outputPath}: ${errorMessage(error, "unknown error")}`,
      )
    }

    return Result.ok({ outputPath, text, elapsed: stopwatch.elapsed() })
  }
}
