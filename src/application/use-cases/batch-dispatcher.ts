import type { ConfigError, RunRequest } from "../../domain/config"
import type { AudioDevice, AudioDeviceError } from "../ports/audio-device.port"
import type { ListDevicesUseCase } from "./list-devices"
import type { SaveApiKeyUseCase } from "./save-api-key"
import type {
  TranscribeFileError,
  TranscribeFileOutput,
  TranscribeFileStart,
  TranscribeFileUseCase,
} from "./transcribe-file"

export const BATCH_EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
} as const

/**
 * One-shot tasks, in priority order
 */
export type BatchTask = "list-devices" | "save-api-key" | "transcribe"

export type BatchTaskSelection =
  | { task: "list-devices" }
  | { task: "save-api-key"; apiKey: string }
  | { task: "transcribe"; inputPath: string; outputPath?: string }

/**
 * What the caller should do after dispatch: start the interactive
 * session, or end the process with the given code.
 */
export type DispatchOutcome =
  | { kind: "continue" }
  | { kind: "exit"; task: BatchTask; code: number }

/**
 * Progress callbacks, used by the CLI for output
 */
export interface BatchTaskListener {
  onDevicesListed?: (devices: AudioDevice[]) => void
  onDeviceListingFailed?: (error: AudioDeviceError) => void
  onApiKeySaved?: (path: string) => void
  onApiKeySaveFailed?: (error: ConfigError) => void
  onTranscriptionStart?: (details: TranscribeFileStart) => void
  onTranscriptionComplete?: (output: TranscribeFileOutput) => void
  onTranscriptionFailed?: (
    inputPath: string,
    error: TranscribeFileError,
  ) => void
}

export interface BatchTaskUseCases {
  listDevices: ListDevicesUseCase
  saveApiKey: SaveApiKeyUseCase
  transcribeFile: TranscribeFileUseCase
}

/**
 * Pick the single batch task to run. When several are requested the
 * first in list-devices > save-api-key > transcribe wins.
 */
export function selectBatchTask(
  request: RunRequest,
): BatchTaskSelection | null {
  if (request.listDevices) {
    return { task: "list-devices" }
  }
  if (request.saveApiKey !== undefined) {
    return { task: "save-api-key", apiKey: request.saveApiKey }
  }
  if (request.transcribe !== undefined) {
    return {
      task: "transcribe",
      inputPath: request.transcribe,
      outputPath: request.outputFile,
    }
  }
  return null
}

/**
 * Runs at most one batch task per invocation.
 *
 *   Idle -> ListDevices | SaveKey | Transcribe -> exit(code)
 *   Idle -> Fallthrough (continue to interactive mode)
 */
export class BatchTaskDispatcher {
  constructor(
    private readonly useCases: BatchTaskUseCases,
    private readonly listener: BatchTaskListener = {},
  ) {}

  async dispatch(request: RunRequest): Promise<DispatchOutcome> {
    const selection = selectBatchTask(request)
    if (selection === null) {
      return { kind: "continue" }
    }

    switch (selection.task) {
      case "list-devices":
        return this.exit(selection.task, await this.listDevices())
      case "save-api-key":
        return this.exit(
          selection.task,
          await this.saveApiKey(selection.apiKey),
        )
      case "transcribe":
        return this.exit(
          selection.task,
          await this.transcribe(
            request,
            selection.inputPath,
            selection.outputPath,
          ),
        )
    }
  }

  private exit(task: BatchTask, code: number): DispatchOutcome {
    return { kind: "exit", task, code }
  }

  private async listDevices(): Promise<number> {
    const result = await this.useCases.listDevices.execute()
    if (!result.ok) {
      this.listener.onDeviceListingFailed?.(result.error)
      return BATCH_EXIT_CODES.FAILURE
    }

    this.listener.onDevicesListed?.(result.value)
    return BATCH_EXIT_CODES.SUCCESS
  }

  private async saveApiKey(apiKey: string): Promise<number> {
    const result = await this.useCases.saveApiKey.execute(apiKey)
    if (!result.ok) {
      this.listener.onApiKeySaveFailed?.(result.error)
      return BATCH_EXIT_CODES.FAILURE
    }

    this.listener.onApiKeySaved?.(result.value)
    return BATCH_EXIT_CODES.SUCCESS
  }

  private async transcribe(
    request: RunRequest,
    inputPath: string,
    outputPath?: string,
  ): Promise<number> {
    const result = await this.useCases.transcribeFile.execute({
      inputPath,
      outputPath,
      engine: request.speechToText,
      onStart: this.listener.onTranscriptionStart,
    })

    if (!result.ok) {
      this.listener.onTranscriptionFailed?.(inputPath, result.error)
      return BATCH_EXIT_CODES.FAILURE
    }

    this.listener.onTranscriptionComplete?.(result.value)
    return BATCH_EXIT_CODES.SUCCESS
  }
}
