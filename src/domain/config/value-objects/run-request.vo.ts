import type {
  ChatInferenceProvider,
  ModelTier,
  SpeechToTextEngine,
} from "../../transcription/value-objects/engine-options.vo"

/**
 * Immutable snapshot of the recognised command line options.
 * Optional fields are undefined when the flag was not given.
 */
export interface RunRequest {
  readonly api: boolean
  readonly speechToText: SpeechToTextEngine
  readonly chatInferenceProvider: ChatInferenceProvider
  /** Used for this run only */
  readonly apiKey?: string
  /** Persisted to the override file, then the process exits */
  readonly saveApiKey?: string
  readonly transcribe?: string
  /** Only meaningful together with transcribe */
  readonly outputFile?: string
  readonly model?: ModelTier
  readonly listDevices: boolean
  readonly micDeviceIndex?: number
  readonly speakerDeviceIndex?: number
  readonly disableMic: boolean
  readonly disableSpeaker: boolean
}
