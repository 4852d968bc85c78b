/**
 * Speech to text engines selectable on the command line.
 * `whisper` and `whisper.cpp` run locally, `deepgram` is a remote API.
 */
export const SPEECH_TO_TEXT_ENGINES = [
  "whisper",
  "whisper.cpp",
  "deepgram",
] as const

export type SpeechToTextEngine = (typeof SPEECH_TO_TEXT_ENGINES)[number]

export const CHAT_INFERENCE_PROVIDERS = ["openai", "together"] as const

export type ChatInferenceProvider = (typeof CHAT_INFERENCE_PROVIDERS)[number]

/**
 * Local model tiers, smallest first
 */
export const MODEL_TIERS = [
  "tiny",
  "base",
  "small",
  "medium",
  "large-v1",
  "large-v2",
  "large-v3",
  "large",
] as const

export type ModelTier = (typeof MODEL_TIERS)[number]

export const DEFAULT_SPEECH_TO_TEXT_ENGINE: SpeechToTextEngine = "whisper"
export const DEFAULT_CHAT_INFERENCE_PROVIDER: ChatInferenceProvider = "openai"
export const DEFAULT_MODEL_TIER: ModelTier = "base"

function isMember<T extends string>(
  choices: readonly T[],
  value: string,
): value is T {
  return choices.some((choice) => choice === value)
}

export const EngineOptions = {
  isSpeechToTextEngine: (value: string): value is SpeechToTextEngine =>
    isMember(SPEECH_TO_TEXT_ENGINES, value),

  isChatInferenceProvider: (value: string): value is ChatInferenceProvider =>
    isMember(CHAT_INFERENCE_PROVIDERS, value),

  isModelTier: (value: string): value is ModelTier =>
    isMember(MODEL_TIERS, value),

  /**
   * whisper.cpp only accepts 16 kHz input, so files are resampled first.
   */
  requires16kHzInput: (engine: SpeechToTextEngine): boolean =>
    engine === "whisper.cpp",
}
