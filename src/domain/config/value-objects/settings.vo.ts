/**
 * Scalar value allowed in a settings section
 */
export type SettingValue = string | number | boolean

/**
 * Loose section -> key -> value tree, as stored in the override file.
 * May hold sections and keys the application does not know about.
 */
export type SettingsTree = Record<string, Record<string, SettingValue>>

/**
 * Sentinel for "no device selected, use the system default"
 */
export const UNSET_DEVICE_INDEX = -1

export type GeneralSettings = {
  use_api: boolean
  disable_mic: boolean
  disable_speaker: boolean
  mic_device_index: number
  speaker_device_index: number
  transcript_audio_duration_seconds: number
  ffmpeg_binary: string
  pactl_binary: string
}

export type OpenAISettings = {
  api_key: string
  base_url: string
  api_transcription_model: string
  local_transcripton_model_file: string
  audio_lang: string
  whisper_binary: string
}

export type WhisperCppSettings = {
  local_transcripton_model_file: string
  model_dir: string
  binary: string
}

export type DeepgramSettings = {
  api_key: string
  model: string
}

export type TogetherSettings = {
  api_key: string
  ai_model: string
}

/**
 * Fully typed settings, one section type per config file section.
 * Declared as type aliases so a Settings value is also a SettingsTree.
 */
export type Settings = {
  General: GeneralSettings
  OpenAI: OpenAISettings
  WhisperCpp: WhisperCppSettings
  Deepgram: DeepgramSettings
  Together: TogetherSettings
}

export type SectionName = keyof Settings

export type SettingKey<S extends SectionName> = keyof Settings[S] & string

/**
 * Keys of a section whose values have type V
 */
export type KeysOfType<S extends SectionName, V extends SettingValue> = {
  [K in SettingKey<S>]: Settings[S][K] extends V ? K : never
}[SettingKey<S>] &
  string

/**
 * Compiled-in defaults, the lowest configuration layer
 */
export const DEFAULT_SETTINGS: Settings = {
  General: {
    use_api: false,
    disable_mic: false,
    disable_speaker: false,
    mic_device_index: UNSET_DEVICE_INDEX,
    speaker_device_index: UNSET_DEVICE_INDEX,
    transcript_audio_duration_seconds: 3,
    ffmpeg_binary: "ffmpeg",
    pactl_binary: "pactl",
  },
  OpenAI: {
    api_key: "",
    base_url: "https://api.openai.com/v1",
    api_transcription_model: "whisper-1",
    local_transcripton_model_file: "base",
    audio_lang: "english",
    whisper_binary: "whisper",
  },
  WhisperCpp: {
    local_transcripton_model_file: "base",
    model_dir: "models",
    binary: "whisper-cli",
  },
  Deepgram: {
    api_key: "",
    model: "nova-2",
  },
  Together: {
    api_key: "",
    ai_model: "meta-llama/Llama-3-70b-chat-hf",
  },
}

const DEFAULT_TREE: SettingsTree = DEFAULT_SETTINGS

/**
 * Default value for a section/key pair, undefined for keys the
 * application does not know
 */
export function defaultValueOf(
  section: string,
  key: string,
): SettingValue | undefined {
  return DEFAULT_TREE[section]?.[key]
}
