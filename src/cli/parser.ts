import { parseArgs } from "node:util"
import type { RunRequest } from "../domain/config"
import { Result } from "../domain/shared/result"
import {
  CHAT_INFERENCE_PROVIDERS,
  DEFAULT_CHAT_INFERENCE_PROVIDER,
  DEFAULT_SPEECH_TO_TEXT_ENGINE,
  EngineOptions,
  MODEL_TIERS,
  SPEECH_TO_TEXT_ENGINES,
} from "../domain/transcription/value-objects/engine-options.vo"

/**
 * POSIX exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  USAGE_ERROR: 2,
  INTERRUPTED: 130,
} as const

/**
 * Result of argument parsing: show help, show version, or run
 */
export type ParsedCliOptions =
  | { mode: "help" }
  | { mode: "version" }
  | { mode: "run"; request: RunRequest }

/**
 * CLI parsing error
 */
export class CliParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "CliParseError"
  }
}

export const VERSION = "1.0.0"

const OPTIONS = {
  api: { type: "boolean", short: "a", default: false },
  // Accepted for older scripts; has no effect
  experimental: { type: "boolean", short: "e", default: false },
  speech_to_text: { type: "string" },
  "chat-inference-provider": { type: "string", short: "c" },
  api_key: { type: "string", short: "k" },
  save_api_key: { type: "string" },
  transcribe: { type: "string", short: "t" },
  output_file: { type: "string", short: "o" },
  model: { type: "string", short: "m" },
  list_devices: { type: "boolean", short: "l", default: false },
  mic_device_index: { type: "string" },
  speaker_device_index: { type: "string" },
  disable_mic: { type: "boolean", default: false },
  disable_speaker: { type: "boolean", default: false },
  help: { type: "boolean", short: "h", default: false },
  version: { type: "boolean", short: "v", default: false },
} as const

/**
 * Short aliases longer than one letter, which parseArgs cannot declare
 */
const MULTI_LETTER_ALIASES: Partial<Record<string, string>> = {
  "-stt": "--speech_to_text",
  "-sk": "--save_api_key",
  "-mi": "--mic_device_index",
  "-si": "--speaker_device_index",
  "-dm": "--disable_mic",
  "-ds": "--disable_speaker",
}

const VALUE_FLAGS = new Set(
  Object.entries(OPTIONS).flatMap(([name, option]) =>
    option.type === "string"
      ? [`--${name}`, ...("short" in option ? [`-${option.short}`] : [])]
      : [],
  ),
)

/**
 * Help text
 */
export function getHelpText(): string {
  return `
transcribe - speech transcription from microphone, speaker or file

USAGE:
    transcribe [OPTIONS]

ENGINE OPTIONS:
    -stt, --speech_to_text <ENGINE>   Speech to text engine (default: whisper)
                                      Options: ${SPEECH_TO_TEXT_ENGINES.join("|")}
                                      Local engines respond faster, API engines
                                      tend to be more accurate.
    -m, --model <TIER>                Local model tier (default: base)
                                      Options: ${MODEL_TIERS.join("|")}
    -a, --api                         Transcribe with the OpenAI API.
                                      Requires an API key and consumes credits.
    -e, --experimental                Accepted and ignored
    -c, --chat-inference-provider <PROVIDER>
                                      Chat inference backend (default: openai)
                                      Options: ${CHAT_INFERENCE_PROVIDERS.join("|")}
    -k, --api_key <KEY>               OpenAI API key for this run only
    -sk, --save_api_key <KEY>         Save the OpenAI API key to the override
                                      file, then exit

FILE TRANSCRIPTION:
    -t, --transcribe <FILE>           Transcribe an audio file, then exit.
                                      Respects -m and -stt.
    -o, --output_file <FILE>          Output for -t (default: transcription.txt)

AUDIO DEVICES:
    -l, --list_devices                List audio devices with their indices,
                                      then exit
    -mi, --mic_device_index <INDEX>   Microphone device index
    -si, --speaker_device_index <INDEX>
                                      Speaker (monitor source) device index
    -dm, --disable_mic                Do not transcribe the microphone
    -ds, --disable_speaker            Do not transcribe the speaker

    -h, --help                        Show this help message
    -v, --version                     Show version

Negative values need the --flag=value form, e.g. --mic_device_index=-1.

CONFIG FILE:
    Location: $XDG_CONFIG_HOME/transcribe-cli/override.toml
              (default: ~/.config/transcribe-cli/override.toml,
               or $TRANSCRIBE_CONFIG_FILE)

PRIORITY:
    CLI arguments > Override file > Defaults
    Without -m both local engines use the base model.

EXAMPLES:
    transcribe                           # Live transcription, mic + speaker
    transcribe -l                        # Find device indices
    transcribe -mi 3 -ds                 # Microphone 3 only
    transcribe -t meeting.wav -o out.txt # Transcribe a file
    transcribe -stt whisper.cpp -m small # whisper.cpp, small model

OUTPUT:
    Transcribed text is written to stdout (live) or the output file (-t).
    Status messages are written to stderr.
`.trim()
}

/**
 * Rewrite multi-letter short aliases to their long form.
 * Tokens that are the value of a preceding option are left alone.
 */
export function normalizeAliases(argv: string[]): string[] {
  const normalized: string[] = []
  let expectsValue = false

  for (const arg of argv) {
    if (expectsValue) {
      normalized.push(arg)
      expectsValue = false
      continue
    }

    const [flag, ...inline] = arg.split("=")
    const longForm = MULTI_LETTER_ALIASES[flag]
    const rewritten =
      longForm === undefined
        ? arg
        : inline.length > 0
          ? `${longForm}=${inline.join("=")}`
          : longForm

    normalized.push(rewritten)
    expectsValue = inline.length === 0 && VALUE_FLAGS.has(longForm ?? arg)
  }

  return normalized
}

function parseChoice<T extends string>(
  flag: string,
  value: string | undefined,
  choices: readonly T[],
  isChoice: (value: string) => value is T,
): Result<T | undefined, CliParseError> {
  if (value === undefined) {
    return Result.ok(undefined)
  }
  if (!isChoice(value)) {
    return Result.err(
      new CliParseError(
        `Invalid value "${value}" for --${flag}. Valid options: ${choices.join(", ")}`,
      ),
    )
  }
  return Result.ok(value)
}

function parseDeviceIndex(
  flag: string,
  value: string | undefined,
): Result<number | undefined, CliParseError> {
  if (value === undefined) {
    return Result.ok(undefined)
  }
  if (!/^-?\d+$/.test(value)) {
    return Result.err(
      new CliParseError(
        `Invalid value "${value}" for --${flag}: expected an integer`,
      ),
    )
  }
  return Result.ok(Number.parseInt(value, 10))
}

/**
 * Parse command line arguments
 */
export function parseCliArgs(
  argv: string[],
): Result<ParsedCliOptions, CliParseError> {
  let values: ReturnType<typeof parse>["values"]
  try {
    values = parse(normalizeAliases(argv)).values
  } catch (error) {
    const message =
      error instanceof Error ? error.message : "Unknown argument parsing error"
    return Result.err(new CliParseError(message))
  }

  // Check for help/version first
  if (values.help) {
    return Result.ok({ mode: "help" })
  }
  if (values.version) {
    return Result.ok({ mode: "version" })
  }

  const speechToText = parseChoice(
    "speech_to_text",
    values.speech_to_text,
    SPEECH_TO_TEXT_ENGINES,
    EngineOptions.isSpeechToTextEngine,
  )
  if (!speechToText.ok) return speechToText

  const chatInferenceProvider = parseChoice(
    "chat-inference-provider",
    values["chat-inference-provider"],
    CHAT_INFERENCE_PROVIDERS,
    EngineOptions.isChatInferenceProvider,
  )
  if (!chatInferenceProvider.ok) return chatInferenceProvider

  const model = parseChoice(
    "model",
    values.model,
    MODEL_TIERS,
    EngineOptions.isModelTier,
  )
  if (!model.ok) return model

  const micDeviceIndex = parseDeviceIndex(
    "mic_device_index",
    values.mic_device_index,
  )
  if (!micDeviceIndex.ok) return micDeviceIndex

  const speakerDeviceIndex = parseDeviceIndex(
    "speaker_device_index",
    values.speaker_device_index,
  )
  if (!speakerDeviceIndex.ok) return speakerDeviceIndex

  return Result.ok({
    mode: "run",
    request: {
      api: values.api === true,
      speechToText: speechToText.value ?? DEFAULT_SPEECH_TO_TEXT_ENGINE,
      chatInferenceProvider:
        chatInferenceProvider.value ?? DEFAULT_CHAT_INFERENCE_PROVIDER,
      apiKey: values.api_key,
      saveApiKey: values.save_api_key,
      transcribe: values.transcribe,
      outputFile: values.output_file,
      model: model.value,
      listDevices: values.list_devices === true,
      micDeviceIndex: micDeviceIndex.value,
      speakerDeviceIndex: speakerDeviceIndex.value,
      disableMic: values.disable_mic === true,
      disableSpeaker: values.disable_speaker === true,
    },
  })
}

function parse(args: string[]) {
  return parseArgs({
    args,
    options: OPTIONS,
    strict: true,
    allowPositionals: false,
  })
}
