import {
  type ConfigStore,
  type RunRequest,
  UNSET_DEVICE_INDEX,
} from "../../domain/config"
import { DEFAULT_MODEL_TIER } from "../../domain/transcription/value-objects/engine-options.vo"
import type { CaptureRecorders } from "../ports/audio-recorder.port"

/**
 * Fold the command line request into the store's session layer.
 *
 * Field by field: a given option overwrites the stored value, an absent
 * one leaves it alone. Boolean flags only ever switch features on.
 *
 * The model tier is the exception: without --model both local engines
 * are reset to the base tier, whatever the override file says.
 */
export function mergeRequestIntoConfig(
  request: RunRequest,
  store: ConfigStore,
): void {
  // --save_api_key never gets here, it is handled as a batch task
  if (request.apiKey !== undefined) {
    store.apply("OpenAI", "api_key", request.apiKey)
  }

  const model = request.model ?? DEFAULT_MODEL_TIER
  store.apply("OpenAI", "local_transcripton_model_file", model)
  store.apply("WhisperCpp", "local_transcripton_model_file", model)

  if (request.api) {
    store.apply("General", "use_api", true)
  }

  if (request.disableMic) {
    store.apply("General", "disable_mic", true)
  }

  if (request.micDeviceIndex !== undefined) {
    store.apply("General", "mic_device_index", request.micDeviceIndex)
  }

  if (request.disableSpeaker) {
    store.apply("General", "disable_speaker", true)
  }

  if (request.speakerDeviceIndex !== undefined) {
    store.apply("General", "speaker_device_index", request.speakerDeviceIndex)
  }
}

export type CaptureSource = "microphone" | "speaker"

export interface DeviceBinding {
  source: CaptureSource
  index: number
}

/**
 * Point each enabled capture source at its configured device.
 * A disabled source or an unset index leaves the recorder untouched.
 */
export function bindAudioDevices(
  store: ConfigStore,
  recorders: CaptureRecorders,
  onBind?: (binding: DeviceBinding) => void,
): DeviceBinding[] {
  const candidates: Array<DeviceBinding & { disabled: boolean }> = [
    {
      source: "microphone",
      index: store.getNumber("General", "mic_device_index"),
      disabled: store.getBoolean("General", "disable_mic"),
    },
    {
      source: "speaker",
      index: store.getNumber("General", "speaker_device_index"),
      disabled: store.getBoolean("General", "disable_speaker"),
    },
  ]

  const bindings: DeviceBinding[] = []
  for (const { source, index, disabled } of candidates) {
    if (disabled || index === UNSET_DEVICE_INDEX) {
      continue
    }

    recorders[source].setDevice(index)
    const binding = { source, index }
    bindings.push(binding)
    onBind?.(binding)
  }

  return bindings
}
