import type { Result } from "../../domain/shared/result"

/**
 * Error that occurs while enumerating audio devices
 */
export class AudioDeviceError extends Error {
  readonly code = "AUDIO_DEVICE_ERROR"

  constructor(message: string) {
    super(message)
    this.name = "AudioDeviceError"
  }
}

/**
 * `source` devices capture audio, `sink` devices play it.
 * A sink is captured through its monitor source.
 */
export type AudioDeviceKind = "source" | "sink"

export interface AudioDevice {
  index: number
  name: string
  driver: string
  sampleSpec: string
  state: string
  kind: AudioDeviceKind
}

/**
 * Port interface for listing the audio devices of this machine
 */
export interface AudioDevicePort {
  listDevices(): Promise<Result<AudioDevice[], AudioDeviceError>>
}
