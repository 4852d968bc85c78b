import { Result } from "../../domain/shared/result"
import type {
  AudioDevice,
  AudioDeviceError,
  AudioDevicePort,
} from "../ports/audio-device.port"

/**
 * Enumerate the audio devices of this machine, capture sources first,
 * each group ordered by index.
 * Their indices are what --mic_device_index and --speaker_device_index take.
 */
export class ListDevicesUseCase {
  constructor(private readonly devices: AudioDevicePort) {}

  async execute(): Promise<Result<AudioDevice[], AudioDeviceError>> {
    const result = await this.devices.listDevices()

    return Result.map(result, (devices) =>
      [...devices].sort((a, b) =>
        a.kind === b.kind ? a.index - b.index : a.kind === "source" ? -1 : 1,
      ),
    )
  }
}
