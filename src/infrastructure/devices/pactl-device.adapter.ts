import {
  type AudioDevice,
  AudioDeviceError,
  type AudioDeviceKind,
  type AudioDevicePort,
} from "../../application/ports/audio-device.port"
import { Result } from "../../domain/shared/result"
import { type CommandError, runCommand } from "../process/run-command"

/**
 * Parse `pactl list short sources|sinks` output.
 * Each line is tab separated: index, name, driver, sample spec, state.
 */
export function parsePactlShortList(
  output: string,
  kind: AudioDeviceKind,
): AudioDevice[] {
  const devices: AudioDevice[] = []

  for (const line of output.split("\n")) {
    const [index, name, driver = "", sampleSpec = "", state = ""] = line
      .trim()
      .split("\t")
    if (!index || !name || !/^\d+$/.test(index)) {
      continue
    }

    devices.push({
      index: Number.parseInt(index, 10),
      name,
      driver,
      sampleSpec,
      state,
      kind,
    })
  }

  return devices
}

/**
 * Audio device enumeration for PulseAudio/Pipewire using pactl.
 * Implements the AudioDevicePort interface.
 */
export class PactlDeviceAdapter implements AudioDevicePort {
  constructor(
    private readonly binary = "pactl",
    private readonly run: typeof runCommand = runCommand,
  ) {}

  async listDevices(): Promise<Result<AudioDevice[], AudioDeviceError>> {
    const [sources, sinks] = await Promise.all([
      this.run(this.binary, ["list", "short", "sources"]),
      this.run(this.binary, ["list", "short", "sinks"]),
    ])

    if (!sources.ok) return this.toDeviceError(sources.error)
    if (!sinks.ok) return this.toDeviceError(sinks.error)

    return Result.ok([
      ...parsePactlShortList(sources.value.stdout, "source"),
      ...parsePactlShortList(sinks.value.stdout, "sink"),
    ])
  }

  private toDeviceError(error: CommandError): Result<never, AudioDeviceError> {
    const hint = error.notFound
      ? ". Install pulseaudio-utils (or pipewire-pulse) to list devices"
      : ""
    return Result.err(new AudioDeviceError(`${error.message}${hint}`))
  }
}
