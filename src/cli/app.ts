import type { AudioDevicePort } from "../application/ports/audio-device.port"
import type { CaptureRecorders } from "../application/ports/audio-recorder.port"
import type { OverrideStorePort } from "../application/ports/config.port"
import type { TranscriberPort } from "../application/ports/transcription.port"
import {
  bindAudioDevices,
  type CaptureSource,
  mergeRequestIntoConfig,
} from "../application/services/config-merger"
import {
  type BatchTaskListener,
  BatchTaskDispatcher,
} from "../application/use-cases/batch-dispatcher"
import { ListDevicesUseCase } from "../application/use-cases/list-devices"
import { LiveTranscriptionUseCase } from "../application/use-cases/live-transcription"
import { SaveApiKeyUseCase } from "../application/use-cases/save-api-key"
import { TranscribeFileUseCase } from "../application/use-cases/transcribe-file"
import { ConfigStore, type RunRequest } from "../domain/config"
import { Duration } from "../domain/recording/value-objects/duration.vo"
import { errorMessage } from "../domain/shared/result"
import type { SpeechToTextEngine } from "../domain/transcription/value-objects/engine-options.vo"
import { TomlOverrideAdapter } from "../infrastructure/config/toml-override.adapter"
import { PactlDeviceAdapter } from "../infrastructure/devices/pactl-device.adapter"
import {
  DEFAULT_MONITOR_SOURCE,
  FFmpegRecorderAdapter,
} from "../infrastructure/recording/ffmpeg-recorder.adapter"
import { createTranscriber } from "../infrastructure/transcription/transcriber.factory"
import { EXIT_CODES, getHelpText, parseCliArgs, VERSION } from "./parser"
import { Presenter } from "./presenter"
import { SignalHandler } from "./signals"

/**
 * Builders for the collaborators that depend on the effective
 * configuration. Replaced with fakes in tests.
 */
export interface AppAdapters {
  overrideStore: () => OverrideStorePort
  devices: (store: ConfigStore) => AudioDevicePort
  recorders: (store: ConfigStore) => CaptureRecorders
  transcriber: (
    engine: SpeechToTextEngine,
    store: ConfigStore,
  ) => TranscriberPort
}

export const defaultAdapters: AppAdapters = {
  overrideStore: () => new TomlOverrideAdapter(),
  devices: (store) =>
    new PactlDeviceAdapter(store.getString("General", "pactl_binary")),
  recorders: (store) => {
    const ffmpeg = store.getString("General", "ffmpeg_binary")
    return {
      microphone: new FFmpegRecorderAdapter("microphone", ffmpeg),
      speaker: new FFmpegRecorderAdapter(
        "speaker",
        ffmpeg,
        DEFAULT_MONITOR_SOURCE,
      ),
    }
  },
  transcriber: createTranscriber,
}

/**
 * Main CLI application.
 * Wires dependencies and orchestrates the CLI flow:
 * parse -> load override file -> merge -> bind devices -> batch task or
 * live transcription.
 */
export class App {
  private presenter: Presenter

  constructor(private readonly adapters: AppAdapters = defaultAdapters) {
    this.presenter = new Presenter()
  }

  /**
   * Run the CLI application
   */
  async run(argv: string[]): Promise<number> {
    const parseResult = parseCliArgs(argv)

    if (!parseResult.ok) {
      this.presenter.error(parseResult.error.message)
      this.presenter.info("Run 'transcribe --help' for usage information.")
      return EXIT_CODES.USAGE_ERROR
    }

    const options = parseResult.value

    if (options.mode === "help") {
      console.log(getHelpText())
      return EXIT_CODES.SUCCESS
    }

    if (options.mode === "version") {
      console.log(`transcribe v${VERSION}`)
      return EXIT_CODES.SUCCESS
    }

    const request = options.request
    const overrideStore = this.adapters.overrideStore()

    // A broken override file is fatal: falling back to defaults would
    // hide a saved API key
    const overrides = await overrideStore.load()
    if (!overrides.ok) {
      this.presenter.error(overrides.error.message)
      return EXIT_CODES.ERROR
    }

    const store = ConfigStore.create(overrides.value)
    mergeRequestIntoConfig(request, store)

    const recorders = this.adapters.recorders(store)
    bindAudioDevices(store, recorders, ({ source, index }) => {
      this.presenter.info(
        `Override default ${source} with device ${index} specified in parameters.`,
      )
    })

    const transcriber = this.adapters.transcriber(request.speechToText, store)

    const dispatcher = new BatchTaskDispatcher(
      {
        listDevices: new ListDevicesUseCase(this.adapters.devices(store)),
        saveApiKey: new SaveApiKeyUseCase(overrideStore),
        transcribeFile: new TranscribeFileUseCase(transcriber),
      },
      this.batchListener(transcriber),
    )

    const outcome = await dispatcher.dispatch(request)
    if (outcome.kind === "exit") {
      return outcome.code
    }

    return await this.runLiveMode(request, store, recorders, transcriber)
  }

  private batchListener(transcriber: TranscriberPort): BatchTaskListener {
    return {
      onDevicesListed: (devices) => {
        this.presenter.info(
          "List all audio drivers and devices on this machine",
        )
        this.presenter.devices(devices)
      },

      onDeviceListingFailed: (error) => {
        this.presenter.error(error.message)
      },

      onApiKeySaved: (path) => {
        this.presenter.success(`Saved API Key to ${path}`)
      },

      onApiKeySaveFailed: (error) => {
        this.presenter.error(error.message)
      },

      onTranscriptionStart: ({ inputPath, size, outputPath }) => {
        this.presenter.info(`Converting the audio file ${inputPath} to text.`)
        this.presenter.info(`${inputPath} file size ${size.humanReadable}.`)
        this.presenter.info(`Text output will be produced in ${outputPath}.`)
        this.presenter.startSpinner(`Transcribing with ${transcriber.name}...`)
      },

      onTranscriptionComplete: ({ elapsed }) => {
        this.presenter.spinnerSuccess(`Complete! Transcription took ${elapsed}`)
      },

      onTranscriptionFailed: (inputPath, error) => {
        this.presenter.spinnerFail("Error during transcription!")
        this.presenter.error(error.message)
        if (error.suspectInput) {
          this.presenter.info(`Please ensure ${inputPath} is an audio file.`)
        }
        this.presenter.info(`Transcription ran for ${error.elapsed}`)
      },
    }
  }

  /**
   * Run live transcription until interrupted
   */
  private async runLiveMode(
    request: RunRequest,
    store: ConfigStore,
    recorders: CaptureRecorders,
    transcriber: TranscriberPort,
  ): Promise<number> {
    const sources: CaptureSource[] = []
    if (!store.getBoolean("General", "disable_mic")) sources.push("microphone")
    if (!store.getBoolean("General", "disable_speaker")) sources.push("speaker")

    const useCase = new LiveTranscriptionUseCase(recorders, transcriber)
    const signalHandler = new SignalHandler((error) => {
      this.presenter.warn(`Cleanup failed: ${errorMessage(error, String(error))}`)
    })

    signalHandler.onCleanup(async () => {
      this.presenter.info("Stopping...")
      await useCase.stop()
    })

    if (sources.length > 0) {
      this.presenter.info(
        `Live transcription with ${transcriber.name} from ${sources.join(" and ")} ` +
          `(chat inference: ${request.chatInferenceProvider}). Press Ctrl+C to stop.`,
      )
    }

    try {
      const result = await useCase.execute({
        chunkDuration: Duration.fromSeconds(
          store.getNumber("General", "transcript_audio_duration_seconds"),
        ),
        sources,
        onTranscript: (source, text) =>
          this.presenter.transcript(source, text),
        onTranscriptionError: (source, message) =>
          this.presenter.warn(`${source}: ${message}`),
      })

      if (!result.ok) {
        this.presenter.error(result.error.message)
        return EXIT_CODES.ERROR
      }

      return EXIT_CODES.SUCCESS
    } finally {
      signalHandler.removeHandlers()
    }
  }
}
