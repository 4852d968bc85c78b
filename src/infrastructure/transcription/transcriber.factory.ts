import type { TranscriberPort } from "../../application/ports/transcription.port"
import type { ConfigStore } from "../../domain/config"
import type { SpeechToTextEngine } from "../../domain/transcription/value-objects/engine-options.vo"
import { DeepgramTranscriber } from "./deepgram.transcriber"
import { OpenAIApiTranscriber } from "./openai-api.transcriber"
import { WhisperCliTranscriber } from "./whisper-cli.transcriber"
import { WhisperCppTranscriber } from "./whisper-cpp.transcriber"

/**
 * Build the transcriber for the selected engine from the effective
 * configuration. General.use_api (--api) routes everything through
 * the OpenAI API.
 */
export function createTranscriber(
  engine: SpeechToTextEngine,
  store: ConfigStore,
): TranscriberPort {
  const ffmpegBinary = store.getString("General", "ffmpeg_binary")

  if (store.getBoolean("General", "use_api")) {
    return new OpenAIApiTranscriber({
      apiKey: store.getString("OpenAI", "api_key"),
      baseUrl: store.getString("OpenAI", "base_url"),
      model: store.getString("OpenAI", "api_transcription_model"),
      ffmpegBinary,
    })
  }

  switch (engine) {
    case "whisper":
      return new WhisperCliTranscriber({
        binary: store.getString("OpenAI", "whisper_binary"),
        model: store.getString("OpenAI", "local_transcripton_model_file"),
        language: store.getString("OpenAI", "audio_lang"),
        ffmpegBinary,
      })
    case "whisper.cpp":
      return new WhisperCppTranscriber({
        binary: store.getString("WhisperCpp", "binary"),
        modelDir: store.getString("WhisperCpp", "model_dir"),
        model: store.getString("WhisperCpp", "local_transcripton_model_file"),
        ffmpegBinary,
      })
    case "deepgram":
      return new DeepgramTranscriber({
        apiKey: store.getString("Deepgram", "api_key"),
        model: store.getString("Deepgram", "model"),
        ffmpegBinary,
      })
  }
}
