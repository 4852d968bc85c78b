import { describe, expect, it } from "vitest"
import { EngineOptions } from "../value-objects/engine-options.vo"

describe("EngineOptions", () => {
  it("recognises engine, provider and model names", () => {
    expect(EngineOptions.isSpeechToTextEngine("whisper.cpp")).toBe(true)
    expect(EngineOptions.isSpeechToTextEngine("vosk")).toBe(false)
    expect(EngineOptions.isChatInferenceProvider("together")).toBe(true)
    expect(EngineOptions.isModelTier("large-v3")).toBe(true)
    expect(EngineOptions.isModelTier("huge")).toBe(false)
  })

  it("only resamples input for whisper.cpp", () => {
    expect(EngineOptions.requires16kHzInput("whisper.cpp")).toBe(true)
    expect(EngineOptions.requires16kHzInput("whisper")).toBe(false)
    expect(EngineOptions.requires16kHzInput("deepgram")).toBe(false)
  })
})
