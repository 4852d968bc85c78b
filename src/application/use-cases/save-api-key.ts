import { type ConfigError, ConfigStore } from "../../domain/config"
import { Result } from "../../domain/shared/result"
import type { OverrideStorePort } from "../ports/config.port"

/**
 * Persist an OpenAI API key to the override file.
 *
 * Works on a fresh load of the file rather than the merged store, so
 * values given on the command line for this run are never written out.
 */
export class SaveApiKeyUseCase {
  constructor(private readonly overrideStore: OverrideStorePort) {}

  /**
   * @returns Path of the file the key was written to
   */
  async execute(apiKey: string): Promise<Result<string, ConfigError>> {
    const loadResult = await this.overrideStore.load()
    if (!loadResult.ok) {
      return loadResult
    }

    const store = ConfigStore.create(loadResult.value)
    store.setOverride("OpenAI", "api_key", apiKey)

    const saveResult = await this.overrideStore.save(store.overrideLayer())
    if (!saveResult.ok) {
      return saveResult
    }

    return Result.ok(this.overrideStore.getPath())
  }
}
