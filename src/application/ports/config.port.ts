import type { ConfigError, SettingsTree } from "../../domain/config"
import type { Result } from "../../domain/shared/result"

/**
 * Port for the persisted override layer.
 * Reads and writes the whole section/key/value tree at once.
 */
export interface OverrideStorePort {
  /**
   * Load the override layer. A missing file yields an empty tree;
   * an unreadable or malformed one yields an error.
   */
  load(): Promise<Result<SettingsTree, ConfigError>>

  /**
   * Replace the override file with the given tree
   */
  save(overrides: SettingsTree): Promise<Result<void, ConfigError>>

  /**
   * Get the override file path
   */
  getPath(): string
}
