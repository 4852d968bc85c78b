import {
  defaultValueOf,
  type KeysOfType,
  type SectionName,
  type SettingKey,
  type Settings,
  type SettingsTree,
  type SettingValue,
} from "../value-objects/settings.vo"

/**
 * Layered configuration store.
 *
 * Reads resolve with precedence session > override > default:
 *   - default:  compiled-in DEFAULT_SETTINGS
 *   - override: loaded from the override file, the only layer persisted
 *   - session:  values applied for this run only (command line)
 *
 * Override values whose type does not match the default are ignored on
 * read; the override adapter rejects such files when loading them.
 */
export class ConfigStore {
  private readonly overrides: SettingsTree
  private readonly session: SettingsTree = {}

  private constructor(overrides: SettingsTree) {
    this.overrides = structuredClone(overrides)
  }

  /**
   * Create a store over defaults and an optional override layer
   */
  static create(overrides: SettingsTree = {}): ConfigStore {
    return new ConfigStore(overrides)
  }

  getString<S extends SectionName>(
    section: S,
    key: KeysOfType<S, string>,
  ): string {
    const value = this.lookup(section, key)
    if (typeof value !== "string") {
      throw new TypeError(`${section}.${key} is not a string setting`)
    }
    return value
  }

  getNumber<S extends SectionName>(
    section: S,
    key: KeysOfType<S, number>,
  ): number {
    const value = this.lookup(section, key)
    if (typeof value !== "number") {
      throw new TypeError(`${section}.${key} is not a number setting`)
    }
    return value
  }

  getBoolean<S extends SectionName>(
    section: S,
    key: KeysOfType<S, boolean>,
  ): boolean {
    const value = this.lookup(section, key)
    if (typeof value !== "boolean") {
      throw new TypeError(`${section}.${key} is not a boolean setting`)
    }
    return value
  }

  /**
   * Set a value for this run only. Never reaches the override file.
   */
  apply<S extends SectionName, K extends SettingKey<S>>(
    section: S,
    key: K,
    value: Settings[S][K] & SettingValue,
  ): void {
    this.write(this.session, section, key, value)
  }

  /**
   * Set a value in the override layer (persisted by the next save)
   */
  setOverride<S extends SectionName, K extends SettingKey<S>>(
    section: S,
    key: K,
    value: Settings[S][K] & SettingValue,
  ): void {
    this.write(this.overrides, section, key, value)
  }

  /**
   * Copy of the override layer, including sections and keys
   * the application does not know about
   */
  overrideLayer(): SettingsTree {
    return structuredClone(this.overrides)
  }

  private lookup(section: SectionName, key: string): SettingValue {
    const fallback = defaultValueOf(section, key)
    if (fallback === undefined) {
      throw new RangeError(`Unknown setting ${section}.${key}`)
    }

    for (const layer of [this.session, this.overrides]) {
      const value = layer[section]?.[key]
      if (value !== undefined && typeof value === typeof fallback) {
        return value
      }
    }

    return fallback
  }

  private write(
    layer: SettingsTree,
    section: SectionName,
    key: string,
    value: SettingValue,
  ): void {
    const existing = layer[section]
    if (existing) {
      existing[key] = value
    } else {
      layer[section] = { [key]: value }
    }
  }
}
