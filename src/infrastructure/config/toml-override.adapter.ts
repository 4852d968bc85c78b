import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises"
import { dirname } from "node:path"
import { parse, stringify } from "@iarna/toml"
import type { OverrideStorePort } from "../../application/ports/config.port"
import {
  type ConfigError,
  ConfigParseError,
  ConfigPath,
  ConfigValidationError,
  ConfigWriteError,
  defaultValueOf,
  type SettingsTree,
  type SettingValue,
} from "../../domain/config"
import { errorMessage, Result } from "../../domain/shared/result"

function isTable(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  )
}

function isSettingValue(value: unknown): value is SettingValue {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  )
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  )
}

/**
 * Adapter for the TOML override file.
 *
 * File layout mirrors the settings sections:
 *
 *   [OpenAI]
 *   api_key = "..."
 *
 *   [General]
 *   mic_device_index = 3
 */
export class TomlOverrideAdapter implements OverrideStorePort {
  private readonly overridePath: string

  constructor(overridePath?: string) {
    this.overridePath = overridePath ?? ConfigPath.getOverrideFilePath()
  }

  getPath(): string {
    return this.overridePath
  }

  async load(): Promise<Result<SettingsTree, ConfigError>> {
    let content: string
    try {
      content = await readFile(this.overridePath, "utf8")
    } catch (error) {
      if (isMissingFile(error)) {
        return Result.ok({})
      }
      return Result.err(
        new ConfigParseError(
          this.overridePath,
          errorMessage(error, "Unknown read error"),
        ),
      )
    }

    let raw: Record<string, unknown>
    try {
      raw = parse(content)
    } catch (error) {
      return Result.err(
        new ConfigParseError(
          this.overridePath,
          errorMessage(error, "Unknown parse error"),
        ),
      )
    }

    return this.toSettingsTree(raw)
  }

  async save(overrides: SettingsTree): Promise<Result<void, ConfigError>> {
    const tempPath = `${this.overridePath}.${process.pid}.tmp`

    try {
      await mkdir(dirname(this.overridePath), { recursive: true })
      await writeFile(tempPath, stringify(overrides), "utf8")
      // rename is atomic within a filesystem, readers never see a partial file
      await rename(tempPath, this.overridePath)
      return Result.ok(undefined)
    } catch (error) {
      await rm(tempPath, { force: true })
      return Result.err(
        new ConfigWriteError(
          this.overridePath,
          errorMessage(error, "Unknown write error"),
        ),
      )
    }
  }

  /**
   * Validate parsed TOML against the settings shape.
   * Unknown sections and keys pass through; known keys must keep
   * the type of their default.
   */
  private toSettingsTree(
    raw: Record<string, unknown>,
  ): Result<SettingsTree, ConfigError> {
    const tree: SettingsTree = {}

    for (const [sectionName, section] of Object.entries(raw)) {
      if (!isTable(section)) {
        return Result.err(
          new ConfigValidationError(
            this.overridePath,
            sectionName,
            "expected a [section] table",
          ),
        )
      }

      const values: Record<string, SettingValue> = {}
      for (const [key, value] of Object.entries(section)) {
        const setting = `${sectionName}.${key}`
        if (!isSettingValue(value)) {
          return Result.err(
            new ConfigValidationError(
              this.overridePath,
              setting,
              "expected a string, number or boolean",
            ),
          )
        }

        const fallback = defaultValueOf(sectionName, key)
        if (fallback !== undefined && typeof fallback !== typeof value) {
          return Result.err(
            new ConfigValidationError(
              this.overridePath,
              setting,
              `expected a ${typeof fallback}, got ${typeof value}`,
            ),
          )
        }

        values[key] = value
      }
      tree[sectionName] = values
    }

    return Result.ok(tree)
  }
}
