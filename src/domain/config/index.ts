export { ConfigStore } from "./entities/config-store.entity"
export {
  type ConfigError,
  ConfigParseError,
  ConfigValidationError,
  ConfigWriteError,
} from "./errors/config.errors"
export { ConfigPath } from "./value-objects/config-path.vo"
export type { RunRequest } from "./value-objects/run-request.vo"
export {
  DEFAULT_SETTINGS,
  defaultValueOf,
  type SectionName,
  type Settings,
  type SettingsTree,
  type SettingValue,
  UNSET_DEVICE_INDEX,
} from "./value-objects/settings.vo"
