import { DomainError } from "../../shared/result"

export class ConfigParseError extends DomainError {
  readonly code = "CONFIG_PARSE_ERROR"
  constructor(path: string, message: string) {
    super(`Failed to load override file ${path}: ${message}`)
  }
}

export class ConfigValidationError extends DomainError {
  readonly code = "CONFIG_VALIDATION_ERROR"
  constructor(path: string, setting: string, message: string) {
    super(`Invalid value for '${setting}' in ${path}: ${message}`)
  }
}

export class ConfigWriteError extends DomainError {
  readonly code = "CONFIG_WRITE_ERROR"
  constructor(path: string, message: string) {
    super(`Failed to write override file ${path}: ${message}`)
  }
}

export type ConfigError =
  | ConfigParseError
  | ConfigValidationError
  | ConfigWriteError
