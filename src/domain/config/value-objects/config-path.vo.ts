/**
 * XDG-compliant override file location.
 * TRANSCRIBE_CONFIG_FILE points at a different file outright.
 */

const APP_NAME = "transcribe-cli"
const OVERRIDE_FILE = "override.toml"

/**
 * Get the config directory path.
 * Uses $XDG_CONFIG_HOME if set, otherwise falls back to ~/.config
 */
function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdgHome = env.XDG_CONFIG_HOME
  const home = env.HOME ?? ""
  const base = xdgHome ?? `${home}/.config`
  return `${base}/${APP_NAME}`
}

function getOverrideFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return env.TRANSCRIBE_CONFIG_FILE ?? `${getConfigDir(env)}/${OVERRIDE_FILE}`
}

export const ConfigPath = {
  getConfigDir,
  getOverrideFilePath,
}
