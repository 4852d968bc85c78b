#!/usr/bin/env node
/**
 * transcribe - speech transcription CLI
 *
 * Resolves configuration from the command line, the override file and
 * compiled-in defaults, runs a one-shot task (list devices, save API key,
 * transcribe a file) or starts live transcription.
 */

import { App } from "./cli/app"

const app = new App()
const exitCode = await app.run(process.argv.slice(2))
process.exit(exitCode)
