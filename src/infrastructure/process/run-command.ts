import { spawn } from "node:child_process"
import { DomainError, Result } from "../../domain/shared/result"

interface RunCommandOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
}

export interface CommandOutput {
  stdout: string
  stderr: string
}

export class CommandError extends DomainError {
  readonly code = "COMMAND_ERROR"

  constructor(
    readonly command: string,
    message: string,
    readonly notFound = false,
  ) {
    super(message)
  }
}

/**
 * Run an external program to completion, collecting its output.
 * A non-zero exit status is an error carrying stderr.
 */
export const runCommand = (
  command: string,
  args: string[],
  options: RunCommandOptions = {},
): Promise<Result<CommandOutput, CommandError>> =>
  new Promise((resolve) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ["ignore", "pipe", "pipe"],
    })

    let stdout = ""
    let stderr = ""

    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString()
    })

    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString()
    })

    child.on("error", (error: NodeJS.ErrnoException) => {
      const notFound = error.code === "ENOENT"
      resolve(
        Result.err(
          new CommandError(
            command,
            notFound ? `${command} not found in PATH` : error.message,
            notFound,
          ),
        ),
      )
    })

    child.on("close", (code) => {
      if (code !== 0) {
        const suffix = stderr.trim() ? `\n${stderr.trim()}` : ""
        resolve(
          Result.err(
            new CommandError(command, `${command} failed (${code})${suffix}`),
          ),
        )
        return
      }

      resolve(Result.ok({ stdout, stderr }))
    })
  })
