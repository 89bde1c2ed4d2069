/**
 * command-runner.ts - External tool invocation.
 *
 * Every external tool (git, gear helpers, rpm) is executed through a
 * CommandRunner so that callers can substitute an in-process fake. The
 * default runner uses child_process.spawn with output captured, never
 * inherited.
 */

import { spawn } from 'node:child_process'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('command-runner')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
}

export interface CommandResult {
  stdout: string
  stderr: string
  code: number
}

/**
 * Runs one external command to completion.
 * Implementations resolve with the exit code instead of rejecting on failure.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>
}

// ---------------------------------------------------------------------------
// spawnCommand
// ---------------------------------------------------------------------------

/**
 * Spawn a subprocess and collect its output.
 *
 * A spawn failure (e.g. ENOENT for a missing binary) resolves with code 127
 * and the error message as stderr.
 */
export function spawnCommand(
  command: string,
  args: string[],
  options?: RunOptions
): Promise<CommandResult> {
  return new Promise((resolve) => {
    logger.debug({ command, args, cwd: options?.cwd }, 'spawnCommand')

    const proc = spawn(command, args, {
      cwd: options?.cwd,
      env: options?.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''
    let settled = false

    proc.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString()
    })

    proc.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString()
    })

    proc.on('close', (code: number | null) => {
      if (settled) return
      settled = true
      resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code: code ?? 1 })
    })

    proc.on('error', (err: Error) => {
      if (settled) return
      settled = true
      resolve({ stdout: '', stderr: err.message, code: 127 })
    })
  })
}

/** Default runner backed by child_process.spawn */
export const defaultCommandRunner: CommandRunner = {
  run: spawnCommand,
}
