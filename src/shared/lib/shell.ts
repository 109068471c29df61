import { execFile } from 'node:child_process'

export type CommandOutput = {
  stdout: string
  stderr: string
  exitCode: number
}

export interface CommandRunner {
  run(command: string): Promise<CommandOutput>
}

export type PowerShellRunnerOptions = {
  executable?: string
  maxBuffer?: number
}

export const DEFAULT_SHELL = 'powershell.exe'

export const createPowerShellRunner = (options: PowerShellRunnerOptions = {}): CommandRunner => {
  const executable = options.executable ?? DEFAULT_SHELL
  const maxBuffer = options.maxBuffer ?? 8 * 1024 * 1024

  return {
    run: (command) =>
      new Promise<CommandOutput>((resolve) => {
        execFile(
          executable,
          ['-NoProfile', '-NonInteractive', '-Command', command],
          { windowsHide: true, maxBuffer, encoding: 'utf8' },
          (error, stdout, stderr) => {
            if (error && typeof error.code !== 'number') {
              // Spawn failures (missing executable, buffer overflow) surface as stderr.
              resolve({ stdout, stderr: stderr || error.message, exitCode: -1 })
              return
            }
            resolve({ stdout, stderr, exitCode: error && typeof error.code === 'number' ? error.code : 0 })
          },
        )
      }),
  }
}

// PowerShell also closes single-quoted strings on the typographic quotes U+2018..U+201B.
const SINGLE_QUOTES = /['\u2018\u2019\u201A\u201B]/g

// Single-quoted PowerShell literal; every embedded quote character is doubled.
export const quotePowerShell = (value: string) => `'${value.replace(SINGLE_QUOTES, '$&$&')}'`
