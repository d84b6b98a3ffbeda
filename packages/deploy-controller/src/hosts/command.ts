import { spawn } from "node:child_process"
import { extractErrorCode } from "@shipwright/shared"

export interface CommandSpec {
  command: string
  args: readonly string[]
  cwd?: string
  /** Merged over process.env */
  env?: Record<string, string>
  /** Written to stdin, which is then closed */
  input?: string
}

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

export type OutputListener = (stream: "stdout" | "stderr", chunk: string) => void

export type CommandRunner = (spec: CommandSpec, onOutput?: OutputListener) => Promise<CommandResult>

/** Exit status a shell reports for a command it could not find */
export const COMMAND_NOT_FOUND = 127

/**
 * Execute a command and collect its output
 *
 * Never rejects for a failing command: a non-zero exit, a signal, or a
 * failure to spawn all resolve with a non-zero exitCode so callers can turn
 * the result into a tagged step outcome.
 */
export const runCommand: CommandRunner = (spec, onOutput) => {
  return new Promise(resolve => {
    const proc = spawn(spec.command, [...spec.args], {
      cwd: spec.cwd,
      env: spec.env ? { ...process.env, ...spec.env } : process.env,
      stdio: [spec.input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
    })

    let stdout = ""
    let stderr = ""
    let settled = false

    const settle = (result: CommandResult) => {
      if (settled) return
      settled = true
      resolve(result)
    }

    proc.stdout?.on("data", (data: Buffer) => {
      const text = data.toString()
      stdout += text
      onOutput?.("stdout", text)
    })

    proc.stderr?.on("data", (data: Buffer) => {
      const text = data.toString()
      stderr += text
      onOutput?.("stderr", text)
    })

    proc.on("close", (code, signal) => {
      if (code === 0) {
        settle({ exitCode: 0, stdout, stderr })
        return
      }
      const suffix = signal ? `\nTerminated by ${signal}` : ""
      settle({ exitCode: code ?? 1, stdout, stderr: `${stderr}${suffix}` })
    })

    proc.on("error", err => {
      const exitCode = extractErrorCode(err) === "ENOENT" ? COMMAND_NOT_FOUND : 1
      settle({ exitCode, stdout, stderr: `Failed to spawn ${spec.command}: ${err.message}` })
    })

    if (spec.input !== undefined && proc.stdin) {
      // EPIPE when the child exits without reading; the exit code already says what happened
      proc.stdin.on("error", () => undefined)
      proc.stdin.end(spec.input)
    }
  })
}

const SAFE_ARG = /^[\w@%+=:,./-]+$/

/**
 * Quote one argument for a POSIX shell
 */
export function shellQuote(arg: string): string {
  if (arg.length > 0 && SAFE_ARG.test(arg)) {
    return arg
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`
}

export function formatArgv(argv: readonly string[]): string {
  return argv.map(shellQuote).join(" ")
}
