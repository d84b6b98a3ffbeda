import type { CommandResult } from "./command"

/**
 * One command to run on a host.
 * argv is never interpreted by a local shell; RemoteHost quotes it for the remote one.
 */
export interface HostCommand {
  argv: readonly string[]
  /** Working directory on the host */
  cwd?: string
  /** Run with root privileges */
  sudo?: boolean
  /** Written to the command's stdin */
  input?: string
  env?: Record<string, string>
}

/**
 * Explicit handle for the machine a step runs on.
 * Every operation receives one instead of reaching for global state.
 */
export interface Host {
  /** Human-readable name for logs, e.g. "local" or "deploy@203.0.113.10" */
  readonly label: string
  /** True when commands cross a network channel that can itself fail */
  readonly remote: boolean
  exec(command: HostCommand): Promise<CommandResult>
}
