import type { HostRecord } from "../types"
import { type CommandResult, type CommandRunner, formatArgv, type OutputListener, runCommand, shellQuote } from "./command"
import type { Host, HostCommand } from "./host"

export interface RemoteHostOptions {
  runner?: CommandRunner
  onOutput?: OutputListener
}

/**
 * ssh options shared by every channel to the host.
 * Host keys are accepted on first sight; the password is the only credential.
 */
export function sshOptions(record: Pick<HostRecord, "port">): string[] {
  return ["-o", "StrictHostKeyChecking=no", "-p", String(record.port)]
}

/** user@address */
export function sshDestination(record: Pick<HostRecord, "user" | "address">): string {
  return `${record.user}@${record.address}`
}

/** Password channel for sshpass -e; keeps the secret out of the process list */
export function sshpassEnv(record: Pick<HostRecord, "password">): Record<string, string> {
  return { SSHPASS: record.password }
}

/**
 * Render a host command as the single string ssh hands to the remote shell
 */
export function toRemoteCommandLine(command: HostCommand): string {
  const parts: string[] = []
  if (command.sudo) {
    // -n: fail instead of waiting for a password prompt nobody can answer
    parts.push("sudo", "-n")
  }
  if (command.env && Object.keys(command.env).length > 0) {
    parts.push("env", ...Object.entries(command.env).map(([key, value]) => shellQuote(`${key}=${value}`)))
  }
  parts.push(formatArgv(command.argv))

  const line = parts.join(" ")
  return command.cwd ? `cd ${shellQuote(command.cwd)} && ${line}` : line
}

/**
 * A target host reached over sshpass + ssh
 */
export class RemoteHost implements Host {
  readonly label: string
  readonly remote = true
  private readonly runner: CommandRunner
  private readonly onOutput?: OutputListener

  constructor(
    private readonly record: HostRecord,
    options: RemoteHostOptions = {},
  ) {
    this.label = sshDestination(record)
    this.runner = options.runner ?? runCommand
    this.onOutput = options.onOutput
  }

  exec(command: HostCommand): Promise<CommandResult> {
    return this.runner(
      {
        command: "sshpass",
        args: ["-e", "ssh", ...sshOptions(this.record), sshDestination(this.record), toRemoteCommandLine(command)],
        env: sshpassEnv(this.record),
        input: command.input,
      },
      this.onOutput,
    )
  }
}
