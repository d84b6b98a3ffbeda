import { type CommandResult, type CommandRunner, type OutputListener, runCommand } from "./command"
import type { Host, HostCommand } from "./host"

export interface LocalHostOptions {
  /**
   * Prefix privileged commands with sudo.
   * Defaults to true unless the process already runs as root.
   */
  useSudo?: boolean
  runner?: CommandRunner
  onOutput?: OutputListener
}

/**
 * The machine this process runs on
 */
export class LocalHost implements Host {
  readonly label = "local"
  readonly remote = false
  private readonly useSudo: boolean
  private readonly runner: CommandRunner
  private readonly onOutput?: OutputListener

  constructor(options: LocalHostOptions = {}) {
    this.useSudo = options.useSudo ?? process.getuid?.() !== 0
    this.runner = options.runner ?? runCommand
    this.onOutput = options.onOutput
  }

  exec(command: HostCommand): Promise<CommandResult> {
    const [program, ...args] = command.sudo && this.useSudo ? ["sudo", ...command.argv] : command.argv
    if (!program) {
      return Promise.resolve({ exitCode: 1, stdout: "", stderr: "Empty command" })
    }

    return this.runner(
      {
        command: program,
        args,
        cwd: command.cwd,
        env: command.env,
        input: command.input,
      },
      this.onOutput,
    )
  }
}
