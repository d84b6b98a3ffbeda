import type { CommandResult } from "../src/hosts/command"
import type { Host, HostCommand } from "../src/hosts/host"

interface Rule {
  match: string | RegExp
  result: Partial<CommandResult>
}

/**
 * In-process host: records every command and answers from scripted rules.
 * Unmatched commands succeed with empty output. Later rules win.
 */
export class FakeHost implements Host {
  readonly calls: HostCommand[] = []
  private readonly rules: Rule[] = []

  constructor(
    readonly label = "fake",
    readonly remote = false,
  ) {}

  /** Answer commands whose argv, joined by spaces, starts with `match` (or matches the regex) */
  on(match: string | RegExp, result: Partial<CommandResult>): this {
    this.rules.push({ match, result })
    return this
  }

  async exec(command: HostCommand): Promise<CommandResult> {
    this.calls.push(command)
    const line = command.argv.join(" ")
    const rule = [...this.rules]
      .reverse()
      .find(r => (typeof r.match === "string" ? line.startsWith(r.match) : r.match.test(line)))
    return { exitCode: 0, stdout: "", stderr: "", ...rule?.result }
  }

  lines(): string[] {
    return this.calls.map(call => call.argv.join(" "))
  }
}
