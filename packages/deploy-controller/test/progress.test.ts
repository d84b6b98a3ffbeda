import { createLogger, type LogEntry } from "@shipwright/logger"
import { describe, expect, it } from "vitest"
import { commandStep, inPhase, runSteps } from "../src/pipeline"
import { combineHooks, progressHooks } from "../src/progress"
import { FakeHost } from "./fake-host"

function capture(): { entries: LogEntry[]; logger: ReturnType<typeof createLogger> } {
  const entries: LogEntry[] = []
  return { entries, logger: createLogger({ sink: entry => entries.push(entry) }) }
}

describe("progressHooks", () => {
  it("logs a phase line once per phase and a step line per step", async () => {
    const host = new FakeHost()
    const { entries, logger } = capture()
    const steps = [
      ...inPhase("packages", [
        commandStep(host, { name: "apt-update", description: "Updating package lists", failure: "PackageInstallFailure" }, { argv: ["apt-get", "update"] }),
        commandStep(host, { name: "apt-upgrade", description: "Upgrading installed packages", failure: "PackageInstallFailure" }, { argv: ["apt-get", "upgrade"] }),
      ]),
      ...inPhase("nginx", [
        commandStep(host, { name: "nginx-validate", description: "Validating nginx configuration", failure: "ConfigValidationFailure" }, { argv: ["nginx", "-t"] }),
      ]),
    ]

    await runSteps(steps, progressHooks(logger, ["packages", "nginx"]))

    expect(entries.map(e => e.message)).toEqual([
      "[Phase 1/2] packages...",
      "[Step 1/3] Updating package lists...",
      "[Step 2/3] Upgrading installed packages...",
      "[Phase 2/2] nginx...",
      "[Step 3/3] Validating nginx configuration...",
    ])
  })

  it("logs the failing step at error level with its stderr", async () => {
    const host = new FakeHost().on("nginx -t", { exitCode: 1, stderr: "syntax error\n" })
    const { entries, logger } = capture()

    await runSteps(
      [commandStep(host, { name: "nginx-validate", description: "Validating nginx configuration", failure: "ConfigValidationFailure" }, { argv: ["nginx", "-t"] })],
      progressHooks(logger),
    )

    const failed = entries.find(e => e.level === "error")
    expect(failed?.message).toBe("✗ Validating nginx configuration failed")
    expect(failed?.error).toBe("Step nginx-validate failed on fake with exit code 1: syntax error")
    expect(failed?.context).toEqual({ step: "nginx-validate", host: "fake", kind: "ConfigValidationFailure" })
  })
})

describe("combineHooks", () => {
  it("calls every hook set in order", async () => {
    const host = new FakeHost()
    const calls: string[] = []

    await runSteps(
      [commandStep(host, { name: "one", description: "One", failure: "PackageInstallFailure" }, { argv: ["true"] })],
      combineHooks(
        { onStepStart: step => calls.push(`a:start:${step.name}`), onStepEnd: step => calls.push(`a:end:${step.name}`) },
        { onStepStart: step => calls.push(`b:start:${step.name}`) },
      ),
    )

    expect(calls).toEqual(["a:start:one", "b:start:one", "a:end:one"])
  })
})
