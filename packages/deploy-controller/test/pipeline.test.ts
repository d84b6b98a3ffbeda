import { describe, expect, it, vi } from "vitest"
import { chainStep, classifyFailure, commandStep, inPhase, runSteps } from "../src/pipeline"
import { FakeHost } from "./fake-host"

describe("runSteps", () => {
  it("runs every step in order when all succeed", async () => {
    const host = new FakeHost()
    const steps = [
      commandStep(host, { name: "one", description: "One", failure: "PackageInstallFailure" }, { argv: ["echo", "1"] }),
      commandStep(host, { name: "two", description: "Two", failure: "PackageInstallFailure" }, { argv: ["echo", "2"] }),
    ]

    const result = await runSteps(steps)

    expect(result.ok).toBe(true)
    expect(result.steps.map(s => s.name)).toEqual(["one", "two"])
    expect(host.lines()).toEqual(["echo 1", "echo 2"])
  })

  it("halts at the first failure and never runs later steps", async () => {
    const host = new FakeHost().on("false", { exitCode: 1, stderr: "boom\n" })
    const steps = [
      commandStep(host, { name: "ok", description: "Ok", failure: "PackageInstallFailure" }, { argv: ["true"] }),
      commandStep(host, { name: "bad", description: "Bad", failure: "ConfigValidationFailure" }, { argv: ["false"] }),
      commandStep(host, { name: "never", description: "Never", failure: "ServiceRestartFailure" }, { argv: ["never"] }),
    ]

    const result = await runSteps(steps)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.failure).toMatchObject({ kind: "ConfigValidationFailure", step: "bad", exitCode: 1, stderr: "boom\n" })
    expect(result.steps.map(s => s.name)).toEqual(["ok", "bad"])
    expect(host.lines()).toEqual(["true", "false"])
  })

  it("keeps the last three stderr lines in the failure message", async () => {
    const host = new FakeHost().on("pip", { exitCode: 2, stderr: "a\nb\nc\nd\n" })
    const result = await runSteps([
      commandStep(host, { name: "pip-install", description: "Pip", failure: "DependencyInstallFailure" }, { argv: ["pip"] }),
    ])

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.failure.message).toBe("Step pip-install failed on fake with exit code 2: b\nc\nd")
  })

  it("reports start and end of each step to the hooks", async () => {
    const host = new FakeHost()
    const onStepStart = vi.fn()
    const onStepEnd = vi.fn()

    await runSteps(
      [commandStep(host, { name: "one", description: "One", failure: "PackageInstallFailure" }, { argv: ["true"] })],
      { onStepStart, onStepEnd },
    )

    expect(onStepStart).toHaveBeenCalledWith(expect.objectContaining({ name: "one" }), 0, 1)
    expect(onStepEnd).toHaveBeenCalledWith(expect.objectContaining({ name: "one" }), expect.objectContaining({ ok: true }))
  })
})

describe("chainStep", () => {
  it("stops at the first failing command", async () => {
    const host = new FakeHost().on("chown", { exitCode: 1, stderr: "chown: invalid user\n" })
    const step = chainStep(host, { name: "perms", description: "Perms", failure: "TransportFailure" }, [
      { argv: ["chown", "-R", "deploy:deploy", "/srv/app"] },
      { argv: ["chmod", "-R", "755", "/srv/app"] },
    ])

    const run = await step.run()

    expect(run.exitCode).toBe(1)
    expect(run.failure).toBe("TransportFailure")
    expect(host.lines()).toEqual(["chown -R deploy:deploy /srv/app"])
  })
})

describe("classifyFailure", () => {
  it("turns an ssh channel failure on a remote host into a transport failure", () => {
    expect(classifyFailure(new FakeHost("deploy@203.0.113.10", true), "SourceFetchFailure", 255)).toBe("TransportFailure")
  })

  it("keeps the declared kind for local hosts and ordinary exit codes", () => {
    expect(classifyFailure(new FakeHost("local", false), "SourceFetchFailure", 255)).toBe("SourceFetchFailure")
    expect(classifyFailure(new FakeHost("deploy@203.0.113.10", true), "SourceFetchFailure", 1)).toBe("SourceFetchFailure")
  })
})

describe("inPhase", () => {
  it("tags each step with the phase", () => {
    const host = new FakeHost()
    const [step] = inPhase("Fetching", [
      commandStep(host, { name: "git-pull", description: "Pull", failure: "SourceFetchFailure" }, { argv: ["git"] }),
    ])
    expect(step?.phase).toBe("Fetching")
  })
})
