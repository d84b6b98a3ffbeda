import { isChannelFailureExitCode } from "@shipwright/shared"
import type { CommandResult } from "./hosts/command"
import type { Host, HostCommand } from "./hosts/host"

export type FailureKind =
  | "PackageInstallFailure"
  | "ConfigValidationFailure"
  | "TransportFailure"
  | "DependencyInstallFailure"
  | "ServiceRestartFailure"
  | "SourceFetchFailure"
  | "CheckoutFailure"

/**
 * One unit of work: usually a single external command on one host
 */
export interface Step {
  /** Stable identifier, e.g. "nginx-validate" */
  name: string
  /** Progress line, e.g. "Validating nginx configuration" */
  description: string
  /** Failure kind a non-zero exit maps to */
  failure: FailureKind
  /** Optional grouping, used by callers that track phases */
  phase?: string
  /** Host label, for logs */
  host: string
  run: () => Promise<StepRun>
}

/**
 * What a step produced. `failure` overrides the step's declared kind,
 * e.g. when the channel to the host broke rather than the command.
 */
export interface StepRun extends CommandResult {
  failure?: FailureKind
}

export interface StepRecord {
  name: string
  exitCode: number
  stdout: string
  stderr: string
  durationMs: number
}

export interface StepFailure {
  kind: FailureKind
  step: string
  exitCode: number
  stdout: string
  stderr: string
  message: string
}

export type StepOutcome = { ok: true; record: StepRecord } | { ok: false; record: StepRecord; failure: StepFailure }

/**
 * `steps` holds every step that ran, including the failing one
 */
export type PipelineResult = { ok: true; steps: StepRecord[] } | { ok: false; steps: StepRecord[]; failure: StepFailure }

export interface PipelineHooks {
  onStepStart?: (step: Step, index: number, total: number) => void
  onStepEnd?: (step: Step, outcome: StepOutcome) => void
}

/**
 * Kind for a failed command on `host`: a broken ssh channel is always a transport failure
 */
export function classifyFailure(host: Host, declared: FailureKind, exitCode: number): FailureKind {
  return host.remote && isChannelFailureExitCode(exitCode) ? "TransportFailure" : declared
}

/**
 * A step that runs one command
 */
export function commandStep(
  host: Host,
  meta: { name: string; description: string; failure: FailureKind; phase?: string },
  command: HostCommand,
): Step {
  return {
    ...meta,
    host: host.label,
    run: async () => {
      const result = await host.exec(command)
      return result.exitCode === 0 ? result : { ...result, failure: classifyFailure(host, meta.failure, result.exitCode) }
    },
  }
}

/**
 * A step that runs several commands, stopping at the first non-zero exit.
 * Output of all commands that ran is concatenated.
 */
export function chainStep(
  host: Host,
  meta: { name: string; description: string; failure: FailureKind; phase?: string },
  commands: readonly HostCommand[],
): Step {
  return {
    ...meta,
    host: host.label,
    run: async () => {
      let stdout = ""
      let stderr = ""
      for (const command of commands) {
        const result = await host.exec(command)
        stdout += result.stdout
        stderr += result.stderr
        if (result.exitCode !== 0) {
          return {
            exitCode: result.exitCode,
            stdout,
            stderr,
            failure: classifyFailure(host, meta.failure, result.exitCode),
          }
        }
      }
      return { exitCode: 0, stdout, stderr }
    },
  }
}

function failureMessage(step: Step, exitCode: number, stderr: string): string {
  const detail = stderr.trim().split("\n").slice(-3).join("\n")
  const base = `Step ${step.name} failed on ${step.host} with exit code ${exitCode}`
  return detail ? `${base}: ${detail}` : base
}

/**
 * Tag steps with the phase they belong to
 */
export function inPhase(phase: string, steps: readonly Step[]): Step[] {
  return steps.map(step => ({ ...step, phase }))
}

export async function runStep(step: Step): Promise<StepOutcome> {
  const started = Date.now()
  const result = await step.run()
  const record: StepRecord = {
    name: step.name,
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    durationMs: Date.now() - started,
  }

  if (result.exitCode === 0) {
    return { ok: true, record }
  }

  return {
    ok: false,
    record,
    failure: {
      kind: result.failure ?? step.failure,
      step: step.name,
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      message: failureMessage(step, result.exitCode, result.stderr),
    },
  }
}

/**
 * Run steps strictly in order. The first failure halts the pipeline;
 * nothing after it runs and nothing before it is undone.
 */
export async function runSteps(steps: readonly Step[], hooks: PipelineHooks = {}): Promise<PipelineResult> {
  const records: StepRecord[] = []

  for (const [index, step] of steps.entries()) {
    hooks.onStepStart?.(step, index, steps.length)
    const outcome = await runStep(step)
    records.push(outcome.record)
    hooks.onStepEnd?.(step, outcome)

    if (!outcome.ok) {
      return { ok: false, steps: records, failure: outcome.failure }
    }
  }

  return { ok: true, steps: records }
}

export function findStep(result: PipelineResult, name: string): StepRecord | undefined {
  return result.steps.find(record => record.name === name)
}
