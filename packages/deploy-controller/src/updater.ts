import type { Logger } from "@shipwright/logger"
import { type DeployConfig, getPythonBinary } from "@shipwright/shared"
import { gitPullStep, headRevisionStep } from "./executors/git"
import { acquireDeployLock, type DeployLock } from "./executors/lock"
import { ensureVirtualenvStep, pipInstallStep } from "./executors/python"
import { daemonReloadStep, parseActiveState, restartUnitStep, unitStatusStep } from "./executors/systemd"
import type { Host } from "./hosts/host"
import { findStep, inPhase, type PipelineHooks, type PipelineResult, runSteps, type Step } from "./pipeline"
import { combineHooks, progressHooks } from "./progress"

export const UPDATE_PHASES = ["Fetching", "Installing", "Restarting", "Verifying"] as const

export type UpdatePhase = (typeof UPDATE_PHASES)[number]

export type UpdaterState = UpdatePhase | "Done" | "Failed"

export type UpdateResult = PipelineResult & {
  /** States entered, in order, ending in Done or Failed */
  states: UpdaterState[]
  finalState: "Done" | "Failed"
  /** HEAD after the pull */
  revision?: string
  /** Full `systemctl status` output, when the check ran */
  serviceStatus?: string
  /** e.g. "active (running)" */
  activeState?: string
}

export interface UpdateOptions {
  /**
   * Lock the caller already holds for the host, e.g. across transport and update.
   * The caller releases it; without one the updater takes and releases its own.
   */
  lock?: DeployLock
}

export interface RemoteUpdaterOptions {
  /** Working tree of the deployed service on the host */
  deployDir: string
  config: DeployConfig
  logger: Logger
}

function isUpdatePhase(value: string | undefined): value is UpdatePhase {
  return UPDATE_PHASES.some(phase => phase === value)
}

/**
 * Forward-only state tracking driven by the phase of each step that starts
 */
function stateTracker(states: UpdaterState[]): PipelineHooks {
  return {
    onStepStart: step => {
      const phase = step.phase
      if (!isUpdatePhase(phase)) return
      const last = states.at(-1)
      if (last === phase) return
      if (last !== undefined && isUpdatePhase(last) && UPDATE_PHASES.indexOf(phase) < UPDATE_PHASES.indexOf(last)) {
        throw new Error(`Illegal updater transition ${last} -> ${phase}`)
      }
      states.push(phase)
    },
  }
}

/**
 * Brings the deployed working tree on a host up to the branch head and
 * restarts the service: Fetching -> Installing -> Restarting -> Verifying -> Done.
 *
 * Any failing step moves the run to Failed and nothing after it runs, so a
 * failed dependency install never restarts the service. The host lock is
 * held for the whole run, taken here unless the caller passes one in.
 */
export class RemoteUpdater {
  private readonly logger: Logger

  constructor(
    private readonly host: Host,
    private readonly options: RemoteUpdaterOptions,
  ) {
    this.logger = options.logger.child({ component: "updater", host: host.label })
  }

  steps(): Step[] {
    const { deployDir: cwd, config } = this.options
    const host = this.host

    return [
      ...inPhase("Fetching", [
        gitPullStep(host, { cwd, remote: config.remote, branch: config.branch }),
        headRevisionStep(host, cwd, "SourceFetchFailure"),
      ]),
      ...inPhase("Installing", [
        ensureVirtualenvStep(host, { cwd, venvDir: config.venvDir, pythonBinary: getPythonBinary(config) }),
        pipInstallStep(host, { cwd, venvDir: config.venvDir, requirementsFile: config.requirementsFile }),
      ]),
      ...inPhase("Restarting", [daemonReloadStep(host), restartUnitStep(host, config.serviceName)]),
      ...inPhase("Verifying", [unitStatusStep(host, config.serviceName)]),
    ]
  }

  /**
   * Throws DeploymentError "DEPLOY_LOCKED" when another run holds the host lock.
   * Step failures are returned, not thrown.
   */
  async update(options: UpdateOptions = {}): Promise<UpdateResult> {
    const owned = options.lock ? undefined : await acquireDeployLock(this.host, this.options.deployDir, this.logger)
    this.logger.info(`=== Updating ${this.options.deployDir} on ${this.host.label} ===`)

    try {
      const states: UpdaterState[] = []
      const result = await runSteps(
        this.steps(),
        combineHooks(stateTracker(states), progressHooks(this.logger, UPDATE_PHASES)),
      )
      const finalState = result.ok ? "Done" : "Failed"
      states.push(finalState)

      const revision = findStep(result, "git-rev-parse")?.stdout.trim() || undefined
      const status = findStep(result, "systemd-status")
      const serviceStatus = status ? `${status.stdout}${status.stderr}` : undefined
      const activeState = serviceStatus ? parseActiveState(serviceStatus) : undefined

      if (serviceStatus) {
        this.logger.info(serviceStatus.trimEnd(), { phase: "Verifying" })
      }
      if (result.ok) {
        this.logger.info(`✓ Deployed ${revision ?? "HEAD"} (${activeState ?? "status unknown"})`, { revision })
      }

      return { ...result, states, finalState, revision, serviceStatus, activeState }
    } finally {
      await owned?.release()
    }
  }
}
