import type { Logger } from "@shipwright/logger"
import { type DeployConfig, TRANSPORT_TOOLS } from "@shipwright/shared"
import { aptInstallStep } from "../executors/apt"
import { ensureDirectoryStep } from "../executors/filesystem"
import { checkoutRevisionStep, sameRevision } from "../executors/git"
import { acquireDeployLock } from "../executors/lock"
import type { Host } from "../hosts/host"
import { runSteps, type StepFailure, type Step } from "../pipeline"
import { progressHooks } from "../progress"
import { ArtifactTransporter, type TransportResult } from "../transporter"
import type { HostRecord, Release } from "../types"
import { RemoteUpdater, type UpdateResult } from "../updater"

export type TriggerStage = "checkout" | "tools" | "transport" | "update"

export type TriggerResult =
  | { ok: true; release: Release; transport: TransportResult; update: UpdateResult }
  | {
      ok: false
      stage: TriggerStage
      release: Release
      failure: StepFailure
      transport?: TransportResult
      update?: UpdateResult
    }

export interface PipelineTriggerOptions {
  /** The CI runner or webhook machine, holding the working tree */
  local: Host
  remote: Host
  record: HostRecord
  config: DeployConfig
  /** Local working tree that is checked out and shipped */
  sourceDir: string
  /** Install sshpass and rsync on the local machine first */
  installTools: boolean
  logger: Logger
}

/**
 * Turns a push into a deployment: check out the pushed revision locally,
 * make sure the transport tools exist, ship the tree, update the host.
 *
 * No retries. The first failing stage ends the run and is named in the result.
 * Throws DeploymentError "DEPLOY_LOCKED" before anything is shipped when another
 * run holds the host lock.
 */
export class PipelineTrigger {
  constructor(private readonly options: PipelineTriggerOptions) {}

  async run(release: Release): Promise<TriggerResult> {
    const { local, remote, record, config, sourceDir } = this.options
    const logger = this.options.logger.child({ component: "trigger", revision: release.revision.slice(0, 12) })

    logger.info(
      `Push received: ${release.commitCount ?? 0} commit(s) to ${release.branch} by ${release.pusher ?? "unknown"}`,
    )

    const prepare: Step[] = [
      checkoutRevisionStep(local, {
        cwd: sourceDir,
        revision: release.revision,
        remote: config.remote,
        branch: release.branch,
      }),
    ]
    if (this.options.installTools) {
      prepare.push(
        aptInstallStep(local, {
          name: "transport-tools",
          description: "Installing transport tools",
          packages: TRANSPORT_TOOLS,
        }),
      )
    }

    const prepared = await runSteps(prepare, progressHooks(logger))
    if (!prepared.ok) {
      const stage = prepared.failure.step === "git-checkout" ? "checkout" : "tools"
      return { ok: false, stage, release, failure: prepared.failure }
    }

    // The lock lives inside the target, so the directory has to exist first
    const target = await runSteps([ensureDirectoryStep(remote, record.targetDir)], progressHooks(logger))
    if (!target.ok) {
      return { ok: false, stage: "transport", release, failure: target.failure }
    }

    // Held across transport and update so a second run cannot ship files mid-update
    const lock = await acquireDeployLock(remote, record.targetDir, logger)
    try {
      const transport = await new ArtifactTransporter({ local, remote, record, config, logger }).transport(sourceDir)
      if (!transport.ok) {
        return { ok: false, stage: "transport", release, failure: transport.failure, transport }
      }

      const update = await new RemoteUpdater(remote, { deployDir: record.targetDir, config, logger }).update({ lock })
      if (!update.ok) {
        return { ok: false, stage: "update", release, failure: update.failure, transport, update }
      }

      if (update.revision && !sameRevision(update.revision, release.revision)) {
        logger.warn(
          `Host pulled ${update.revision}, which is not the pushed ${release.revision}; a newer push reached ${config.branch}`,
        )
      }
      logger.info(`✓ Deployment of ${release.revision.slice(0, 12)} complete`)

      return { ok: true, release, transport, update }
    } finally {
      await lock.release()
    }
  }
}
