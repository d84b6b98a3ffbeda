import type { Logger } from "@shipwright/logger"
import type { DeployConfig } from "@shipwright/shared"
import { ensureDirectoryStep, resetOwnershipStep } from "./executors/filesystem"
import { buildRsyncCommand, contentChanges, type ItemizedChange, parseItemizedChanges } from "./executors/rsync"
import type { Host } from "./hosts/host"
import { commandStep, findStep, type PipelineResult, runSteps, type Step } from "./pipeline"
import { progressHooks } from "./progress"
import type { HostRecord } from "./types"

export type TransportResult = PipelineResult & {
  /** Every itemized line rsync reported, attribute-only ones included */
  changes: ItemizedChange[]
  /** Paths whose content was created, sent or deleted */
  transferred: string[]
}

export interface ArtifactTransporterOptions {
  /** Where rsync runs; the control-plane machine */
  local: Host
  /** The target, for mkdir and the ownership reset */
  remote: Host
  record: HostRecord
  config: Pick<DeployConfig, "rsync" | "fileMode">
  logger: Logger
}

/**
 * Mirror a local source tree into the host's target directory, then make the
 * deploy user own it with uniform permissions.
 *
 * rsync only sends what differs, so a second run over an unchanged tree
 * reports no transferred paths. Remote files missing from the source are
 * kept unless `rsync.delete` is set.
 */
export class ArtifactTransporter {
  private readonly logger: Logger

  constructor(private readonly options: ArtifactTransporterOptions) {
    this.logger = options.logger.child({ component: "transporter", host: options.remote.label })
  }

  steps(sourceDir: string): Step[] {
    const { local, remote, record, config } = this.options
    return [
      ensureDirectoryStep(remote, record.targetDir),
      commandStep(
        local,
        { name: "rsync", description: `Syncing ${sourceDir} to ${remote.label}:${record.targetDir}`, failure: "TransportFailure" },
        buildRsyncCommand(record, sourceDir, config.rsync),
      ),
      resetOwnershipStep(remote, { dir: record.targetDir, user: record.user, mode: config.fileMode }),
    ]
  }

  async transport(sourceDir: string): Promise<TransportResult> {
    const result = await runSteps(this.steps(sourceDir), progressHooks(this.logger))
    const rsync = findStep(result, "rsync")
    const changes = rsync ? parseItemizedChanges(rsync.stdout) : []
    const transferred = contentChanges(changes).map(change => change.path)

    if (result.ok) {
      this.logger.info(`✓ Transported ${transferred.length} changed path(s) to ${this.options.record.targetDir}`)
    }
    return { ...result, changes, transferred }
  }
}
