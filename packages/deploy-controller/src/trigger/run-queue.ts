import type { Logger } from "@shipwright/logger"
import type { Release } from "../types"
import type { TriggerResult } from "./pipeline-trigger"

export type DeployRunner = (release: Release) => Promise<TriggerResult>

export type EnqueueOutcome = "started" | "queued" | "replaced"

export interface LastRun {
  revision: string
  ok: boolean
  /** Failing stage, or "crashed" when the run threw */
  stage?: string
  message?: string
  finishedAt: string
}

export interface QueueState {
  running?: Release
  pending?: Release
  completed: number
  lastRun?: LastRun
}

/**
 * Runs one deployment at a time. A push that arrives during a run waits;
 * a later push replaces it, so only the newest pending release deploys.
 */
export class DeployQueue {
  private running: Release | undefined
  private pending: Release | undefined
  private completed = 0
  private lastRun: LastRun | undefined
  private drained: Promise<void> = Promise.resolve()

  constructor(
    private readonly runner: DeployRunner,
    private readonly logger: Logger,
  ) {}

  enqueue(release: Release): EnqueueOutcome {
    if (!this.running) {
      this.running = release
      this.drained = this.drain(release)
      return "started"
    }

    const outcome = this.pending ? "replaced" : "queued"
    if (this.pending) {
      this.logger.info(`Release ${this.pending.revision.slice(0, 12)} superseded by ${release.revision.slice(0, 12)}`)
    }
    this.pending = release
    return outcome
  }

  /** Resolves once nothing is running or pending */
  idle(): Promise<void> {
    return this.drained
  }

  state(): QueueState {
    return {
      running: this.running,
      pending: this.pending,
      completed: this.completed,
      lastRun: this.lastRun,
    }
  }

  private async drain(first: Release): Promise<void> {
    let next: Release | undefined = first
    while (next) {
      this.running = next
      await this.runOne(next)
      next = this.pending
      this.pending = undefined
    }
    this.running = undefined
  }

  private async runOne(release: Release): Promise<void> {
    try {
      const result = await this.runner(release)
      this.lastRun = result.ok
        ? { revision: release.revision, ok: true, finishedAt: new Date().toISOString() }
        : {
            revision: release.revision,
            ok: false,
            stage: result.stage,
            message: result.failure.message,
            finishedAt: new Date().toISOString(),
          }
    } catch (error) {
      this.logger.error(`Deployment of ${release.revision.slice(0, 12)} crashed`, error)
      this.lastRun = {
        revision: release.revision,
        ok: false,
        stage: "crashed",
        message: error instanceof Error ? error.message : String(error),
        finishedAt: new Date().toISOString(),
      }
    } finally {
      this.completed++
    }
  }
}
