/**
 * Deploy Controller - provisioning, transport and update of a single service host
 *
 * Every action is an external system tool (apt, nginx, systemctl, git, pip,
 * ssh, rsync) run through a Host handle. Sequences are fail-fast step
 * pipelines whose failures come back as tagged values, never rolled back.
 *
 * @packageDocumentation
 */

export { HostProvisioner, type InstalledVersions, PROVISION_PHASES, type ProvisionResult } from "./provisioner"
export { ArtifactTransporter, type TransportResult } from "./transporter"
export {
  RemoteUpdater,
  UPDATE_PHASES,
  type UpdateOptions,
  type UpdatePhase,
  type UpdateResult,
  type UpdaterState,
} from "./updater"
export { acquireDeployLock, type DeployLock } from "./executors/lock"

// Trigger
export { PipelineTrigger, type TriggerResult, type TriggerStage } from "./trigger/pipeline-trigger"
export { DeployQueue, type DeployRunner, type EnqueueOutcome, type QueueState } from "./trigger/run-queue"
export {
  branchFromRef,
  decodePushEvent,
  evaluatePush,
  type PushDecision,
  type PushEvent,
  parsePushEvent,
  pushEventSchema,
  readActionsPushEvent,
} from "./trigger/push-event"

// Hosts
export type { Host, HostCommand } from "./hosts/host"
export { LocalHost } from "./hosts/local"
export { RemoteHost, toRemoteCommandLine } from "./hosts/remote"
export { type CommandResult, type CommandRunner, runCommand } from "./hosts/command"

// Pipeline
export {
  type FailureKind,
  type PipelineResult,
  runSteps,
  type Step,
  type StepFailure,
  type StepRecord,
} from "./pipeline"
export { DeploymentError, type DeploymentErrorCode, exitCodeFor } from "./errors"
export type { HostRecord, Release } from "./types"

// Entry point wiring
export { deployConfigFromEnv, hostRecordFromEnv, loggerFromEnv, reportOutcome, runEntryPoint } from "./runtime"

// Pure helpers
export { renderReverseProxyConfig } from "./executors/nginx"
export { parseItemizedChanges } from "./executors/rsync"
