/**
 * Wiring shared by the entry points: environment -> logger, deploy config,
 * host record. Everything here reads already-validated env objects, so the
 * scripts stay a few lines each.
 */

import type { HostEnv, RuntimeEnv } from "@shipwright/env/server"
import { createLogger, type Logger, sinkForFormat } from "@shipwright/logger"
import {
  type DeployConfig,
  EXIT_CODES,
  formatUncaughtError,
  getDefaultDeployDir,
  loadDeployConfig,
} from "@shipwright/shared"
import { DeploymentError, exitCodeFor } from "./errors"
import type { StepFailure } from "./pipeline"
import type { HostRecord } from "./types"

export function loggerFromEnv(env: Pick<RuntimeEnv, "LOG_FORMAT" | "LOG_LEVEL">, component: string): Logger {
  return createLogger({
    sink: sinkForFormat(env.LOG_FORMAT),
    level: env.LOG_LEVEL,
    context: { component },
  })
}

/**
 * deploy-config.json merged over the defaults, with DEPLOY_BRANCH taking precedence.
 * Throws DeploymentError "INVALID_CONFIG" for an unreadable or invalid file.
 */
export function deployConfigFromEnv(env: Pick<RuntimeEnv, "DEPLOY_CONFIG_PATH" | "DEPLOY_BRANCH">): DeployConfig {
  let config: DeployConfig
  try {
    config = loadDeployConfig(env.DEPLOY_CONFIG_PATH)
  } catch (error) {
    throw DeploymentError.invalidConfig(error instanceof Error ? error.message : String(error))
  }
  return env.DEPLOY_BRANCH ? { ...config, branch: env.DEPLOY_BRANCH } : config
}

/**
 * Host record from DEPLOY_* variables. Without a deploy directory the target
 * is /home/<user>/<repository name>, so the repository must be known.
 */
export function hostRecordFromEnv(env: HostEnv, target: { deployDir?: string; repository?: string }): HostRecord {
  const { repository } = target
  let targetDir = target.deployDir
  if (!targetDir) {
    if (!repository) {
      throw DeploymentError.configurationMissing("DEPLOY_DIR is not set and the repository name is unknown")
    }
    targetDir = getDefaultDeployDir(env.DEPLOY_USER, repository)
  }

  return {
    address: env.DEPLOY_HOST,
    user: env.DEPLOY_USER,
    password: env.DEPLOY_PASSWORD,
    port: env.DEPLOY_SSH_PORT,
    targetDir,
  }
}

/**
 * Exit code for a finished run. A failure also prints the failing command's full stderr.
 */
export function reportOutcome(outcome: { ok: true } | { ok: false; failure: StepFailure }, logger: Logger): number {
  if (outcome.ok) {
    return EXIT_CODES.SUCCESS
  }
  const error = DeploymentError.fromFailure(outcome.failure)
  const stderr = outcome.failure.stderr.trimEnd()
  logger.error(`${error.code}: step ${outcome.failure.step} exited with ${outcome.failure.exitCode}`, stderr || undefined)
  return error.exitCode
}

/**
 * Run an entry point's main and turn whatever it throws into a logged
 * message and an exit code. Never rejects.
 */
export async function runEntryPoint(component: string, main: () => Promise<number>): Promise<number> {
  try {
    return await main()
  } catch (error) {
    const logger = createLogger({ context: { component } })
    if (error instanceof DeploymentError) {
      logger.fatal(`${error.code}`, error.message)
    } else {
      logger.fatal("Unexpected error", formatUncaughtError(error))
    }
    return exitCodeFor(error)
  }
}
