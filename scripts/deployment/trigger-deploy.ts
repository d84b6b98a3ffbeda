#!/usr/bin/env tsx
/**
 * CI entry point: deploy the push that started this workflow run
 *
 * Usage (GitHub Actions): npx tsx scripts/deployment/trigger-deploy.ts
 * Env: GITHUB_EVENT_PATH or GITHUB_REF + GITHUB_SHA, DEPLOY_HOST, DEPLOY_USER,
 * DEPLOY_PASSWORD, DEPLOY_SSH_PORT, DEPLOY_DIR, SKIP_TRANSPORT_TOOLS_INSTALL
 */

import { basename } from "node:path"
import {
  deployConfigFromEnv,
  evaluatePush,
  hostRecordFromEnv,
  LocalHost,
  loggerFromEnv,
  PipelineTrigger,
  RemoteHost,
  readActionsPushEvent,
  reportOutcome,
  runEntryPoint,
} from "@shipwright/deploy-controller"
import { isFlagSet } from "@shipwright/env"
import { loadEnvFile, loadHostEnv, loadRuntimeEnv } from "@shipwright/env/server"
import { EXIT_CODES } from "@shipwright/shared"

async function main(): Promise<number> {
  loadEnvFile()
  const env = loadRuntimeEnv()
  const logger = loggerFromEnv(env, "trigger")
  const config = deployConfigFromEnv(env)

  const decision = evaluatePush(readActionsPushEvent(env), config.branch)
  if (!decision.deploy) {
    logger.info(decision.reason)
    return EXIT_CODES.SUCCESS
  }

  const sourceDir = env.DEPLOY_SOURCE_DIR ?? process.cwd()
  const record = hostRecordFromEnv(loadHostEnv(), {
    deployDir: env.DEPLOY_DIR,
    repository: decision.release.repository ?? basename(sourceDir),
  })

  const trigger = new PipelineTrigger({
    local: new LocalHost(),
    remote: new RemoteHost(record),
    record,
    config,
    sourceDir,
    installTools: !isFlagSet(env.SKIP_TRANSPORT_TOOLS_INSTALL),
    logger,
  })
  const result = await trigger.run(decision.release)
  if (!result.ok) {
    logger.error(`Deployment failed at the ${result.stage} stage`)
  }
  return reportOutcome(result, logger)
}

process.exit(await runEntryPoint("trigger", main))
