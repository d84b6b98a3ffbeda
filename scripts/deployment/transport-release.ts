#!/usr/bin/env tsx
/**
 * Ship the working tree to the target host
 *
 * Usage: npm run deploy:transport
 * Env: DEPLOY_HOST, DEPLOY_USER, DEPLOY_PASSWORD, DEPLOY_SSH_PORT, DEPLOY_DIR, DEPLOY_SOURCE_DIR
 */

import { basename } from "node:path"
import {
  ArtifactTransporter,
  deployConfigFromEnv,
  hostRecordFromEnv,
  LocalHost,
  loggerFromEnv,
  RemoteHost,
  reportOutcome,
  runEntryPoint,
} from "@shipwright/deploy-controller"
import { loadEnvFile, loadHostEnv, loadRuntimeEnv } from "@shipwright/env/server"

async function main(): Promise<number> {
  loadEnvFile()
  const env = loadRuntimeEnv()
  const logger = loggerFromEnv(env, "transport")
  const config = deployConfigFromEnv(env)
  const sourceDir = env.DEPLOY_SOURCE_DIR ?? process.cwd()
  const record = hostRecordFromEnv(loadHostEnv(), {
    deployDir: env.DEPLOY_DIR,
    repository: env.GITHUB_REPOSITORY ?? basename(sourceDir),
  })

  const transporter = new ArtifactTransporter({
    local: new LocalHost(),
    remote: new RemoteHost(record),
    record,
    config,
    logger,
  })
  const result = await transporter.transport(sourceDir)
  return reportOutcome(result, logger)
}

process.exit(await runEntryPoint("transport", main))
