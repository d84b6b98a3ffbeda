#!/usr/bin/env tsx
/**
 * Deploy script, run on the host inside the deployed working tree:
 * pull, install dependencies, restart the service, print its status.
 *
 * Usage: cd /home/<user>/<repo> && npx tsx scripts/deployment/update-release.ts
 * Env: DEPLOY_DIR (defaults to cwd), DEPLOY_BRANCH, DEPLOY_CONFIG_PATH
 */

import {
  deployConfigFromEnv,
  LocalHost,
  loggerFromEnv,
  RemoteUpdater,
  reportOutcome,
  runEntryPoint,
} from "@shipwright/deploy-controller"
import { loadEnvFile, loadRuntimeEnv } from "@shipwright/env/server"

async function main(): Promise<number> {
  loadEnvFile()
  const env = loadRuntimeEnv()
  const logger = loggerFromEnv(env, "update")
  const config = deployConfigFromEnv(env)

  const updater = new RemoteUpdater(new LocalHost(), {
    deployDir: env.DEPLOY_DIR ?? process.cwd(),
    config,
    logger,
  })
  const result = await updater.update()
  return reportOutcome(result, logger)
}

process.exit(await runEntryPoint("update", main))
