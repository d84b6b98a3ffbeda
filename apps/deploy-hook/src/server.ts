/**
 * Deploy Hook Server
 *
 * Receives GitHub push webhooks and runs the deployment pipeline for the
 * configured branch, one release at a time.
 *
 * Internal service: put it behind the reverse proxy, never on a public port directly.
 */

import { basename } from "node:path"
import { serve, type ServerType } from "@hono/node-server"
import {
  DeploymentError,
  DeployQueue,
  deployConfigFromEnv,
  hostRecordFromEnv,
  LocalHost,
  loggerFromEnv,
  PipelineTrigger,
  RemoteHost,
  runEntryPoint,
} from "@shipwright/deploy-controller"
import { isFlagSet } from "@shipwright/env"
import { loadEnvFile, loadHostEnv, loadRuntimeEnv } from "@shipwright/env/server"
import { formatUncaughtError } from "@shipwright/shared"
import { createDeployHookApp } from "./app"

let server: ServerType | null = null

async function main(): Promise<number> {
  loadEnvFile()
  const env = loadRuntimeEnv()
  const hostEnv = loadHostEnv()
  const logger = loggerFromEnv(env, "deploy-hook")
  const config = deployConfigFromEnv(env)

  if (!env.GITHUB_WEBHOOK_SECRET) {
    if (env.NODE_ENV !== "development") {
      throw DeploymentError.configurationMissing("GITHUB_WEBHOOK_SECRET environment variable is required")
    }
    logger.warn("No GITHUB_WEBHOOK_SECRET set, skipping signature verification")
  }

  const sourceDir = env.DEPLOY_SOURCE_DIR ?? process.cwd()
  const record = hostRecordFromEnv(hostEnv, {
    deployDir: env.DEPLOY_DIR,
    repository: env.GITHUB_REPOSITORY ?? basename(sourceDir),
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
  const queue = new DeployQueue(release => trigger.run(release), logger)

  const app = createDeployHookApp({
    secret: env.GITHUB_WEBHOOK_SECRET,
    branch: config.branch,
    queue,
    logger,
    logRequests: true,
  })

  server = serve({
    fetch: app.fetch,
    port: env.DEPLOY_HOOK_PORT,
    hostname: env.DEPLOY_HOOK_HOST,
  })

  logger.info(`Server started on ${env.DEPLOY_HOOK_HOST}:${env.DEPLOY_HOOK_PORT}`)
  logger.info(`Deploying pushes to ${config.branch} into ${record.user}@${record.address}:${record.targetDir}`)

  // Graceful shutdown: stop accepting pushes, let the running deployment finish
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, starting graceful shutdown...`)
    server?.close()
    await queue.idle()
    logger.info("Shutdown complete")
    process.exit(0)
  }

  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch(error => logger.fatal("Shutdown failed", error))
  })
  process.on("SIGINT", () => {
    shutdown("SIGINT").catch(error => logger.fatal("Shutdown failed", error))
  })
  process.on("unhandledRejection", reason => {
    // Log and continue; a crashed webhook handler must not take the receiver down
    logger.error("Unhandled rejection", formatUncaughtError(reason))
  })

  return 0
}

const code = await runEntryPoint("deploy-hook", main)
if (code !== 0) {
  process.exit(code)
}
