import type { DeployQueue } from "@shipwright/deploy-controller"
import type { Logger } from "@shipwright/logger"
import { createDedupeCache, type DedupeCache, WEBHOOK } from "@shipwright/shared"
import { Hono } from "hono"
import { logger as requestLogger } from "hono/logger"
import { createHealthRoutes } from "./routes/health"
import { createWebhookRoutes } from "./routes/webhook"

export interface DeployHookAppOptions {
  secret?: string
  branch: string
  queue: Pick<DeployQueue, "enqueue" | "state">
  logger: Logger
  dedupe?: DedupeCache
  /** Log every request line (off in tests) */
  logRequests?: boolean
}

export function createDeployHookApp(options: DeployHookAppOptions): Hono {
  const { queue, logger } = options
  const app = new Hono()

  if (options.logRequests) {
    app.use("*", requestLogger(line => logger.info(line)))
  }

  app.route("/", createHealthRoutes(queue))
  app.route(
    "/webhook",
    createWebhookRoutes({
      secret: options.secret,
      branch: options.branch,
      queue,
      logger,
      // Redeliveries of the same head commit within the window are dropped
      dedupe: options.dedupe ?? createDedupeCache({ ttlMs: WEBHOOK.DEDUPE_TTL_MS, maxSize: WEBHOOK.DEDUPE_MAX_SIZE }),
    }),
  )

  app.notFound(c => {
    return c.json({ error: "Not found" }, 404)
  })

  app.onError((err, c) => {
    logger.error("Unhandled error", err)
    return c.json({ error: "Internal server error" }, 500)
  })

  return app
}
