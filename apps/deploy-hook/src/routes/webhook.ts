/**
 * Push webhook
 *
 * POST /webhook/push - verify, filter and queue a deployment
 *
 * Setup:
 * 1. GitHub repo → Settings → Webhooks → Add webhook
 * 2. Payload URL: https://your-domain.com/webhook/push
 * 3. Content type: application/json
 * 4. Secret: same value as GITHUB_WEBHOOK_SECRET
 * 5. Events: Just the push event
 */

import {
  DeploymentError,
  type DeployQueue,
  decodePushEvent,
  evaluatePush,
  type PushDecision,
} from "@shipwright/deploy-controller"
import type { Logger } from "@shipwright/logger"
import { type DedupeCache, WEBHOOK } from "@shipwright/shared"
import { Hono } from "hono"
import { verifySignature } from "../signature"

export interface WebhookRouteOptions {
  /** Unset only in development; every delivery is then accepted */
  secret?: string
  branch: string
  queue: Pick<DeployQueue, "enqueue">
  dedupe: DedupeCache
  logger: Logger
}

export function createWebhookRoutes(options: WebhookRouteOptions): Hono {
  const { secret, branch, queue, dedupe, logger } = options
  const app = new Hono()

  app.post("/push", async c => {
    // Raw body: the signature covers the exact bytes GitHub sent
    const payload = await c.req.text()

    if (secret && !verifySignature(secret, payload, c.req.header(WEBHOOK.SIGNATURE_HEADER) ?? "")) {
      logger.warn("Invalid signature")
      return c.json({ error: "INVALID_SIGNATURE", message: "Signature does not match" }, 401)
    }

    const event = c.req.header(WEBHOOK.EVENT_HEADER)
    if (event !== "push") {
      return c.json({ message: `Ignoring ${event ?? "unknown"} event` })
    }

    let decision: PushDecision
    try {
      decision = evaluatePush(decodePushEvent(payload), branch)
    } catch (error) {
      if (error instanceof DeploymentError) {
        logger.warn("Rejected push payload", error.message)
        return c.json({ error: error.code, message: error.message }, 400)
      }
      throw error
    }

    if (!decision.deploy) {
      logger.info(decision.reason)
      return c.json({ message: decision.reason, skipped: true })
    }

    const { release } = decision
    if (dedupe.check(release.revision)) {
      logger.info(`Ignoring duplicate delivery for commit ${release.revision}`)
      return c.json({
        message: "Deployment already handled for this commit",
        commit: release.revision,
        deduplicated: true,
      })
    }

    const outcome = queue.enqueue(release)
    logger.info(`Push ${release.revision.slice(0, 12)} to ${release.branch}: ${outcome}`, { revision: release.revision })

    return c.json(
      {
        message: outcome === "started" ? "Deployment started" : "Deployment queued",
        queue: outcome,
        branch: release.branch,
        commit: release.revision,
        commits: release.commitCount ?? 0,
        pusher: release.pusher ?? "unknown",
      },
      202,
    )
  })

  return app
}
