/**
 * Health & Status Routes
 *
 * GET /health - liveness plus what the deploy queue is doing
 */

import type { DeployQueue } from "@shipwright/deploy-controller"
import { Hono } from "hono"

export function createHealthRoutes(queue: Pick<DeployQueue, "state">): Hono {
  const app = new Hono()

  app.get("/health", c => {
    const state = queue.state()
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      queue: {
        running: state.running?.revision ?? null,
        pending: state.pending?.revision ?? null,
        completed: state.completed,
        lastRun: state.lastRun ?? null,
      },
    })
  })

  return app
}
