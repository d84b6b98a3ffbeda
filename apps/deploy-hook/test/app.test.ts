import type { EnqueueOutcome, QueueState, Release } from "@shipwright/deploy-controller"
import { silentLogger } from "@shipwright/logger"
import { describe, expect, it, vi } from "vitest"
import { createDeployHookApp } from "../src/app"
import { signPayload, verifySignature } from "../src/signature"

const SECRET = "test-secret"
const SHA = "9fceb02d0ae598e95dc970b74767f19372d61af8"

function pushBody(ref = "refs/heads/main", after = SHA): string {
  return JSON.stringify({
    ref,
    after,
    repository: { name: "fastapi-app", full_name: "acme/fastapi-app" },
    pusher: { name: "octocat" },
    commits: [{ id: after }, { id: "3a1b2c3" }],
  })
}

function setup(options: { secret?: string; outcome?: EnqueueOutcome } = { secret: SECRET }) {
  const enqueue = vi.fn((_release: Release): EnqueueOutcome => options.outcome ?? "started")
  const state = vi.fn((): QueueState => ({ completed: 0 }))
  const app = createDeployHookApp({ secret: options.secret, branch: "main", queue: { enqueue, state }, logger: silentLogger })
  return { app, enqueue, state }
}

function deliver(
  app: ReturnType<typeof setup>["app"],
  body: string,
  headers: Record<string, string> = { "x-github-event": "push", "x-hub-signature-256": signPayload(SECRET, body) },
) {
  return app.request("/webhook/push", { method: "POST", body, headers: { "content-type": "application/json", ...headers } })
}

describe("verifySignature", () => {
  it("accepts the HMAC of the body", () => {
    expect(verifySignature(SECRET, "{}", signPayload(SECRET, "{}"))).toBe(true)
  })

  it("rejects another secret, a truncated digest and an empty header", () => {
    expect(verifySignature(SECRET, "{}", signPayload("other-secret", "{}"))).toBe(false)
    expect(verifySignature(SECRET, "{}", signPayload(SECRET, "{}").slice(0, 20))).toBe(false)
    expect(verifySignature(SECRET, "{}", "")).toBe(false)
  })
})

describe("POST /webhook/push", () => {
  it("queues a signed push to the deploy branch", async () => {
    const { app, enqueue } = setup()

    const res = await deliver(app, pushBody())

    expect(res.status).toBe(202)
    expect(await res.json()).toEqual({
      message: "Deployment started",
      queue: "started",
      branch: "main",
      commit: SHA,
      commits: 2,
      pusher: "octocat",
    })
    expect(enqueue).toHaveBeenCalledWith({
      revision: SHA,
      branch: "main",
      repository: "acme/fastapi-app",
      pusher: "octocat",
      commitCount: 2,
    })
  })

  it("says when the release had to wait", async () => {
    const { app } = setup({ secret: SECRET, outcome: "queued" })
    const res = await deliver(app, pushBody())
    expect(await res.json()).toMatchObject({ message: "Deployment queued", queue: "queued" })
  })

  it("rejects a bad signature", async () => {
    const { app, enqueue } = setup()
    const body = pushBody()

    const res = await deliver(app, body, { "x-github-event": "push", "x-hub-signature-256": signPayload("other-secret", body) })

    expect(res.status).toBe(401)
    expect(await res.json()).toEqual({ error: "INVALID_SIGNATURE", message: "Signature does not match" })
    expect(enqueue).not.toHaveBeenCalled()
  })

  it("rejects a missing signature", async () => {
    const { app } = setup()
    const res = await deliver(app, pushBody(), { "x-github-event": "push" })
    expect(res.status).toBe(401)
  })

  it("accepts unsigned deliveries when no secret is configured", async () => {
    const { app, enqueue } = setup({})
    const res = await deliver(app, pushBody(), { "x-github-event": "push" })
    expect(res.status).toBe(202)
    expect(enqueue).toHaveBeenCalledTimes(1)
  })

  it("ignores other events", async () => {
    const { app, enqueue } = setup()
    const body = JSON.stringify({ zen: "Keep it logically awesome." })

    const res = await deliver(app, body, { "x-github-event": "ping", "x-hub-signature-256": signPayload(SECRET, body) })

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ message: "Ignoring ping event" })
    expect(enqueue).not.toHaveBeenCalled()
  })

  it("skips pushes to other branches", async () => {
    const { app, enqueue } = setup()

    const res = await deliver(app, pushBody("refs/heads/feature"))

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ message: "Deployment skipped (branch: feature, expected: main)", skipped: true })
    expect(enqueue).not.toHaveBeenCalled()
  })

  it("drops a redelivery of the same commit", async () => {
    const { app, enqueue } = setup()

    await deliver(app, pushBody())
    const res = await deliver(app, pushBody())

    expect(await res.json()).toEqual({
      message: "Deployment already handled for this commit",
      commit: SHA,
      deduplicated: true,
    })
    expect(enqueue).toHaveBeenCalledTimes(1)
  })

  it("rejects a payload that is not a push event", async () => {
    const { app } = setup()
    const body = JSON.stringify({ ref: "refs/heads/main" })

    const res = await deliver(app, body)

    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ error: "INVALID_EVENT" })
  })

  it("rejects malformed JSON", async () => {
    const { app } = setup()
    const res = await deliver(app, "{not json")
    expect(res.status).toBe(400)
  })
})

describe("GET /health", () => {
  it("reports the queue", async () => {
    const { app, state } = setup()
    state.mockReturnValue({
      running: { revision: SHA, branch: "main" },
      completed: 4,
      lastRun: { revision: "3a1b2c3", ok: true, finishedAt: "2026-10-19T10:00:00.000Z" },
    })

    const res = await app.request("/health")

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      status: "ok",
      queue: {
        running: SHA,
        pending: null,
        completed: 4,
        lastRun: { revision: "3a1b2c3", ok: true, finishedAt: "2026-10-19T10:00:00.000Z" },
      },
    })
  })
})

describe("unknown routes", () => {
  it("return 404", async () => {
    const { app } = setup()
    const res = await app.request("/nope")
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: "Not found" })
  })
})
