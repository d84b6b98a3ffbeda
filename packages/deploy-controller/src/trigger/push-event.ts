import { readFileSync } from "node:fs"
import { z } from "zod"
import { DeploymentError } from "../errors"
import type { Release } from "../types"

const commitSchema = z
  .object({
    id: z.string(),
    message: z.string().optional(),
  })
  .passthrough()

/**
 * The fields of a GitHub push payload a deployment needs. Everything else passes through.
 */
export const pushEventSchema = z
  .object({
    ref: z.string().min(1),
    after: z.string().regex(/^[0-9a-f]{7,64}$/i, "Must be a commit SHA"),
    deleted: z.boolean().optional(),
    repository: z
      .object({
        name: z.string().min(1),
        full_name: z.string().optional(),
      })
      .passthrough(),
    pusher: z.object({ name: z.string() }).passthrough().optional(),
    commits: z.array(commitSchema).default([]),
  })
  .passthrough()

export type PushEvent = z.infer<typeof pushEventSchema>

export type PushDecision = { deploy: true; release: Release } | { deploy: false; reason: string }

const BRANCH_REF_PREFIX = "refs/heads/"
const ZERO_SHA = /^0+$/

/** refs/heads/main -> main; undefined for tags and other refs */
export function branchFromRef(ref: string): string | undefined {
  return ref.startsWith(BRANCH_REF_PREFIX) && ref.length > BRANCH_REF_PREFIX.length
    ? ref.slice(BRANCH_REF_PREFIX.length)
    : undefined
}

/**
 * Decide whether a push deploys. Only a new head on `branch` does.
 */
export function evaluatePush(event: PushEvent, branch: string): PushDecision {
  const pushed = branchFromRef(event.ref)
  if (!pushed) {
    return { deploy: false, reason: `Deployment skipped (${event.ref} is not a branch)` }
  }
  if (event.deleted || ZERO_SHA.test(event.after)) {
    return { deploy: false, reason: `Deployment skipped (branch ${pushed} was deleted)` }
  }
  if (pushed !== branch) {
    return { deploy: false, reason: `Deployment skipped (branch: ${pushed}, expected: ${branch})` }
  }

  return {
    deploy: true,
    release: {
      revision: event.after,
      branch: pushed,
      repository: event.repository.full_name ?? event.repository.name,
      pusher: event.pusher?.name,
      commitCount: event.commits.length,
    },
  }
}

/**
 * Validate a decoded payload. Throws DeploymentError "INVALID_EVENT".
 */
export function parsePushEvent(payload: unknown): PushEvent {
  const parsed = pushEventSchema.safeParse(payload)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    throw DeploymentError.invalidEvent(`Invalid push event: ${issues.join("; ")}`)
  }
  return parsed.data
}

export function decodePushEvent(raw: string): PushEvent {
  let payload: unknown
  try {
    payload = JSON.parse(raw)
  } catch (error) {
    throw DeploymentError.invalidEvent(
      `Push event is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    )
  }
  return parsePushEvent(payload)
}

export interface ActionsEnv {
  GITHUB_EVENT_PATH?: string
  GITHUB_REF?: string
  GITHUB_SHA?: string
  GITHUB_REPOSITORY?: string
}

/**
 * The push that started a CI run: the event file Actions writes, or the
 * GITHUB_REF / GITHUB_SHA pair when there is none
 */
export function readActionsPushEvent(env: ActionsEnv): PushEvent {
  if (env.GITHUB_EVENT_PATH) {
    let raw: string
    try {
      raw = readFileSync(env.GITHUB_EVENT_PATH, "utf-8")
    } catch (error) {
      throw DeploymentError.configurationMissing(
        `Cannot read GITHUB_EVENT_PATH ${env.GITHUB_EVENT_PATH}: ${error instanceof Error ? error.message : String(error)}`,
      )
    }
    return decodePushEvent(raw)
  }

  if (env.GITHUB_REF && env.GITHUB_SHA) {
    const repository = env.GITHUB_REPOSITORY ?? ""
    return parsePushEvent({
      ref: env.GITHUB_REF,
      after: env.GITHUB_SHA,
      repository: { name: repository.split("/").pop() ?? "", full_name: repository || undefined },
    })
  }

  throw DeploymentError.configurationMissing("Set GITHUB_EVENT_PATH, or GITHUB_REF and GITHUB_SHA")
}
