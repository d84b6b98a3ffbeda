/**
 * Pure Zod schemas for environment variable validation
 *
 * This file contains ONLY schema definitions - no runtime code, no side effects.
 * Safe to import anywhere (scripts, webhook receiver, tests).
 */

import { z } from "zod"

/**
 * Custom validators for common patterns
 *
 * IMPORTANT: Do NOT use .refine() or .transform() here: they wrap the schema in
 * ZodEffects, which breaks type inference in @t3-oss/env-core.
 * Use .regex() or other ZodString chainable methods instead.
 */
export const hostAddress = z
  .string()
  .min(1)
  .regex(/^[a-z0-9.:[\]-]+$/i, "Must be a hostname or IP address")

export const posixUser = z.string().regex(/^[a-z_][a-z0-9_-]*$/i, "Must be a valid POSIX user name")

export const absolutePath = z.string().regex(/^\//, "Must be an absolute path")

export const portNumber = z.coerce.number().int().min(1).max(65535)

export const booleanFlag = z.enum(["true", "false", "1", "0"])

/**
 * Secrets and coordinates of the target host.
 * Supplied by the pipeline's secret store; never written to disk.
 */
export const hostSchema = {
  DEPLOY_HOST: hostAddress,
  DEPLOY_USER: posixUser,
  DEPLOY_PASSWORD: z.string().min(1),
  DEPLOY_SSH_PORT: portNumber.default(22),
}

/**
 * Settings every entry point reads; all optional
 */
export const runtimeSchema = {
  NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
  // Target tree; defaults to /home/<user>/<repository name>, or cwd on the host itself
  DEPLOY_DIR: absolutePath.optional(),
  DEPLOY_BRANCH: z.string().min(1).optional(),
  DEPLOY_CONFIG_PATH: z.string().min(1).optional(),
  DEPLOY_SOURCE_DIR: z.string().min(1).optional(),
  SKIP_TRANSPORT_TOOLS_INSTALL: booleanFlag.optional(),

  // Webhook receiver
  GITHUB_WEBHOOK_SECRET: z.string().min(1).optional(),
  DEPLOY_HOOK_HOST: z.string().min(1).default("127.0.0.1"),
  DEPLOY_HOOK_PORT: portNumber.default(9100),

  // Set by GitHub Actions
  GITHUB_EVENT_PATH: z.string().min(1).optional(),
  GITHUB_REF: z.string().min(1).optional(),
  GITHUB_SHA: z.string().min(1).optional(),
  GITHUB_REPOSITORY: z.string().min(1).optional(),

  // Logging
  LOG_FORMAT: z.enum(["pretty", "json"]).default("pretty"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "fatal"]).default("info"),
}

/**
 * Export schema keys for validation tooling
 */
export const HOST_ENV_KEYS = Object.keys(hostSchema)
export const RUNTIME_ENV_KEYS = Object.keys(runtimeSchema)

export function isFlagSet(value: z.infer<typeof booleanFlag> | undefined): boolean {
  return value === "true" || value === "1"
}
