/**
 * Environment validation for the deployment entry points
 *
 * Nothing is validated on import; each script calls the loader it needs once
 * at startup, so a transport run can demand host secrets while an on-host
 * update run does not.
 *
 * @example
 * ```typescript
 * import { loadEnvFile, loadHostEnv, loadRuntimeEnv } from "@shipwright/env/server"
 *
 * loadEnvFile()
 * const runtime = loadRuntimeEnv()
 * const host = loadHostEnv()
 * ```
 */

import { existsSync } from "node:fs"
import { join } from "node:path"
import { createEnv } from "@t3-oss/env-core"
import { config as loadDotenv } from "dotenv"
import type { ZodError } from "zod"
import { hostSchema, runtimeSchema } from "./schema"

type RuntimeEnvSource = Record<string, string | undefined>

/**
 * Explicitly load environment file
 *
 * Variables already present in the environment win, so CI secrets are never
 * shadowed by a stale local file.
 *
 * @param nodeEnv - Environment name (defaults to NODE_ENV or "production")
 * @returns true if file was loaded, false if not found
 */
export function loadEnvFile(nodeEnv?: string, cwd: string = process.cwd()): boolean {
  const envName = nodeEnv || process.env.NODE_ENV || "production"
  const envFile = join(cwd, `.env.${envName}`)

  if (existsSync(envFile)) {
    loadDotenv({ path: envFile, override: false })
    return true
  }

  return false
}

/**
 * Print which variables failed and why, then stop the entry point
 */
function onValidationError(error: ZodError): never {
  console.error("❌ Invalid environment variables:")
  console.error(error.flatten().fieldErrors)
  throw new Error("Invalid environment variables")
}

/**
 * Runtime settings (branch, config path, webhook, logging)
 */
export function loadRuntimeEnv(runtimeEnv: RuntimeEnvSource = process.env) {
  return createEnv({
    server: runtimeSchema,
    runtimeEnv,
    onValidationError,
    emptyStringAsUndefined: true,
  })
}

/**
 * Target host record. Throws when DEPLOY_HOST, DEPLOY_USER or DEPLOY_PASSWORD is missing.
 */
export function loadHostEnv(runtimeEnv: RuntimeEnvSource = process.env) {
  return createEnv({
    server: hostSchema,
    runtimeEnv,
    onValidationError,
    emptyStringAsUndefined: true,
  })
}

export type RuntimeEnv = ReturnType<typeof loadRuntimeEnv>
export type HostEnv = ReturnType<typeof loadHostEnv>
