/**
 * Deploy Config Zod Schema - SINGLE SOURCE OF TRUTH
 *
 * Validates the optional deploy-config.json (DEPLOY_CONFIG_PATH).
 * One schema, one type, one parse function. Unknown keys cause errors.
 * Secrets never live here; they come from the environment.
 */

import { z } from "zod"
import { DEFAULTS } from "./constants"

// ---------------------------------------------------------------------------
// Reusable validators
// ---------------------------------------------------------------------------

const port = z.number().int().min(1).max(65535)
const relativePath = z
  .string()
  .min(1)
  .regex(/^[^/]/, "Must be relative to the deploy directory")
  .regex(/^(?!.*\.\.)/, "Must not contain ..")

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const deployConfigSchema = z
  .object({
    branch: z.string().min(1).default(DEFAULTS.BRANCH),
    remote: z.string().min(1).default(DEFAULTS.REMOTE),
    serviceName: z
      .string()
      .regex(/^[\w@.-]+$/, "Must be a systemd unit name")
      .default(DEFAULTS.SERVICE_NAME),
    siteName: z
      .string()
      .regex(/^[a-z0-9_-]+$/i, "Must be a plain file name")
      .default(DEFAULTS.SITE_NAME),
    appPort: port.default(DEFAULTS.APP_PORT),
    proxyListenPort: port.default(DEFAULTS.PROXY_LISTEN_PORT),
    upstreamHost: z.string().min(1).default(DEFAULTS.UPSTREAM_HOST),
    pythonVersion: z
      .string()
      .regex(/^\d+\.\d+$/, "Must look like 3.9")
      .default(DEFAULTS.PYTHON_VERSION),
    venvDir: relativePath.default(DEFAULTS.VENV_DIR),
    requirementsFile: relativePath.default(DEFAULTS.REQUIREMENTS_FILE),
    editorPackage: z.string().min(1).default(DEFAULTS.EDITOR_PACKAGE),
    fileMode: z
      .string()
      .regex(/^[0-7]{3,4}$/, "Must be an octal mode")
      .default(DEFAULTS.FILE_MODE),
    rsync: z
      .object({
        delete: z.boolean().default(false),
        exclude: z.array(z.string().min(1)).default([]),
      })
      .strict()
      .default({}),
  })
  .strict()

// ---------------------------------------------------------------------------
// Derived type
// ---------------------------------------------------------------------------

export type DeployConfig = z.infer<typeof deployConfigSchema>

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Parse and validate raw JSON string as DeployConfig.
 * Throws an Error on malformed JSON, or a ZodError on schema validation failure.
 */
export function parseDeployConfig(raw: string): DeployConfig {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (e) {
    throw new Error(`Invalid JSON in deploy config: ${e instanceof Error ? e.message : String(e)}`)
  }
  return deployConfigSchema.parse(data)
}

/** All defaults, as if deploy-config.json were `{}` */
export function defaultDeployConfig(): DeployConfig {
  return deployConfigSchema.parse({})
}
