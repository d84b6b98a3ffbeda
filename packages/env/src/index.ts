/**
 * @shipwright/env
 *
 * Centralized environment variable validation using @t3-oss/env-core
 *
 * ## Usage
 *
 * ### Entry points (scripts, webhook receiver)
 * ```typescript
 * import { loadHostEnv } from "@shipwright/env/server"
 *
 * const host = loadHostEnv()
 * host.DEPLOY_SSH_PORT // number, 22 unless set
 * ```
 *
 * ### Schemas only (tests, tooling)
 * ```typescript
 * import { hostSchema, runtimeSchema } from "@shipwright/env"
 * ```
 *
 * ## Architecture
 *
 * - `/server` - loaders, can use node:fs for dotenv loading
 * - `/` (this file) - Schema exports only, no side effects
 */

export {
  absolutePath,
  booleanFlag,
  HOST_ENV_KEYS,
  hostAddress,
  hostSchema,
  isFlagSet,
  portNumber,
  posixUser,
  RUNTIME_ENV_KEYS,
  runtimeSchema,
} from "./schema"
