/**
 * @shipwright/shared
 *
 * Constants, deploy-config parsing and small utilities used by every package.
 *
 * @example
 * ```typescript
 * import { DEFAULTS, loadDeployConfig } from "@shipwright/shared"
 *
 * const config = loadDeployConfig(process.env.DEPLOY_CONFIG_PATH)
 * config.serviceName // "fastapi.service" unless overridden
 * ```
 */

export { DEFAULTS, EXIT_CODES, PATHS, TRANSPORT_TOOLS, WEBHOOK } from "./constants"
export {
  getDefaultDeployDir,
  getEnabledSitePath,
  getLockPath,
  getPythonBinary,
  getSiteConfigPath,
  loadDeployConfig,
} from "./config"
export {
  type DeployConfig,
  defaultDeployConfig,
  deployConfigSchema,
  parseDeployConfig,
} from "./deploy-config-schema"
export { createDedupeCache, type DedupeCache, type DedupeCacheOptions } from "./dedupe"
export {
  extractErrorCode,
  formatUncaughtError,
  isChannelFailureExitCode,
  SSH_CONNECTION_FAILURE_EXIT_CODE,
} from "./errors"
