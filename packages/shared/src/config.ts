/**
 * ============================================================================
 * DEPLOYMENT CONFIGURATION
 * ============================================================================
 *
 * Loads deploy-config.json (DEPLOY_CONFIG_PATH) and derives the paths every
 * component agrees on. A missing path means "use the defaults"; a path that
 * points at an unreadable or invalid file is fatal.
 */

import { readFileSync } from "node:fs"
import { posix } from "node:path"
import { PATHS } from "./constants"
import { type DeployConfig, defaultDeployConfig, parseDeployConfig } from "./deploy-config-schema"

/**
 * Load deploy-config.json, or the defaults when no path is given
 */
export function loadDeployConfig(configPath?: string): DeployConfig {
  if (!configPath) {
    return defaultDeployConfig()
  }

  let raw: string
  try {
    raw = readFileSync(configPath, "utf-8")
  } catch (error) {
    throw new Error(
      `FATAL: Cannot read deploy config at ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    )
  }
  return parseDeployConfig(raw)
}

/** /etc/nginx/sites-available/<site> */
export function getSiteConfigPath(siteName: string): string {
  return posix.join(PATHS.NGINX_SITES_AVAILABLE, siteName)
}

/** /etc/nginx/sites-enabled/<site> */
export function getEnabledSitePath(siteName: string): string {
  return posix.join(PATHS.NGINX_SITES_ENABLED, siteName)
}

/**
 * Default deploy directory: /home/<user>/<repository name>
 */
export function getDefaultDeployDir(user: string, repositoryName: string): string {
  const name = posix.basename(repositoryName)
  if (!name || name === "." || name === "..") {
    throw new Error(`Invalid repository name: ${repositoryName}`)
  }
  return posix.join("/home", user, name)
}

export function getLockPath(deployDir: string): string {
  return posix.join(deployDir, PATHS.DEPLOY_LOCK_NAME)
}

/** python3.9 for pythonVersion "3.9" */
export function getPythonBinary(config: Pick<DeployConfig, "pythonVersion">): string {
  return `python${config.pythonVersion}`
}
