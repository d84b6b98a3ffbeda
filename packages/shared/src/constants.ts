/**
 * Shared Constants - Single Source of Truth
 *
 * Fixed system paths and defaults used by every deployment component.
 * DO NOT duplicate these values anywhere else.
 */

/**
 * Filesystem paths on the target host
 */
export const PATHS = {
  NGINX_SITES_AVAILABLE: "/etc/nginx/sites-available",
  NGINX_SITES_ENABLED: "/etc/nginx/sites-enabled",
  NGINX_DEFAULT_SITE: "default",
  // Created with an atomic mkdir inside the deploy directory
  DEPLOY_LOCK_NAME: ".deploy.lock",
} as const

/**
 * Defaults for settings that may be overridden by deploy-config.json
 */
export const DEFAULTS = {
  BRANCH: "main",
  SERVICE_NAME: "fastapi.service",
  SITE_NAME: "fastapi",
  APP_PORT: 8000,
  PROXY_LISTEN_PORT: 80,
  UPSTREAM_HOST: "127.0.0.1",
  PYTHON_VERSION: "3.9",
  VENV_DIR: "venv",
  REQUIREMENTS_FILE: "requirements.txt",
  EDITOR_PACKAGE: "vim",
  FILE_MODE: "755",
  REMOTE: "origin",
} as const

/**
 * Packages the control-plane runner needs before it can transport a release
 */
export const TRANSPORT_TOOLS = ["sshpass", "rsync"] as const

/**
 * Webhook receiver defaults
 */
export const WEBHOOK = {
  // Same commit within this window is a redelivery, not a new push
  DEDUPE_TTL_MS: 5 * 60 * 1000,
  DEDUPE_MAX_SIZE: 100,
  SIGNATURE_HEADER: "x-hub-signature-256",
  EVENT_HEADER: "x-github-event",
} as const

/**
 * Process exit codes used by the entry points when a failure has no exit code of its own
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  MISCONFIGURED: 2,
  LOCKED: 75,
} as const
