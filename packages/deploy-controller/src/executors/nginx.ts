import { getEnabledSitePath, getSiteConfigPath, PATHS } from "@shipwright/shared"
import type { Host } from "../hosts/host"
import { chainStep, commandStep, type Step } from "../pipeline"

export interface ReverseProxyParams {
  listenPort: number
  upstreamHost: string
  upstreamPort: number
  /** Defaults to the catch-all `_` */
  serverName?: string
}

/**
 * nginx server block that forwards everything to the local app and keeps the
 * original host, client IP and scheme in forwarded headers
 */
export function renderReverseProxyConfig(params: ReverseProxyParams): string {
  return `server {
    listen ${params.listenPort};
    server_name ${params.serverName ?? "_"};

    location / {
        proxy_pass http://${params.upstreamHost}:${params.upstreamPort};
        proxy_set_header Host $host;
        proxy_set_header X-Real-IP $remote_addr;
        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;
        proxy_set_header X-Forwarded-Proto $scheme;
    }
}
`
}

/**
 * Remove the distribution's default site from sites-available and sites-enabled
 */
export function removeDefaultSiteStep(host: Host): Step {
  return chainStep(
    host,
    { name: "nginx-remove-default", description: "Removing default nginx configuration", failure: "ConfigValidationFailure" },
    [
      { argv: ["rm", "-f", getSiteConfigPath(PATHS.NGINX_DEFAULT_SITE)], sudo: true },
      { argv: ["rm", "-f", getEnabledSitePath(PATHS.NGINX_DEFAULT_SITE)], sudo: true },
    ],
  )
}

/**
 * Write the site config through tee so only tee needs root
 */
export function writeSiteConfigStep(host: Host, siteName: string, content: string): Step {
  return commandStep(
    host,
    { name: "nginx-write-site", description: "Creating nginx reverse proxy configuration", failure: "ConfigValidationFailure" },
    { argv: ["tee", getSiteConfigPath(siteName)], sudo: true, input: content },
  )
}

/**
 * Symlink the site into sites-enabled. -f keeps re-runs from failing on an existing link.
 */
export function enableSiteStep(host: Host, siteName: string): Step {
  return commandStep(
    host,
    { name: "nginx-enable-site", description: "Enabling nginx configuration", failure: "ConfigValidationFailure" },
    { argv: ["ln", "-sf", getSiteConfigPath(siteName), getEnabledSitePath(siteName)], sudo: true },
  )
}

/**
 * Syntax check of the whole nginx configuration
 */
export function validateNginxStep(host: Host): Step {
  return commandStep(
    host,
    { name: "nginx-validate", description: "Validating nginx configuration", failure: "ConfigValidationFailure" },
    { argv: ["nginx", "-t"], sudo: true },
  )
}

export function restartNginxStep(host: Host): Step {
  return commandStep(
    host,
    { name: "nginx-restart", description: "Restarting nginx", failure: "ServiceRestartFailure" },
    { argv: ["systemctl", "restart", "nginx"], sudo: true },
  )
}

export function nginxVersionStep(host: Host): Step {
  return commandStep(
    host,
    { name: "nginx-version", description: "Checking nginx version", failure: "PackageInstallFailure" },
    { argv: ["nginx", "-v"] },
  )
}

/**
 * `nginx -v` prints "nginx version: nginx/1.18.0 (Ubuntu)" on stderr
 */
export function parseNginxVersion(output: string): string | undefined {
  return output.match(/nginx\/([\d.]+)/)?.[1]
}
