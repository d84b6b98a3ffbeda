import type { Host } from "../hosts/host"
import { commandStep, type Step } from "../pipeline"

/**
 * Refresh the package index
 */
export function aptUpdateStep(host: Host): Step {
  return commandStep(
    host,
    { name: "apt-update", description: "Updating package lists", failure: "PackageInstallFailure" },
    { argv: ["apt-get", "update"], sudo: true },
  )
}

/**
 * Upgrade every installed package
 */
export function aptUpgradeStep(host: Host): Step {
  return commandStep(
    host,
    { name: "apt-upgrade", description: "Upgrading installed packages", failure: "PackageInstallFailure" },
    { argv: ["apt-get", "upgrade", "-y"], sudo: true },
  )
}

export interface AptInstallParams {
  name: string
  description: string
  packages: readonly string[]
}

export function aptInstallStep(host: Host, params: AptInstallParams): Step {
  return commandStep(
    host,
    { name: params.name, description: params.description, failure: "PackageInstallFailure" },
    { argv: ["apt-get", "install", "-y", ...params.packages], sudo: true },
  )
}
