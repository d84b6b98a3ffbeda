import type { Host } from "../hosts/host"
import { commandStep, type Step } from "../pipeline"

/**
 * Reload unit definitions so an edited unit file takes effect on restart
 */
export function daemonReloadStep(host: Host): Step {
  return commandStep(
    host,
    { name: "systemd-daemon-reload", description: "Reloading systemd units", failure: "ServiceRestartFailure" },
    { argv: ["systemctl", "daemon-reload"], sudo: true },
  )
}

export function restartUnitStep(host: Host, unit: string): Step {
  return commandStep(
    host,
    {
      name: "systemd-restart",
      description: `Restarting ${unit}`,
      failure: "ServiceRestartFailure",
    },
    { argv: ["systemctl", "restart", unit], sudo: true },
  )
}

/**
 * `systemctl status` exits 3 for an inactive unit, so a crashed restart fails this step
 */
export function unitStatusStep(host: Host, unit: string): Step {
  return commandStep(
    host,
    {
      name: "systemd-status",
      description: `Checking ${unit} status`,
      failure: "ServiceRestartFailure",
    },
    { argv: ["systemctl", "status", unit, "--no-pager"], sudo: true },
  )
}

/**
 * `systemctl is-active` exits non-zero for anything but an active unit
 */
export function unitActiveStep(host: Host, unit: string): Step {
  return commandStep(
    host,
    { name: `${unit}-active`, description: `Checking ${unit} is active`, failure: "ServiceRestartFailure" },
    { argv: ["systemctl", "is-active", unit] },
  )
}

/**
 * "active (running)" from the Active: line of `systemctl status`
 */
export function parseActiveState(statusOutput: string): string | undefined {
  return statusOutput.match(/^\s*Active:\s+(\S+(?:\s+\([^)]*\))?)/m)?.[1]
}
