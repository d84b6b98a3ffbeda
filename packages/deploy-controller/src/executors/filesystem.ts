import type { Host } from "../hosts/host"
import { chainStep, commandStep, type Step } from "../pipeline"

export function ensureDirectoryStep(host: Host, dir: string): Step {
  return commandStep(
    host,
    { name: "target-mkdir", description: `Creating ${dir}`, failure: "TransportFailure" },
    { argv: ["mkdir", "-p", dir] },
  )
}

export interface OwnershipParams {
  dir: string
  user: string
  /** Octal mode string, e.g. "755" */
  mode: string
}

/**
 * Give the tree to the deploy user, then reset modes.
 * chmod runs without sudo: after the chown the user owns every file.
 */
export function resetOwnershipStep(host: Host, params: OwnershipParams): Step {
  return chainStep(
    host,
    { name: "target-permissions", description: `Resetting ownership of ${params.dir}`, failure: "TransportFailure" },
    [
      { argv: ["chown", "-R", `${params.user}:${params.user}`, params.dir], sudo: true },
      { argv: ["chmod", "-R", params.mode, params.dir] },
    ],
  )
}
