import { getLockPath } from "@shipwright/shared"
import type { Logger } from "@shipwright/logger"
import { DeploymentError } from "../errors"
import type { Host } from "../hosts/host"

export interface DeployLock {
  path: string
  release: () => Promise<void>
}

/**
 * Take the per-host deploy lock. mkdir is atomic, so only one run can create it.
 * Throws DeploymentError "DEPLOY_LOCKED" when another run holds it.
 */
export async function acquireDeployLock(host: Host, deployDir: string, logger: Logger): Promise<DeployLock> {
  const path = getLockPath(deployDir)
  const created = await host.exec({ argv: ["mkdir", path] })

  if (created.exitCode !== 0) {
    const exists = await host.exec({ argv: ["test", "-d", path] })
    if (exists.exitCode === 0) {
      throw DeploymentError.locked(path)
    }
    throw DeploymentError.generic(
      `Cannot create deploy lock ${path} on ${host.label} (exit ${created.exitCode}): ${created.stderr.trim()}`,
    )
  }

  return {
    path,
    release: async () => {
      const removed = await host.exec({ argv: ["rmdir", path] })
      if (removed.exitCode !== 0) {
        logger.warn(`Failed to release deploy lock ${path}; remove it by hand before the next run`, removed.stderr.trim(), {
          host: host.label,
        })
      }
    },
  }
}
