import { PATHS } from "@shipwright/shared"
import type { HostCommand } from "../hosts/host"
import { sshDestination, sshOptions, sshpassEnv } from "../hosts/remote"
import type { HostRecord } from "../types"

export interface RsyncOptions {
  /** Remove files on the host that no longer exist in the source */
  delete: boolean
  exclude: readonly string[]
}

/**
 * Mirror `sourceDir` into the record's targetDir.
 * The trailing slash on the source copies its contents, not the directory itself.
 * The host lock is always excluded so `--delete` never removes another run's lock.
 */
export function buildRsyncCommand(record: HostRecord, sourceDir: string, options: RsyncOptions): HostCommand {
  const source = `${sourceDir.replace(/\/+$/, "")}/`
  return {
    argv: [
      "sshpass",
      "-e",
      "rsync",
      "-av",
      "--itemize-changes",
      "-e",
      ["ssh", ...sshOptions(record)].join(" "),
      ...(options.delete ? ["--delete"] : []),
      `--exclude=${PATHS.DEPLOY_LOCK_NAME}`,
      ...options.exclude.map(pattern => `--exclude=${pattern}`),
      source,
      `${sshDestination(record)}:${record.targetDir}`,
    ],
    env: sshpassEnv(record),
  }
}

export type ChangeKind = "transfer" | "create" | "delete" | "attributes"

export interface ItemizedChange {
  path: string
  kind: ChangeKind
  /** f file, d directory, L symlink, D device, S special */
  itemType: string
}

// YXcstpoguax path, e.g. "<f+++++++++ app/main.py" or ".d..t...... ./"
const ITEM_LINE = /^([<>ch.])([fdLDS])(\S{7,9})\s+(.+)$/
const DELETE_LINE = /^\*deleting\s+(.+)$/

/**
 * Parse `rsync --itemize-changes` output. Summary and progress lines are ignored.
 */
export function parseItemizedChanges(output: string): ItemizedChange[] {
  const changes: ItemizedChange[] = []

  for (const line of output.split("\n")) {
    const trimmed = line.trimEnd()

    const deletedPath = DELETE_LINE.exec(trimmed)?.[1]
    if (deletedPath) {
      changes.push({ path: deletedPath, kind: "delete", itemType: deletedPath.endsWith("/") ? "d" : "f" })
      continue
    }

    const item = ITEM_LINE.exec(trimmed)
    if (!item) continue
    const [, update = "", itemType = "", attributes = "", path = ""] = item

    if (update === "c" || attributes.startsWith("+")) {
      changes.push({ path, kind: "create", itemType })
    } else if (update === "<" || update === ">") {
      changes.push({ path, kind: "transfer", itemType })
    } else if (/[^.\s]/.test(attributes)) {
      changes.push({ path, kind: "attributes", itemType })
    }
  }

  return changes
}

/**
 * Changes that moved file content. Attribute-only lines are excluded:
 * the permission reset after every sync makes those reappear on each run.
 */
export function contentChanges(changes: readonly ItemizedChange[]): ItemizedChange[] {
  return changes.filter(change => change.kind !== "attributes")
}
