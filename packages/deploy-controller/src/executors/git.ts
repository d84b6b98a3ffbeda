import type { Host } from "../hosts/host"
import { classifyFailure, commandStep, type FailureKind, type Step } from "../pipeline"

export interface GitPullParams {
  cwd: string
  remote: string
  branch: string
}

/**
 * Fast-forward the working tree. "Already up to date." is a success like any other.
 */
export function gitPullStep(host: Host, params: GitPullParams): Step {
  return commandStep(
    host,
    {
      name: "git-pull",
      description: `Pulling ${params.remote}/${params.branch}`,
      failure: "SourceFetchFailure",
    },
    { argv: ["git", "pull", params.remote, params.branch], cwd: params.cwd },
  )
}

export function headRevisionStep(host: Host, cwd: string, failure: FailureKind = "CheckoutFailure"): Step {
  return commandStep(
    host,
    { name: "git-rev-parse", description: "Reading checked-out revision", failure },
    { argv: ["git", "rev-parse", "HEAD"], cwd },
  )
}

/**
 * True when a full or abbreviated SHA names the same commit as `head`
 */
export function sameRevision(head: string, revision: string): boolean {
  const a = head.trim().toLowerCase()
  const b = revision.trim().toLowerCase()
  if (!a || !b) return false
  return a.startsWith(b) || b.startsWith(a)
}

export interface CheckoutRevisionParams {
  cwd: string
  revision: string
  /** Fetched from when the revision is not in the local clone yet */
  remote: string
  branch: string
}

/**
 * Make the working tree match `revision`: detach onto it unless HEAD already is it.
 * A clone that has not seen the commit yet (the webhook's tree) fetches the branch first.
 */
export function checkoutRevisionStep(host: Host, params: CheckoutRevisionParams): Step {
  return {
    name: "git-checkout",
    description: `Checking out ${params.revision.slice(0, 12)}`,
    failure: "CheckoutFailure",
    host: host.label,
    run: async () => {
      const { cwd, revision } = params
      const head = await host.exec({ argv: ["git", "rev-parse", "HEAD"], cwd })
      if (head.exitCode !== 0) {
        return { ...head, failure: classifyFailure(host, "CheckoutFailure", head.exitCode) }
      }
      if (sameRevision(head.stdout, revision)) {
        return head
      }

      let stdout = head.stdout
      let stderr = head.stderr

      const known = await host.exec({ argv: ["git", "cat-file", "-e", `${revision}^{commit}`], cwd })
      if (known.exitCode !== 0) {
        const fetch = await host.exec({ argv: ["git", "fetch", params.remote, params.branch], cwd })
        stdout += fetch.stdout
        stderr += fetch.stderr
        if (fetch.exitCode !== 0) {
          return { exitCode: fetch.exitCode, stdout, stderr, failure: classifyFailure(host, "SourceFetchFailure", fetch.exitCode) }
        }
      }

      const checkout = await host.exec({ argv: ["git", "checkout", "--detach", revision], cwd })
      const result = { exitCode: checkout.exitCode, stdout: stdout + checkout.stdout, stderr: stderr + checkout.stderr }
      return checkout.exitCode === 0
        ? result
        : { ...result, failure: classifyFailure(host, "CheckoutFailure", checkout.exitCode) }
    },
  }
}
