/**
 * Error utilities
 *
 * Classification for errors that reach an entry point: failures of the
 * transport channel versus failures of the command that ran over it.
 */

/**
 * ssh exits 255 when the connection itself fails (unreachable host, refused,
 * authentication); any other code belongs to the remote command.
 */
export const SSH_CONNECTION_FAILURE_EXIT_CODE = 255

/**
 * sshpass exit codes that mean the credential was not accepted
 * (5: invalid/incorrect password, 6: host key unknown)
 */
const SSHPASS_AUTH_EXIT_CODES = new Set([5, 6])

/**
 * Extract error code from an error object.
 * Handles Node.js style errors with 'code' property.
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") {
    return undefined
  }
  const code = "code" in err ? err.code : undefined
  if (typeof code === "string") {
    return code
  }
  return undefined
}

/**
 * True when an ssh/rsync/sshpass exit code says the channel failed rather
 * than the command that ran over it.
 */
export function isChannelFailureExitCode(exitCode: number): boolean {
  return exitCode === SSH_CONNECTION_FAILURE_EXIT_CODE || SSHPASS_AUTH_EXIT_CODES.has(exitCode)
}

/**
 * Format an error for logging.
 */
export function formatUncaughtError(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? err.message
  }
  if (typeof err === "string") {
    return err
  }
  try {
    return JSON.stringify(err)
  } catch {
    return String(err)
  }
}
