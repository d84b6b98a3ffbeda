/**
 * Coordinates and credential of a target host.
 * Supplied per invocation from the environment; never persisted.
 */
export interface HostRecord {
  /** Hostname or IP address */
  address: string
  /** Login user; also the owner of the deployed tree */
  user: string
  /** Password for ssh, handed to sshpass through SSHPASS */
  password: string
  /** ssh port (default: 22) */
  port: number
  /** Absolute directory the release is synced into */
  targetDir: string
}

/**
 * The files at one source-control revision, on their way to the host
 */
export interface Release {
  /** Commit SHA that was pushed */
  revision: string
  /** Branch name without refs/heads/ */
  branch: string
  /** owner/name, when known */
  repository?: string
  pusher?: string
  commitCount?: number
}
