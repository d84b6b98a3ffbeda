import { EXIT_CODES } from "@shipwright/shared"
import type { FailureKind, StepFailure } from "./pipeline"

export type DeploymentErrorCode =
  | "PACKAGE_INSTALL_FAILED"
  | "CONFIG_VALIDATION_FAILED"
  | "TRANSPORT_FAILED"
  | "DEPENDENCY_INSTALL_FAILED"
  | "SERVICE_RESTART_FAILED"
  | "SOURCE_FETCH_FAILED"
  | "CHECKOUT_FAILED"
  | "CONFIGURATION_MISSING"
  | "INVALID_CONFIG"
  | "DEPLOY_LOCKED"
  | "INVALID_EVENT"
  | "UNKNOWN"

const FAILURE_CODES: Record<FailureKind, DeploymentErrorCode> = {
  PackageInstallFailure: "PACKAGE_INSTALL_FAILED",
  ConfigValidationFailure: "CONFIG_VALIDATION_FAILED",
  TransportFailure: "TRANSPORT_FAILED",
  DependencyInstallFailure: "DEPENDENCY_INSTALL_FAILED",
  ServiceRestartFailure: "SERVICE_RESTART_FAILED",
  SourceFetchFailure: "SOURCE_FETCH_FAILED",
  CheckoutFailure: "CHECKOUT_FAILED",
}

/** Keep a failing tool's exit code when it fits a process exit status */
function toExitCode(code: number): number {
  return Number.isInteger(code) && code > 0 && code < 256 ? code : EXIT_CODES.FAILURE
}

export class DeploymentError extends Error {
  readonly code: DeploymentErrorCode
  readonly statusCode: number
  /** Process exit code for the entry point that reports this error */
  readonly exitCode: number

  constructor(code: DeploymentErrorCode, message: string, statusCode = 500, exitCode: number = EXIT_CODES.FAILURE) {
    super(message)
    this.name = "DeploymentError"
    this.code = code
    this.statusCode = statusCode
    this.exitCode = exitCode
  }

  /** The error an entry point reports for a failed pipeline */
  static fromFailure(failure: StepFailure): DeploymentError {
    return new DeploymentError(FAILURE_CODES[failure.kind], failure.message, 500, toExitCode(failure.exitCode))
  }

  static configurationMissing(message: string): DeploymentError {
    return new DeploymentError("CONFIGURATION_MISSING", message, 500, EXIT_CODES.MISCONFIGURED)
  }

  static invalidConfig(message: string): DeploymentError {
    return new DeploymentError("INVALID_CONFIG", message, 500, EXIT_CODES.MISCONFIGURED)
  }

  static locked(lockPath: string): DeploymentError {
    return new DeploymentError(
      "DEPLOY_LOCKED",
      `Another deployment holds ${lockPath}. Wait for it to finish, or remove the directory if that run died.`,
      409,
      EXIT_CODES.LOCKED,
    )
  }

  static invalidEvent(message: string): DeploymentError {
    return new DeploymentError("INVALID_EVENT", message, 400, EXIT_CODES.MISCONFIGURED)
  }

  static generic(message: string): DeploymentError {
    return new DeploymentError("UNKNOWN", message, 500)
  }
}

/**
 * Process exit code for anything an entry point caught
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof DeploymentError ? error.exitCode : EXIT_CODES.FAILURE
}
