import { posix } from "node:path"
import type { Host } from "../hosts/host"
import { classifyFailure, commandStep, type Step } from "../pipeline"
import { aptInstallStep } from "./apt"

/**
 * Interpreter plus the venv and header packages: python3.9 python3.9-venv python3.9-dev
 */
export function installPythonStep(host: Host, pythonBinary: string): Step {
  return aptInstallStep(host, {
    name: "python-install",
    description: `Installing ${pythonBinary}`,
    packages: [pythonBinary, `${pythonBinary}-venv`, `${pythonBinary}-dev`],
  })
}

export function pythonVersionStep(host: Host, pythonBinary: string): Step {
  return commandStep(
    host,
    { name: "python-version", description: `Checking ${pythonBinary} version`, failure: "PackageInstallFailure" },
    { argv: [pythonBinary, "--version"] },
  )
}

/** "Python 3.9.18" -> "3.9.18" */
export function parsePythonVersion(output: string): string | undefined {
  return output.match(/Python\s+([\d.]+)/)?.[1]
}

export interface VirtualenvParams {
  cwd: string
  venvDir: string
  pythonBinary: string
}

/**
 * Create the virtualenv unless one with a pip is already there
 */
export function ensureVirtualenvStep(host: Host, params: VirtualenvParams): Step {
  const pip = posix.join(params.venvDir, "bin", "pip")

  return {
    name: "venv-ensure",
    description: `Preparing virtualenv ${params.venvDir}`,
    failure: "DependencyInstallFailure",
    host: host.label,
    run: async () => {
      const probe = await host.exec({ argv: ["test", "-x", pip], cwd: params.cwd })
      if (probe.exitCode === 0) {
        return probe
      }
      if (classifyFailure(host, "DependencyInstallFailure", probe.exitCode) === "TransportFailure") {
        return { ...probe, failure: "TransportFailure" }
      }

      const create = await host.exec({ argv: [params.pythonBinary, "-m", "venv", params.venvDir], cwd: params.cwd })
      return create.exitCode === 0
        ? create
        : { ...create, failure: classifyFailure(host, "DependencyInstallFailure", create.exitCode) }
    },
  }
}

export interface PipInstallParams {
  cwd: string
  venvDir: string
  requirementsFile: string
}

/**
 * Install requirements with the venv's own pip, which is what activating it amounts to
 */
export function pipInstallStep(host: Host, params: PipInstallParams): Step {
  return commandStep(
    host,
    {
      name: "pip-install",
      description: `Installing dependencies from ${params.requirementsFile}`,
      failure: "DependencyInstallFailure",
    },
    {
      argv: [posix.join(params.venvDir, "bin", "pip"), "install", "--no-cache-dir", "-r", params.requirementsFile],
      cwd: params.cwd,
    },
  )
}
