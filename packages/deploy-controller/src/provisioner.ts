import type { Logger } from "@shipwright/logger"
import { type DeployConfig, getPythonBinary } from "@shipwright/shared"
import { aptInstallStep, aptUpdateStep, aptUpgradeStep } from "./executors/apt"
import {
  enableSiteStep,
  nginxVersionStep,
  parseNginxVersion,
  removeDefaultSiteStep,
  renderReverseProxyConfig,
  restartNginxStep,
  validateNginxStep,
  writeSiteConfigStep,
} from "./executors/nginx"
import { installPythonStep, parsePythonVersion, pythonVersionStep } from "./executors/python"
import { unitActiveStep } from "./executors/systemd"
import type { Host } from "./hosts/host"
import { findStep, inPhase, type PipelineResult, runSteps, type Step } from "./pipeline"
import { progressHooks } from "./progress"

export const PROVISION_PHASES = ["Packages", "Reverse proxy", "Python runtime", "Verification"] as const

export interface InstalledVersions {
  nginx?: string
  python?: string
}

export type ProvisionResult = PipelineResult & { versions: InstalledVersions }

export interface HostProvisionerOptions {
  config: DeployConfig
  logger: Logger
}

/**
 * One-time baseline setup of a fresh host: system packages, nginx as a
 * reverse proxy in front of the app port, and the Python runtime.
 *
 * Steps run in a fixed order and stop at the first failure. Nothing is
 * rolled back; a re-run repeats every step and converges on the same state.
 */
export class HostProvisioner {
  private readonly logger: Logger

  constructor(
    private readonly host: Host,
    private readonly options: HostProvisionerOptions,
  ) {
    this.logger = options.logger.child({ component: "provisioner", host: host.label })
  }

  /**
   * The ordered step list. The nginx restart comes directly after `nginx -t`,
   * so a config that fails the check never reaches the running server.
   */
  steps(): Step[] {
    const { config } = this.options
    const host = this.host
    const python = getPythonBinary(config)
    const siteConfig = renderReverseProxyConfig({
      listenPort: config.proxyListenPort,
      upstreamHost: config.upstreamHost,
      upstreamPort: config.appPort,
    })

    return [
      ...inPhase("Packages", [
        aptUpdateStep(host),
        aptUpgradeStep(host),
        aptInstallStep(host, {
          name: "editor-install",
          description: `Installing ${config.editorPackage}`,
          packages: [config.editorPackage],
        }),
        aptInstallStep(host, { name: "nginx-install", description: "Installing nginx", packages: ["nginx"] }),
      ]),
      ...inPhase("Reverse proxy", [
        removeDefaultSiteStep(host),
        writeSiteConfigStep(host, config.siteName, siteConfig),
        enableSiteStep(host, config.siteName),
        validateNginxStep(host),
        restartNginxStep(host),
      ]),
      ...inPhase("Python runtime", [installPythonStep(host, python)]),
      ...inPhase("Verification", [unitActiveStep(host, "nginx"), nginxVersionStep(host), pythonVersionStep(host, python)]),
    ]
  }

  async provision(): Promise<ProvisionResult> {
    this.logger.info(`=== Provisioning ${this.host.label} ===`)

    const result = await runSteps(this.steps(), progressHooks(this.logger, PROVISION_PHASES))
    const versions = readVersions(result)

    if (result.ok) {
      this.logger.info(`✓ Host provisioned (nginx ${versions.nginx ?? "unknown"}, Python ${versions.python ?? "unknown"})`)
    }
    return { ...result, versions }
  }
}

function readVersions(result: PipelineResult): InstalledVersions {
  // Both tools have printed their version to stderr at some point in their history
  const nginx = findStep(result, "nginx-version")
  const python = findStep(result, "python-version")
  return {
    nginx: nginx && parseNginxVersion(`${nginx.stderr}\n${nginx.stdout}`),
    python: python && parsePythonVersion(`${python.stdout}\n${python.stderr}`),
  }
}
