#!/usr/bin/env tsx
/**
 * Host Provisioning Script
 *
 * One-time baseline setup of the machine this runs on: system packages,
 * nginx in front of the app port, Python runtime. Safe to re-run.
 *
 * Usage: npm run provision
 * Config: DEPLOY_CONFIG_PATH (optional deploy-config.json), LOG_FORMAT, LOG_LEVEL
 */

import {
  deployConfigFromEnv,
  HostProvisioner,
  LocalHost,
  loggerFromEnv,
  reportOutcome,
  runEntryPoint,
} from "@shipwright/deploy-controller"
import { loadEnvFile, loadRuntimeEnv } from "@shipwright/env/server"

async function main(): Promise<number> {
  loadEnvFile()
  const env = loadRuntimeEnv()
  const logger = loggerFromEnv(env, "provision")
  const config = deployConfigFromEnv(env)

  const result = await new HostProvisioner(new LocalHost(), { config, logger }).provision()
  return reportOutcome(result, logger)
}

process.exit(await runEntryPoint("provision", main))
