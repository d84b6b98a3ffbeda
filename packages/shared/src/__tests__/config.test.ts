import { mkdtempSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterAll, describe, expect, it } from "vitest"
import {
  getDefaultDeployDir,
  getEnabledSitePath,
  getLockPath,
  getPythonBinary,
  getSiteConfigPath,
  loadDeployConfig,
} from "../config"
import { defaultDeployConfig, parseDeployConfig } from "../deploy-config-schema"

describe("parseDeployConfig", () => {
  it("fills every default from an empty object", () => {
    expect(parseDeployConfig("{}")).toEqual({
      branch: "main",
      remote: "origin",
      serviceName: "fastapi.service",
      siteName: "fastapi",
      appPort: 8000,
      proxyListenPort: 80,
      upstreamHost: "127.0.0.1",
      pythonVersion: "3.9",
      venvDir: "venv",
      requirementsFile: "requirements.txt",
      editorPackage: "vim",
      fileMode: "755",
      rsync: { delete: false, exclude: [] },
    })
  })

  it("keeps overrides and fills nested defaults", () => {
    const config = parseDeployConfig(
      JSON.stringify({ serviceName: "api.service", appPort: 9000, rsync: { exclude: [".git"] } }),
    )
    expect(config.serviceName).toBe("api.service")
    expect(config.appPort).toBe(9000)
    expect(config.rsync).toEqual({ delete: false, exclude: [".git"] })
  })

  it("rejects unknown keys", () => {
    expect(() => parseDeployConfig(JSON.stringify({ servicename: "api.service" }))).toThrow()
  })

  it("rejects malformed JSON with a readable message", () => {
    expect(() => parseDeployConfig("{ branch: main }")).toThrow("Invalid JSON in deploy config")
  })

  it("rejects a venv path that escapes the deploy directory", () => {
    expect(() => parseDeployConfig(JSON.stringify({ venvDir: "../venv" }))).toThrow()
    expect(() => parseDeployConfig(JSON.stringify({ venvDir: "/opt/venv" }))).toThrow()
  })

  it("rejects ports outside 1-65535", () => {
    expect(() => parseDeployConfig(JSON.stringify({ appPort: 70000 }))).toThrow()
  })
})

describe("loadDeployConfig", () => {
  const dir = mkdtempSync(join(tmpdir(), "deploy-config-"))

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it("returns defaults without a path", () => {
    expect(loadDeployConfig()).toEqual(defaultDeployConfig())
  })

  it("reads the file at the given path", () => {
    const file = join(dir, "deploy-config.json")
    writeFileSync(file, JSON.stringify({ branch: "production" }))
    expect(loadDeployConfig(file).branch).toBe("production")
  })

  it("fails when the path does not exist", () => {
    expect(() => loadDeployConfig(join(dir, "missing.json"))).toThrow("FATAL: Cannot read deploy config")
  })
})

describe("derived paths", () => {
  it("places the site under nginx sites-available and sites-enabled", () => {
    expect(getSiteConfigPath("fastapi")).toBe("/etc/nginx/sites-available/fastapi")
    expect(getEnabledSitePath("fastapi")).toBe("/etc/nginx/sites-enabled/fastapi")
  })

  it("derives the deploy directory from user and repository name", () => {
    expect(getDefaultDeployDir("deploy", "acme/health-api")).toBe("/home/deploy/health-api")
    expect(() => getDefaultDeployDir("deploy", "..")).toThrow("Invalid repository name")
  })

  it("keeps the lock inside the deploy directory", () => {
    expect(getLockPath("/home/deploy/health-api")).toBe("/home/deploy/health-api/.deploy.lock")
  })

  it("names the python binary after the pinned version", () => {
    expect(getPythonBinary({ pythonVersion: "3.9" })).toBe("python3.9")
  })
})
