import { silentLogger } from "@shipwright/logger"
import { defaultDeployConfig } from "@shipwright/shared"
import { describe, expect, it } from "vitest"
import { DeploymentError } from "../src/errors"
import { parseNginxVersion, renderReverseProxyConfig } from "../src/executors/nginx"
import { HostProvisioner } from "../src/provisioner"
import { FakeHost } from "./fake-host"

const NGINX_T_FAILURE =
  'nginx: [emerg] unknown directive "proxy_pas" in /etc/nginx/sites-enabled/fastapi:6\nnginx: configuration file /etc/nginx/nginx.conf test failed\n'

function provisioner(host: FakeHost) {
  return new HostProvisioner(host, { config: defaultDeployConfig(), logger: silentLogger })
}

describe("renderReverseProxyConfig", () => {
  it("renders a catch-all server block that proxies to the app port", () => {
    expect(renderReverseProxyConfig({ listenPort: 80, upstreamHost: "127.0.0.1", upstreamPort: 8000 })).toBe(
      [
        "server {",
        "    listen 80;",
        "    server_name _;",
        "",
        "    location / {",
        "        proxy_pass http://127.0.0.1:8000;",
        "        proxy_set_header Host $host;",
        "        proxy_set_header X-Real-IP $remote_addr;",
        "        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;",
        "        proxy_set_header X-Forwarded-Proto $scheme;",
        "    }",
        "}",
        "",
      ].join("\n"),
    )
  })

  it("uses a given server name", () => {
    const config = renderReverseProxyConfig({
      listenPort: 8080,
      upstreamHost: "localhost",
      upstreamPort: 9000,
      serverName: "api.example.com",
    })
    expect(config).toContain("    listen 8080;\n    server_name api.example.com;\n")
    expect(config).toContain("        proxy_pass http://localhost:9000;\n")
  })
})

describe("parseNginxVersion", () => {
  it("reads the version from nginx -v output", () => {
    expect(parseNginxVersion("nginx version: nginx/1.18.0 (Ubuntu)\n")).toBe("1.18.0")
    expect(parseNginxVersion("")).toBeUndefined()
  })
})

describe("HostProvisioner", () => {
  it("runs the baseline steps in order", async () => {
    const host = new FakeHost()
    const result = await provisioner(host).provision()

    expect(result.ok).toBe(true)
    expect(host.lines()).toEqual([
      "apt-get update",
      "apt-get upgrade -y",
      "apt-get install -y vim",
      "apt-get install -y nginx",
      "rm -f /etc/nginx/sites-available/default",
      "rm -f /etc/nginx/sites-enabled/default",
      "tee /etc/nginx/sites-available/fastapi",
      "ln -sf /etc/nginx/sites-available/fastapi /etc/nginx/sites-enabled/fastapi",
      "nginx -t",
      "systemctl restart nginx",
      "apt-get install -y python3.9 python3.9-venv python3.9-dev",
      "systemctl is-active nginx",
      "nginx -v",
      "python3.9 --version",
    ])
  })

  it("runs package and nginx commands with root privileges", async () => {
    const host = new FakeHost()
    await provisioner(host).provision()

    const privileged = host.calls.filter(call => call.sudo).map(call => call.argv.join(" "))
    expect(privileged).toContain("apt-get update")
    expect(privileged).toContain("nginx -t")
    expect(privileged).toContain("systemctl restart nginx")
    expect(privileged).not.toContain("nginx -v")
  })

  it("writes the rendered site config through tee's stdin", async () => {
    const host = new FakeHost()
    await provisioner(host).provision()

    const tee = host.calls.find(call => call.argv[0] === "tee")
    expect(tee?.input).toBe(renderReverseProxyConfig({ listenPort: 80, upstreamHost: "127.0.0.1", upstreamPort: 8000 }))
  })

  it("reports the installed versions", async () => {
    const host = new FakeHost()
      .on("nginx -v", { stderr: "nginx version: nginx/1.18.0 (Ubuntu)\n" })
      .on("python3.9 --version", { stdout: "Python 3.9.18\n" })

    const result = await provisioner(host).provision()

    expect(result.versions).toEqual({ nginx: "1.18.0", python: "3.9.18" })
  })

  it("never restarts nginx when the config check fails", async () => {
    const host = new FakeHost().on("nginx -t", { exitCode: 1, stderr: NGINX_T_FAILURE })

    const result = await provisioner(host).provision()

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.failure.kind).toBe("ConfigValidationFailure")
    expect(result.failure.step).toBe("nginx-validate")
    expect(host.lines()).not.toContain("systemctl restart nginx")
    expect(host.lines().at(-1)).toBe("nginx -t")
    expect(DeploymentError.fromFailure(result.failure).code).toBe("CONFIG_VALIDATION_FAILED")
  })

  it("fails verification when nginx is not active after the restart", async () => {
    const host = new FakeHost().on("systemctl is-active nginx", { exitCode: 3, stdout: "failed\n" })

    const result = await provisioner(host).provision()

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.failure).toMatchObject({ kind: "ServiceRestartFailure", step: "nginx-active", exitCode: 3 })
    expect(host.lines().at(-1)).toBe("systemctl is-active nginx")
  })

  it("stops at a failed package install", async () => {
    const host = new FakeHost().on("apt-get install -y nginx", {
      exitCode: 100,
      stderr: "E: Unable to locate package nginx\n",
    })

    const result = await provisioner(host).provision()

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.failure).toMatchObject({ kind: "PackageInstallFailure", exitCode: 100 })
    expect(host.lines().at(-1)).toBe("apt-get install -y nginx")
    expect(DeploymentError.fromFailure(result.failure).exitCode).toBe(100)
  })

  it("uses the configured editor, site and python version", async () => {
    const host = new FakeHost()
    const config = { ...defaultDeployConfig(), editorPackage: "nano", siteName: "api", pythonVersion: "3.11" }

    await new HostProvisioner(host, { config, logger: silentLogger }).provision()

    expect(host.lines()).toContain("apt-get install -y nano")
    expect(host.lines()).toContain("ln -sf /etc/nginx/sites-available/api /etc/nginx/sites-enabled/api")
    expect(host.lines()).toContain("apt-get install -y python3.11 python3.11-venv python3.11-dev")
  })
})
