// provider/bootstrap/install-script.ts - Runner install scripts
//
// The script bodies live in ./templates. Each render prepends the per-runner
// variables, quoted for the target shell, so the body never interpolates
// untrusted text itself.

import { readFileSync } from "fs";
import type { BootstrapInstance, RunnerApplicationDownload } from "@ec2-runner/contracts";
import { RUNNER_HOME, RUNNER_USER } from "./snippets";

const templateCache = new Map<string, string>();

function loadTemplate(name: string): string {
  let body = templateCache.get(name);
  if (body === undefined) {
    body = readFileSync(new URL(`./templates/${name}`, import.meta.url), "utf-8");
    templateCache.set(name, body);
  }
  return body;
}

// =============================================================================
// Quoting
// =============================================================================

/**
 * Quote a single shell argument if it contains characters that need quoting.
 * Uses single-quotes; embeds literal single-quotes via '\''.
 */
export function shellQuote(arg: string): string {
  if (/^[a-zA-Z0-9_./:@=+-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

/** PowerShell single-quoted literal: only ' needs doubling. */
export function powershellQuote(arg: string): string {
  return `'${arg.replace(/'/g, "''")}'`;
}

// =============================================================================
// Variables
// =============================================================================

interface InstallVariables {
  callbackUrl: string;
  metadataUrl: string;
  bearerToken: string;
  repoUrl: string;
  runnerName: string;
  runnerLabels: string;
  runnerGroup: string;
  jitConfigEnabled: boolean;
  downloadUrl: string;
  filename: string;
  tempToken: string;
  sha256: string;
}

function installVariables(
  bootstrap: BootstrapInstance,
  tools: RunnerApplicationDownload,
  runnerName: string,
): InstallVariables {
  return {
    callbackUrl: bootstrap["callback-url"],
    metadataUrl: bootstrap["metadata-url"],
    bearerToken: bootstrap["instance-token"],
    repoUrl: bootstrap.repo_url,
    runnerName,
    runnerLabels: (bootstrap.labels ?? []).join(","),
    runnerGroup: bootstrap["github-runner-group"] ?? "",
    jitConfigEnabled: bootstrap.jit_config_enabled ?? false,
    downloadUrl: tools.download_url,
    filename: tools.filename,
    tempToken: tools.temp_download_token ?? "",
    sha256: tools.sha256_checksum ?? "",
  };
}

// =============================================================================
// Renderers
// =============================================================================

export function renderLinuxInstallScript(
  bootstrap: BootstrapInstance,
  tools: RunnerApplicationDownload,
  runnerName: string,
): string {
  const v = installVariables(bootstrap, tools, runnerName);
  const assignments: Array<[string, string]> = [
    ["CALLBACK_URL", v.callbackUrl],
    ["METADATA_URL", v.metadataUrl],
    ["BEARER_TOKEN", v.bearerToken],
    ["REPO_URL", v.repoUrl],
    ["RUNNER_NAME", v.runnerName],
    ["RUNNER_LABELS", v.runnerLabels],
    ["RUNNER_GROUP", v.runnerGroup],
    ["JIT_CONFIG_ENABLED", v.jitConfigEnabled ? "true" : "false"],
    ["DOWNLOAD_URL", v.downloadUrl],
    ["FILENAME", v.filename],
    ["TEMP_TOKEN", v.tempToken],
    ["SHA256", v.sha256],
    ["RUNNER_USER", RUNNER_USER],
    ["RUN_HOME", `${RUNNER_HOME}/actions-runner`],
  ];

  const header = assignments
    .map(([key, value]) => `${key}=${value === "" ? '""' : shellQuote(value)}`)
    .join("\n");

  return `#!/bin/bash\n\n${header}\n\n${loadTemplate("install_runner.sh")}`;
}

export function renderWindowsInstallScript(
  bootstrap: BootstrapInstance,
  tools: RunnerApplicationDownload,
  runnerName: string,
): string {
  const v = installVariables(bootstrap, tools, runnerName);
  const assignments: Array<[string, string]> = [
    ["CallbackUrl", powershellQuote(v.callbackUrl)],
    ["MetadataUrl", powershellQuote(v.metadataUrl)],
    ["BearerToken", powershellQuote(v.bearerToken)],
    ["RepoUrl", powershellQuote(v.repoUrl)],
    ["RunnerName", powershellQuote(v.runnerName)],
    ["RunnerLabels", powershellQuote(v.runnerLabels)],
    ["RunnerGroup", powershellQuote(v.runnerGroup)],
    ["JitConfigEnabled", v.jitConfigEnabled ? "$true" : "$false"],
    ["DownloadUrl", powershellQuote(v.downloadUrl)],
    ["Filename", powershellQuote(v.filename)],
    ["TempToken", powershellQuote(v.tempToken)],
    ["Sha256", powershellQuote(v.sha256)],
    ["CACertBundle", powershellQuote(bootstrap["ca-cert-bundle"] ?? "")],
    ["RunHome", powershellQuote("C:\\actions-runner")],
  ];

  const header = assignments.map(([key, value]) => `$${key} = ${value}`).join("\n");

  return `<powershell>\n${header}\n\n${loadTemplate("install_runner.ps1")}</powershell>\n`;
}
