// provider/bootstrap/cloud-init.ts - Cloud-init assembler
//
// Assembles a complete #cloud-config YAML document for a Linux runner by
// collecting and merging cloud-init snippets, then serialising manually
// (no external YAML library — cloud-init's subset is structured enough to
// build directly).

import type { BootstrapInstance, RunnerApplicationDownload } from "@ec2-runner/contracts";
import type { CloudInitSnippet, CloudInitUser, WriteFileEntry } from "./snippets";
import {
  basePackages,
  caCertBundle,
  disableAptDaily,
  installRunner,
  runnerUser,
} from "./snippets";
import { renderLinuxInstallScript } from "./install-script";

// =============================================================================
// YAML helpers
// =============================================================================

/**
 * Escape a YAML scalar as a single-quoted string.
 * Single-quoted YAML scalars only need ' doubled to ''.
 */
function yamlSingleQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Serialise a string value as a YAML literal block scalar (the | style).
 * Each line of the content is indented by the given prefix.
 * A trailing newline is added if the content does not already end with one.
 */
function yamlLiteralBlock(content: string, indent: string): string {
  const normalised = content.endsWith("\n") ? content : content + "\n";
  const lines = normalised.slice(0, -1).split("\n");
  return "|\n" + lines.map((line) => (line ? indent + line : "")).join("\n");
}

/**
 * Serialise a single write_files entry.
 *
 * Example output:
 *   - path: /install_runner.sh
 *     content: |
 *       #!/bin/bash
 *     permissions: '0755'
 *     owner: root:root
 */
function serialiseWriteFile(entry: WriteFileEntry): string {
  const lines: string[] = [];
  lines.push(`- path: ${entry.path}`);
  if (entry.encoding) {
    lines.push(`  encoding: ${entry.encoding}`);
  }
  lines.push(`  content: ${yamlLiteralBlock(entry.content, "    ")}`);
  if (entry.permissions != null) {
    lines.push(`  permissions: ${yamlSingleQuote(entry.permissions)}`);
  }
  if (entry.owner != null) {
    lines.push(`  owner: ${entry.owner}`);
  }
  return lines.join("\n");
}

function serialiseUser(user: CloudInitUser): string {
  const lines: string[] = [];
  lines.push(`- name: ${user.name}`);
  lines.push(`  shell: ${user.shell}`);
  if (user.sudo) {
    lines.push(`  sudo: ${yamlSingleQuote(user.sudo)}`);
  }
  if (user.groups?.length) {
    lines.push(`  groups: ${user.groups.join(", ")}`);
  }
  if (user.sshAuthorizedKeys.length > 0) {
    lines.push("  ssh_authorized_keys:");
    for (const key of user.sshAuthorizedKeys) {
      lines.push(`  - ${yamlSingleQuote(key)}`);
    }
  }
  return lines.join("\n");
}

/**
 * Serialise a single runcmd entry (array of strings) as a YAML flow sequence.
 *
 * Example output:
 *   - ["systemctl", "disable", "--now", "apt-daily.timer"]
 */
function serialiseRuncmdEntry(cmd: string[]): string {
  const items = cmd.map((s) => JSON.stringify(s)).join(", ");
  return `- [${items}]`;
}

// =============================================================================
// Assembler
// =============================================================================

/**
 * Collect all snippets in canonical order and merge their users, write_files,
 * runcmd and packages arrays into a single flat structure.
 */
function collectSnippets(
  bootstrap: BootstrapInstance,
  tools: RunnerApplicationDownload,
  runnerName: string,
): Required<CloudInitSnippet> {
  const caBundle = bootstrap["ca-cert-bundle"];
  const snippets: CloudInitSnippet[] = [
    disableAptDaily(),
    basePackages(),
    runnerUser(bootstrap["ssh-keys"] ?? []),
    ...(caBundle ? [caCertBundle(caBundle)] : []),
    installRunner(renderLinuxInstallScript(bootstrap, tools, runnerName)),
  ];

  const merged: Required<CloudInitSnippet> = { users: [], writeFiles: [], runcmd: [], packages: [] };
  for (const snippet of snippets) {
    if (snippet.users) merged.users.push(...snippet.users);
    if (snippet.writeFiles) merged.writeFiles.push(...snippet.writeFiles);
    if (snippet.runcmd) merged.runcmd.push(...snippet.runcmd);
    if (snippet.packages) merged.packages.push(...snippet.packages);
  }
  return merged;
}

/** Assemble a #cloud-config user-data document for a Linux runner. */
export function assembleCloudInit(
  bootstrap: BootstrapInstance,
  tools: RunnerApplicationDownload,
  runnerName: string,
): string {
  const { users, writeFiles, runcmd, packages } = collectSnippets(bootstrap, tools, runnerName);

  const sections: string[] = ["#cloud-config"];

  if (packages.length > 0) {
    sections.push(`packages:\n${packages.map((p) => `- ${p}`).join("\n")}`);
  }

  if (users.length > 0) {
    sections.push(`users:\n- default\n${users.map(serialiseUser).join("\n")}`);
  }

  if (writeFiles.length > 0) {
    sections.push(`write_files:\n${writeFiles.map(serialiseWriteFile).join("\n")}`);
  }

  if (runcmd.length > 0) {
    sections.push(`runcmd:\n${runcmd.map(serialiseRuncmdEntry).join("\n")}`);
  }

  return sections.join("\n") + "\n";
}
