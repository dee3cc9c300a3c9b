// provider/bootstrap/snippets.ts - Cloud-init snippet generators
//
// Each function returns a partial cloud-init structure. Snippets are combined
// by assembleCloudInit() in cloud-init.ts into a full #cloud-config document.

// =============================================================================
// Types
// =============================================================================

export interface WriteFileEntry {
  path: string;
  content: string;
  /** "b64" when content is already base64; cloud-init decodes it on write. */
  encoding?: "b64";
  permissions?: string;
  owner?: string;
}

export interface CloudInitUser {
  name: string;
  shell: string;
  sudo?: string;
  groups?: string[];
  sshAuthorizedKeys: string[];
}

export interface CloudInitSnippet {
  users?: CloudInitUser[];
  writeFiles?: WriteFileEntry[];
  runcmd?: string[][];
  packages?: string[];
}

export const RUNNER_USER = "runner";
export const RUNNER_HOME = `/home/${RUNNER_USER}`;
export const INSTALL_SCRIPT_PATH = "/install_runner.sh";
const CA_BUNDLE_PATH = "/usr/local/share/ca-certificates/garm-ca.crt";

// =============================================================================
// Snippet generators
// =============================================================================

/**
 * Disable apt-daily and apt-daily-upgrade timers to prevent lock contention
 * on ephemeral instances. These timers fire shortly after boot and will grab
 * the dpkg lock, blocking the runner's dependency install for minutes.
 */
export function disableAptDaily(): CloudInitSnippet {
  return {
    runcmd: [
      [
        "systemctl",
        "disable",
        "--now",
        "apt-daily.timer",
        "apt-daily-upgrade.timer",
      ],
    ],
  };
}

/** Packages the install script needs before it can fetch anything. */
export function basePackages(): CloudInitSnippet {
  return { packages: ["curl", "tar"] };
}

/**
 * Unprivileged account the runner service runs as. Holds the orchestrator's
 * SSH keys so operators can reach a stuck runner.
 */
export function runnerUser(sshKeys: readonly string[]): CloudInitSnippet {
  return {
    users: [
      {
        name: RUNNER_USER,
        shell: "/bin/bash",
        sudo: "ALL=(ALL) NOPASSWD:ALL",
        groups: ["sudo", "adm"],
        sshAuthorizedKeys: [...sshKeys],
      },
    ],
  };
}

/**
 * Trust the orchestrator's CA bundle so the runner can reach a callback URL
 * served with a private certificate. The bundle arrives base64-encoded.
 */
export function caCertBundle(bundleB64: string): CloudInitSnippet {
  return {
    writeFiles: [
      {
        path: CA_BUNDLE_PATH,
        content: bundleB64,
        encoding: "b64",
        permissions: "0644",
        owner: "root:root",
      },
    ],
    runcmd: [["update-ca-certificates"]],
  };
}

/** Write the runner install script and run it once cloud-init reaches runcmd. */
export function installRunner(script: string): CloudInitSnippet {
  return {
    writeFiles: [
      {
        path: INSTALL_SCRIPT_PATH,
        content: script,
        permissions: "0755",
        owner: "root:root",
      },
    ],
    runcmd: [
      ["chown", "-R", `${RUNNER_USER}:${RUNNER_USER}`, RUNNER_HOME],
      [INSTALL_SCRIPT_PATH],
      ["rm", "-f", INSTALL_SCRIPT_PATH],
    ],
  };
}
