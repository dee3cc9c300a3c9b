// tests/fixtures.ts - Shared bootstrap requests and provider config

import {
  RunnerProviderError,
  type BootstrapInstance,
  type RunnerApplicationDownload,
} from "@ec2-runner/contracts";
import type { ProviderConfig } from "../control/src/provider/config";

export const LINUX_X64_TOOL: RunnerApplicationDownload = {
  os: "linux",
  architecture: "x64",
  download_url: "https://example.com/runner/actions-runner-linux-x64.tar.gz",
  filename: "actions-runner-linux-x64.tar.gz",
  sha256_checksum: "abc123",
};

export const LINUX_ARM64_TOOL: RunnerApplicationDownload = {
  os: "linux",
  architecture: "arm64",
  download_url: "https://example.com/runner/actions-runner-linux-arm64.tar.gz",
  filename: "actions-runner-linux-arm64.tar.gz",
};

export const WIN_X64_TOOL: RunnerApplicationDownload = {
  os: "win",
  architecture: "x64",
  download_url: "https://example.com/runner/actions-runner-win-x64.zip",
  filename: "actions-runner-win-x64.zip",
};

export function makeBootstrap(overrides: Partial<BootstrapInstance> = {}): BootstrapInstance {
  return {
    name: "runner-1",
    tools: [LINUX_ARM64_TOOL, LINUX_X64_TOOL, WIN_X64_TOOL],
    repo_url: "https://github.example.com/org/repo",
    "callback-url": "https://garm.example.com/api/v1/callbacks",
    "metadata-url": "https://garm.example.com/api/v1/metadata",
    "instance-token": "test-token",
    os_type: "linux",
    os_arch: "amd64",
    flavor: "t3.small",
    image: "ami-00000000000000001",
    pool_id: "pool-A",
    labels: ["self-hosted", "linux"],
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<ProviderConfig> = {}): ProviderConfig {
  return {
    region: "us-east-1",
    subnet_id: "subnet-default",
    credentials: {
      access_key_id: "test-key",
      secret_access_key: "test-secret",
      session_token: "test-session",
    },
    ...overrides,
  };
}

// =============================================================================
// Error capture
// =============================================================================

export function catchProviderError(fn: () => unknown): RunnerProviderError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RunnerProviderError) return err;
    throw err;
  }
  throw new Error("expected a RunnerProviderError, nothing was thrown");
}

export async function rejectionOf(promise: Promise<unknown>): Promise<RunnerProviderError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof RunnerProviderError) return err;
    throw err;
  }
  throw new Error("expected a RunnerProviderError, the promise resolved");
}
