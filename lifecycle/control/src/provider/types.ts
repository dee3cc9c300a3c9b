// provider/types.ts - Provider Interface & Type Definitions

import type {
  Address,
  BootstrapInstance,
  InstanceStatus,
  ProviderInstance,
  RunnerApplicationDownload,
} from "@ec2-runner/contracts";

// =============================================================================
// Tag Convention
// =============================================================================

export const TAG_NAME = "Name";
export const TAG_POOL_ID = "GARM_POOL_ID";
export const TAG_CONTROLLER_ID = "GARM_CONTROLLER_ID";
export const TAG_OS_TYPE = "OSType";
export const TAG_OS_ARCH = "OSArch";

export const DEFAULT_LAUNCH_COUNT = 1;

// =============================================================================
// Provider Interface (orchestrator-facing verbs)
// =============================================================================

export interface ExternalProvider {
  createInstance(bootstrap: BootstrapInstance, signal?: AbortSignal): Promise<ProviderInstance>;
  deleteInstance(identifier: string, signal?: AbortSignal): Promise<void>;
  getInstance(identifier: string, signal?: AbortSignal): Promise<ProviderInstance>;
  listInstances(poolId: string, signal?: AbortSignal): Promise<ProviderInstance[]>;
  removeAllInstances(signal?: AbortSignal): Promise<void>;
  stop(identifier: string, force: boolean, signal?: AbortSignal): Promise<void>;
  start(identifier: string, signal?: AbortSignal): Promise<void>;
}

// =============================================================================
// Runner Spec
// =============================================================================

export interface RunnerSpec {
  readonly region: string;
  readonly controllerId: string;
  readonly tools: RunnerApplicationDownload;
  readonly bootstrapParams: BootstrapInstance;
  readonly userData: string;
  readonly minCount: number;
  readonly maxCount: number;
  readonly subnetId?: string;
  readonly securityGroupIds?: readonly string[];
  readonly openInboundPorts?: Readonly<Record<string, readonly number[]>>;
  readonly blockDeviceMapping?: string;
}

/** Overrides decoded from a bootstrap request's extra_specs. */
export interface ExtraSpecs {
  minCount?: number;
  maxCount?: number;
  subnetId?: string;
  securityGroupIds?: string[];
  openInboundPorts?: Record<string, number[]>;
  blockDeviceMapping?: string;
}

// =============================================================================
// User-data Generation
// =============================================================================

/**
 * Produces the boot payload that turns a fresh instance into a registered
 * runner. Returns plain text; the spec builder base64-encodes it.
 */
export type UserDataGenerator = (
  bootstrap: BootstrapInstance,
  tools: RunnerApplicationDownload,
  runnerName: string,
) => string;

// =============================================================================
// Managed Instance
// =============================================================================

export interface ManagedInstance {
  providerId: string;
  name: string;
  poolId?: string;
  controllerId?: string;
  osType: string;
  osArch: string;
  osVersion?: string;
  addresses: Address[];
  status: InstanceStatus;
}

export interface InstanceTagFilter {
  controllerId: string;
  name: string;
}
