// provider/compute/aws.ts - EC2 instance lifecycle
//
// Drives runner instances through the EC2 API with the AWS SDK v3. Nothing is
// cached between calls: identity comes back from the instance tags on every
// describe, so the tags written at launch are the only record this provider
// keeps.

import {
  EC2Client,
  DescribeInstancesCommand,
  RunInstancesCommand,
  StartInstancesCommand,
  StopInstancesCommand,
  TerminateInstancesCommand,
  type DescribeInstancesCommandInput,
  type Filter,
  type Instance,
  type RunInstancesCommandInput,
} from "@aws-sdk/client-ec2";
import {
  RunnerProviderError,
  invalidArgument,
  notFound,
  type Address,
  type InstanceStatus,
} from "@ec2-runner/contracts";
import type { ProviderConfig } from "../config";
import { withEC2ErrorMapping } from "../errors";
import { blockDeviceMappings } from "../spec/runner-spec";
import {
  TAG_CONTROLLER_ID,
  TAG_NAME,
  TAG_OS_ARCH,
  TAG_OS_TYPE,
  TAG_POOL_ID,
  type InstanceTagFilter,
  type ManagedInstance,
  type RunnerSpec,
} from "../types";

// =============================================================================
// EC2 State → Instance Status Mapping
// =============================================================================

export function mapEC2State(state: string | undefined): InstanceStatus {
  switch (state) {
    case "pending":       return "pending";
    case "running":       return "running";
    case "shutting-down": return "stopping";
    case "stopping":      return "stopping";
    case "stopped":       return "stopped";
    case "terminated":    return "terminated";
    default:              return "unknown";
  }
}

/** States a runner can still be acted on in; used by name lookups. */
const LIVE_STATES = ["pending", "running", "stopping", "stopped"];

/** Everything but terminated; used by pool listings. */
const LISTED_STATES = ["pending", "running", "shutting-down", "stopping", "stopped"];

const EC2_ARCHES: Record<string, string> = {
  x86_64: "amd64",
  x86_64_mac: "amd64",
  arm64: "arm64",
  arm64_mac: "arm64",
  i386: "386",
};

// =============================================================================
// Instance ID Detection
// =============================================================================

const INSTANCE_ID_PATTERN = /^i-(?:[0-9a-f]{8}|[0-9a-f]{17})$/;

/** True for a provider-issued instance ID, false for a logical runner name. */
export function isProviderInstanceId(identifier: string): boolean {
  return INSTANCE_ID_PATTERN.test(identifier);
}

// =============================================================================
// Client Config
// =============================================================================

export interface AWSComputeConfig {
  region: string;
  credentials?: { accessKeyId: string; secretAccessKey: string; sessionToken?: string };
  defaultSubnetId?: string;
  /** For tests only: inject a custom EC2Client factory. */
  _ec2ClientFactory?: (region: string) => EC2Client;
}

export function computeConfigFromProviderConfig(config: ProviderConfig): AWSComputeConfig {
  return {
    region: config.region,
    credentials: {
      accessKeyId: config.credentials.access_key_id,
      secretAccessKey: config.credentials.secret_access_key,
      sessionToken: config.credentials.session_token,
    },
    defaultSubnetId: config.subnet_id,
  };
}

// =============================================================================
// Compute Client
// =============================================================================

export class AWSComputeClient {
  readonly region: string;
  private readonly client: EC2Client;
  private readonly defaultSubnetId?: string;

  constructor(config: AWSComputeConfig) {
    this.region = config.region;
    this.defaultSubnetId = config.defaultSubnetId;
    this.client = config._ec2ClientFactory
      ? config._ec2ClientFactory(config.region)
      : new EC2Client({
          region: config.region,
          ...(config.credentials ? { credentials: config.credentials } : {}),
        });
  }

  // ─── Create ───────────────────────────────────────────────────────────────

  /**
   * Launch the instance described by spec and return its instance ID.
   * A failed launch is not retried: RunInstances without a client token is not
   * idempotent.
   */
  async createRunningInstance(spec: RunnerSpec | null | undefined, signal?: AbortSignal): Promise<string> {
    if (!spec) {
      throw invalidArgument("invalid nil runner spec");
    }

    const bootstrap = spec.bootstrapParams;
    const tags: Record<string, string> = {
      [TAG_NAME]: bootstrap.name,
      [TAG_POOL_ID]: bootstrap.pool_id,
      [TAG_OS_TYPE]: bootstrap.os_type,
      [TAG_OS_ARCH]: bootstrap.os_arch,
      [TAG_CONTROLLER_ID]: spec.controllerId,
    };

    return withEC2ErrorMapping("RunInstances", async () => {
      const runParams: RunInstancesCommandInput = {
        ImageId: bootstrap.image,
        InstanceType: bootstrap.flavor as RunInstancesCommandInput["InstanceType"],
        // one runner per request; extra instances would share its Name tag
        MinCount: 1,
        MaxCount: 1,
        UserData: spec.userData,
        TagSpecifications: [
          {
            ResourceType: "instance",
            Tags: Object.entries(tags).map(([Key, Value]) => ({ Key, Value })),
          },
        ],
      };

      const subnetId = spec.subnetId ?? this.defaultSubnetId;
      if (subnetId) runParams.SubnetId = subnetId;
      if (spec.securityGroupIds?.length) runParams.SecurityGroupIds = [...spec.securityGroupIds];

      const mappings = blockDeviceMappings(spec);
      if (mappings) runParams.BlockDeviceMappings = mappings;

      const result = await this.client.send(new RunInstancesCommand(runParams), { abortSignal: signal });
      const instanceId = result.Instances?.[0]?.InstanceId;
      if (!instanceId) {
        throw new RunnerProviderError("PROVIDER_ERROR", "RunInstances returned no instances");
      }

      console.log(`[aws] Launched ${instanceId} for runner ${bootstrap.name} (pool ${bootstrap.pool_id})`);
      return instanceId;
    });
  }

  // ─── Describe ─────────────────────────────────────────────────────────────

  async getInstance(instanceId: string, signal?: AbortSignal): Promise<ManagedInstance> {
    return withEC2ErrorMapping("DescribeInstances", async () => {
      const instances = await this.describe({ InstanceIds: [instanceId] }, signal);
      const inst = instances[0];
      if (!inst) throw notFound("instance", instanceId);
      return mapToManagedInstance(inst);
    });
  }

  /**
   * Find a live runner by controller and name. The controller filter keeps
   * controllers sharing an account from seeing each other's runners.
   */
  async findInstanceByTags(filter: InstanceTagFilter, signal?: AbortSignal): Promise<ManagedInstance> {
    if (!filter.controllerId || !filter.name) {
      throw invalidArgument("tag lookup needs both a controller ID and a name");
    }

    return withEC2ErrorMapping("DescribeInstances", async () => {
      const instances = await this.describe(
        {
          Filters: [
            tagFilter(TAG_CONTROLLER_ID, filter.controllerId),
            tagFilter(TAG_NAME, filter.name),
            { Name: "instance-state-name", Values: LIVE_STATES },
          ],
        },
        signal,
      );
      const inst = instances[0];
      if (!inst) throw notFound("instance", filter.name);
      if (instances.length > 1) {
        console.warn(`[aws] ${instances.length} instances tagged ${filter.name}; using ${inst.InstanceId}`);
      }
      return mapToManagedInstance(inst);
    });
  }

  async listDescribedInstances(poolId: string, signal?: AbortSignal): Promise<ManagedInstance[]> {
    return withEC2ErrorMapping("DescribeInstances", async () => {
      const instances = await this.describe(
        {
          Filters: [
            tagFilter(TAG_POOL_ID, poolId),
            { Name: "instance-state-name", Values: LISTED_STATES },
          ],
        },
        signal,
      );
      return instances.map(mapToManagedInstance);
    });
  }

  // ─── State transitions ────────────────────────────────────────────────────
  //
  // Each returns once EC2 has accepted the request. The transition itself is
  // observed later through getInstance().

  async startInstance(instanceId: string, signal?: AbortSignal): Promise<void> {
    await withEC2ErrorMapping("StartInstances", () =>
      this.client.send(new StartInstancesCommand({ InstanceIds: [instanceId] }), { abortSignal: signal }),
    );
  }

  /**
   * force skips the guest OS shutdown: file system caches are not flushed.
   */
  async stopInstance(instanceId: string, force = false, signal?: AbortSignal): Promise<void> {
    await withEC2ErrorMapping("StopInstances", () =>
      this.client.send(
        new StopInstancesCommand({ InstanceIds: [instanceId], Force: force }),
        { abortSignal: signal },
      ),
    );
  }

  async terminateInstance(instanceId: string, signal?: AbortSignal): Promise<void> {
    await withEC2ErrorMapping("TerminateInstances", () =>
      this.client.send(new TerminateInstancesCommand({ InstanceIds: [instanceId] }), { abortSignal: signal }),
    );
    console.log(`[aws] Terminate requested for ${instanceId}`);
  }

  // ─── Private ──────────────────────────────────────────────────────────────

  /** DescribeInstances across all pages, reservations flattened in provider order. */
  private async describe(input: DescribeInstancesCommandInput, signal?: AbortSignal): Promise<Instance[]> {
    const instances: Instance[] = [];
    let nextToken: string | undefined;
    do {
      const result = await this.client.send(
        new DescribeInstancesCommand({ ...input, NextToken: nextToken }),
        { abortSignal: signal },
      );
      for (const reservation of result.Reservations ?? []) {
        instances.push(...(reservation.Instances ?? []));
      }
      nextToken = result.NextToken;
    } while (nextToken);
    return instances;
  }
}

// =============================================================================
// Mapping
// =============================================================================

function tagFilter(key: string, value: string): Filter {
  return { Name: `tag:${key}`, Values: [value] };
}

function tagValue(inst: Instance, key: string): string | undefined {
  return inst.Tags?.find((t) => t.Key === key)?.Value;
}

export function mapToManagedInstance(inst: Instance): ManagedInstance {
  const addresses: Address[] = [];
  if (inst.PrivateIpAddress) addresses.push({ address: inst.PrivateIpAddress, type: "private" });
  if (inst.PublicIpAddress) addresses.push({ address: inst.PublicIpAddress, type: "public" });

  const platformOs = inst.Platform?.toLowerCase() === "windows" ? "windows" : "linux";
  const ec2Arch = inst.Architecture ? EC2_ARCHES[inst.Architecture] ?? inst.Architecture : "";

  return {
    providerId: inst.InstanceId ?? "",
    name: tagValue(inst, TAG_NAME) ?? "",
    poolId: tagValue(inst, TAG_POOL_ID),
    controllerId: tagValue(inst, TAG_CONTROLLER_ID),
    osType: tagValue(inst, TAG_OS_TYPE) ?? platformOs,
    osArch: tagValue(inst, TAG_OS_ARCH) ?? ec2Arch,
    osVersion: inst.PlatformDetails,
    addresses,
    status: mapEC2State(inst.State?.Name),
  };
}
