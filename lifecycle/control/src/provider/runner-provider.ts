// provider/runner-provider.ts - Orchestrator-facing runner provider
//
// Maps the external-provider verbs onto the EC2 compute client. Instances are
// addressed either by instance ID or by runner name; names are resolved
// through tags scoped to this controller.

import {
  isNotFound,
  withOperation,
  type BootstrapInstance,
  type ProviderInstance,
} from "@ec2-runner/contracts";
import { generateUserData } from "./bootstrap";
import {
  AWSComputeClient,
  computeConfigFromProviderConfig,
  isProviderInstanceId,
} from "./compute/aws";
import { loadConfig, type ProviderConfig } from "./config";
import { buildRunnerSpec } from "./spec/runner-spec";
import type { ExternalProvider, ManagedInstance, UserDataGenerator } from "./types";

export interface AWSRunnerProviderOptions {
  config: ProviderConfig;
  controllerId: string;
  /** Defaults to a client built from config. */
  compute?: AWSComputeClient;
  generateUserData?: UserDataGenerator;
}

export class AWSRunnerProvider implements ExternalProvider {
  readonly controllerId: string;
  private readonly config: ProviderConfig;
  private readonly compute: AWSComputeClient;
  private readonly userDataGenerator: UserDataGenerator;

  constructor(options: AWSRunnerProviderOptions) {
    this.config = options.config;
    this.controllerId = options.controllerId;
    this.compute = options.compute ?? new AWSComputeClient(computeConfigFromProviderConfig(options.config));
    this.userDataGenerator = options.generateUserData ?? generateUserData;
  }

  static fromConfigFile(configPath: string, controllerId: string): AWSRunnerProvider {
    return new AWSRunnerProvider({ config: loadConfig(configPath), controllerId });
  }

  async createInstance(bootstrap: BootstrapInstance, signal?: AbortSignal): Promise<ProviderInstance> {
    return withOperation("CreateInstance", async () => {
      const spec = buildRunnerSpec(this.config, bootstrap, this.controllerId, this.userDataGenerator);
      console.debug(
        `[provider] Launching ${bootstrap.name}: ${bootstrap.flavor} from ${bootstrap.image}, count ${spec.minCount}-${spec.maxCount}`,
      );
      const providerId = await this.compute.createRunningInstance(spec, signal);

      return {
        provider_id: providerId,
        name: spec.bootstrapParams.name,
        os_type: spec.bootstrapParams.os_type,
        os_arch: spec.bootstrapParams.os_arch,
        status: "running",
      };
    });
  }

  /**
   * Terminate by ID or name. An instance that is already gone counts as
   * deleted, so repeating a delete succeeds.
   */
  async deleteInstance(identifier: string, signal?: AbortSignal): Promise<void> {
    return withOperation("DeleteInstance", async () => {
      let providerId = identifier;
      if (!isProviderInstanceId(identifier)) {
        try {
          providerId = (await this.lookupByName(identifier, signal)).providerId;
        } catch (err) {
          if (!isNotFound(err)) throw err;
          console.log(`[provider] ${identifier} not found; nothing to delete`);
          return;
        }
      }

      try {
        await this.compute.terminateInstance(providerId, signal);
      } catch (err) {
        if (!isNotFound(err)) throw err;
        console.log(`[provider] ${providerId} already gone`);
      }
    });
  }

  async getInstance(identifier: string, signal?: AbortSignal): Promise<ProviderInstance> {
    return withOperation("GetInstance", async () => toProviderInstance(await this.resolve(identifier, signal)));
  }

  async listInstances(poolId: string, signal?: AbortSignal): Promise<ProviderInstance[]> {
    return withOperation("ListInstances", async () => {
      const instances = await this.compute.listDescribedInstances(poolId, signal);
      return instances.map(toProviderInstance);
    });
  }

  /** Pool teardown is left to the orchestrator, which deletes runners one by one. */
  async removeAllInstances(_signal?: AbortSignal): Promise<void> {
    console.log("[provider] RemoveAllInstances is a no-op");
  }

  async stop(identifier: string, force: boolean, signal?: AbortSignal): Promise<void> {
    return withOperation("StopInstance", async () => {
      const providerId = await this.resolveProviderId(identifier, signal);
      await this.compute.stopInstance(providerId, force, signal);
    });
  }

  async start(identifier: string, signal?: AbortSignal): Promise<void> {
    return withOperation("StartInstance", async () => {
      const providerId = await this.resolveProviderId(identifier, signal);
      await this.compute.startInstance(providerId, signal);
    });
  }

  // ─── Private ──────────────────────────────────────────────────────────────

  private lookupByName(name: string, signal?: AbortSignal): Promise<ManagedInstance> {
    return this.compute.findInstanceByTags({ controllerId: this.controllerId, name }, signal);
  }

  private resolve(identifier: string, signal?: AbortSignal): Promise<ManagedInstance> {
    return isProviderInstanceId(identifier)
      ? this.compute.getInstance(identifier, signal)
      : this.lookupByName(identifier, signal);
  }

  private async resolveProviderId(identifier: string, signal?: AbortSignal): Promise<string> {
    if (isProviderInstanceId(identifier)) return identifier;
    return (await this.lookupByName(identifier, signal)).providerId;
  }
}

export function toProviderInstance(inst: ManagedInstance): ProviderInstance {
  const result: ProviderInstance = {
    provider_id: inst.providerId,
    name: inst.name,
    os_type: inst.osType,
    os_arch: inst.osArch,
    status: inst.status,
  };
  if (inst.osVersion) result.os_version = inst.osVersion;
  if (inst.addresses.length > 0) result.addresses = inst.addresses;
  return result;
}
