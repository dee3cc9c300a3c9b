// index.ts - @ec2-runner/lifecycle public surface

export { AWSRunnerProvider, toProviderInstance } from "./provider/runner-provider";
export type { AWSRunnerProviderOptions } from "./provider/runner-provider";
export {
  AWSComputeClient,
  computeConfigFromProviderConfig,
  isProviderInstanceId,
  mapEC2State,
  mapToManagedInstance,
} from "./provider/compute/aws";
export type { AWSComputeConfig } from "./provider/compute/aws";
export { getAwsErrorCode, mapEC2Error, withEC2ErrorMapping } from "./provider/errors";
export { loadConfig, parseConfig, validateConfig } from "./provider/config";
export type { ProviderConfig, AWSCredentialsConfig } from "./provider/config";
export {
  buildRunnerSpec,
  mergeExtraSpecs,
  validateRunnerSpec,
  composeUserData,
  securityRules,
  blockDeviceMappings,
} from "./provider/spec/runner-spec";
export { parseExtraSpecs } from "./provider/spec/extra-specs";
export { getTools } from "./provider/spec/tools";
export { generateUserData } from "./provider/bootstrap";
export * from "./provider/types";
