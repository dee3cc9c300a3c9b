// cli/src/environment.ts — Provider invocation environment
//
// The orchestrator runs this executable once per operation and passes all
// inputs through environment variables. Only the bootstrap request for
// CreateInstance arrives on stdin.

import { invalidArgument } from '@ec2-runner/contracts';

export const PROVIDER_COMMANDS = [
  'CreateInstance',
  'DeleteInstance',
  'GetInstance',
  'ListInstances',
  'StartInstance',
  'StopInstance',
  'RemoveAllInstances',
] as const;

export type ProviderCommand = typeof PROVIDER_COMMANDS[number];

export interface ProviderEnvironment {
  command: ProviderCommand;
  controllerId: string;
  configFile: string;
  poolId?: string;
  instanceId?: string;
  debug: boolean;
}

function isProviderCommand(value: string): value is ProviderCommand {
  return PROVIDER_COMMANDS.some((command) => command === value);
}

function required(env: Record<string, string | undefined>, key: string): string {
  const value = env[key]?.trim();
  if (!value) throw invalidArgument(`missing ${key}`);
  return value;
}

/**
 * Read and validate the invocation environment.
 * Accepts an optional env override for testing.
 */
export function readEnvironment(env: Record<string, string | undefined> = process.env): ProviderEnvironment {
  const command = required(env, 'GARM_COMMAND');
  if (!isProviderCommand(command)) {
    throw invalidArgument(`unknown GARM_COMMAND: ${command}`);
  }

  const result: ProviderEnvironment = {
    command,
    controllerId: required(env, 'GARM_CONTROLLER_ID'),
    configFile: required(env, 'GARM_PROVIDER_CONFIG_FILE'),
    debug: env['GARM_PROVIDER_DEBUG'] === '1' || env['GARM_PROVIDER_DEBUG'] === 'true',
  };

  switch (command) {
    case 'ListInstances':
    case 'RemoveAllInstances':
      result.poolId = required(env, 'GARM_POOL_ID');
      break;
    case 'DeleteInstance':
    case 'GetInstance':
    case 'StartInstance':
    case 'StopInstance':
      result.instanceId = required(env, 'GARM_INSTANCE_ID');
      break;
    case 'CreateInstance':
      break;
  }

  return result;
}
