// cli/src/dispatch.ts — Command dispatch
//
// Runs one orchestrator command against a provider and writes its JSON result.
// Process concerns (stdin, exit codes, signals) stay in main.ts so this can be
// driven directly from tests.

import { Value } from '@sinclair/typebox/value';
import {
  BootstrapInstanceSchema,
  invalidArgument,
  isNotFound,
  type BootstrapInstance,
} from '@ec2-runner/contracts';
import type { ExternalProvider } from '@ec2-runner/lifecycle';
import type { ProviderEnvironment } from './environment';

/** Exit code the orchestrator reads as "instance not found". */
export const EXIT_NOT_FOUND = 30;
export const EXIT_FAILURE = 1;

export interface CommandIO {
  readStdin: () => Promise<string>;
  writeStdout: (text: string) => void;
}

/**
 * Decode the bootstrap request CreateInstance receives on stdin.
 */
export function parseBootstrapInput(raw: string): BootstrapInstance {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw invalidArgument(`failed to decode bootstrap params: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!Value.Check(BootstrapInstanceSchema, parsed)) {
    const first = Value.Errors(BootstrapInstanceSchema, parsed).First();
    const where = first ? `${first.path || '/'}: ${first.message}` : 'invalid value';
    throw invalidArgument(`invalid bootstrap params: ${where}`);
  }
  return parsed;
}

function emitJson(io: CommandIO, value: unknown): void {
  io.writeStdout(`${JSON.stringify(value)}\n`);
}

function requireValue(value: string | undefined, name: string): string {
  if (!value) throw invalidArgument(`missing ${name}`);
  return value;
}

export async function runCommand(
  env: ProviderEnvironment,
  provider: ExternalProvider,
  io: CommandIO,
  signal?: AbortSignal,
): Promise<void> {
  switch (env.command) {
    case 'CreateInstance': {
      const bootstrap = parseBootstrapInput(await io.readStdin());
      emitJson(io, await provider.createInstance(bootstrap, signal));
      return;
    }
    case 'GetInstance':
      emitJson(io, await provider.getInstance(requireValue(env.instanceId, 'GARM_INSTANCE_ID'), signal));
      return;
    case 'ListInstances':
      emitJson(io, await provider.listInstances(requireValue(env.poolId, 'GARM_POOL_ID'), signal));
      return;
    case 'DeleteInstance':
      await provider.deleteInstance(requireValue(env.instanceId, 'GARM_INSTANCE_ID'), signal);
      return;
    case 'StartInstance':
      await provider.start(requireValue(env.instanceId, 'GARM_INSTANCE_ID'), signal);
      return;
    case 'StopInstance':
      // The protocol carries no force flag; stops are always graceful.
      await provider.stop(requireValue(env.instanceId, 'GARM_INSTANCE_ID'), false, signal);
      return;
    case 'RemoveAllInstances':
      await provider.removeAllInstances(signal);
      return;
  }
}

export function exitCodeFor(err: unknown): number {
  return isNotFound(err) ? EXIT_NOT_FOUND : EXIT_FAILURE;
}
