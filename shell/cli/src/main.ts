#!/usr/bin/env tsx

// cli/src/main.ts — External provider entry point
//
// One invocation, one command: read the environment, run the command, print
// the result and exit with the code the orchestrator expects.

import { AWSRunnerProvider } from '@ec2-runner/lifecycle';
import { exitCodeFor, runCommand } from './dispatch';
import { readEnvironment } from './environment';
import { routeConsoleToStderr } from './logging';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function main(): Promise<void> {
  const env = readEnvironment();
  routeConsoleToStderr(env.debug);

  const controller = new AbortController();
  const abort = (signal: NodeJS.Signals) => {
    console.warn(`[provider] Received ${signal}; cancelling ${env.command}`);
    controller.abort();
  };
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  const provider = AWSRunnerProvider.fromConfigFile(env.configFile, env.controllerId);
  console.debug(`[provider] ${env.command} controller=${env.controllerId}`);

  await runCommand(
    env,
    provider,
    { readStdin, writeStdout: (text) => process.stdout.write(text) },
    controller.signal,
  );
}

main().then(
  () => process.exit(0),
  (error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(exitCodeFor(error));
  },
);
