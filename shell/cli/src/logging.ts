// cli/src/logging.ts — Console routing for the provider process
//
// stdout is reserved for the JSON result the orchestrator parses, so every
// console level is sent to stderr. Debug lines are dropped unless enabled.

import { format } from 'util';

export function routeConsoleToStderr(debug: boolean, stream: NodeJS.WritableStream = process.stderr): void {
  const ts = () => new Date().toISOString();

  const write = (level: string, args: unknown[]) => {
    stream.write(`${ts()} ${level.toUpperCase()} ${format(...args)}\n`);
  };

  console.log = (...args: unknown[]) => write('info', args);
  console.info = (...args: unknown[]) => write('info', args);
  console.warn = (...args: unknown[]) => write('warn', args);
  console.error = (...args: unknown[]) => write('error', args);
  console.debug = debug ? (...args: unknown[]) => write('debug', args) : () => {};
}
