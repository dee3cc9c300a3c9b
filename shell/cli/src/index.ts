// cli/src/index.ts - @ec2-runner/shell public surface

export { runCommand, parseBootstrapInput, exitCodeFor, EXIT_NOT_FOUND, EXIT_FAILURE } from './dispatch';
export type { CommandIO } from './dispatch';
export { readEnvironment, PROVIDER_COMMANDS } from './environment';
export type { ProviderCommand, ProviderEnvironment } from './environment';
export { routeConsoleToStderr } from './logging';
