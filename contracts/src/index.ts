// index.ts - Re-exports from all modules

// Wire types & schemas
export type {
  SupportedOSType,
  OSType,
  OSArch,
  InstanceStatus,
  RunnerApplicationDownload,
  BootstrapInstance,
  Address,
  ProviderInstance,
} from './types';

export {
  OS_TYPES,
  isSupportedOSType,
  OSTypeSchema,
  OSArchSchema,
  InstanceStatusSchema,
  RunnerApplicationDownloadSchema,
  BootstrapInstanceSchema,
  AddressSchema,
  ProviderInstanceSchema,
} from './types';

// Errors
export type { RunnerProviderErrorCode, ErrorCategory } from './errors';

export {
  RunnerProviderError,
  categorizeErrorCode,
  invalidSpec,
  invalidArgument,
  notFound,
  isRunnerProviderError,
  isNotFound,
  wrapWithOperation,
  withOperation,
} from './errors';
