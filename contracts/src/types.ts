// types.ts - Orchestrator wire types
//
// Shapes exchanged with the orchestrator over the external-provider protocol.
// Field names follow the orchestrator's JSON exactly (snake_case and a few
// kebab-case keys), so these are schemas first and TypeScript types second.

import { Type, type Static } from '@sinclair/typebox';

// =============================================================================
// Enumerations
// =============================================================================

export const OS_TYPES = ['linux', 'windows'] as const;
export type SupportedOSType = (typeof OS_TYPES)[number];

export const OSTypeSchema = Type.String();
export type OSType = Static<typeof OSTypeSchema>;

export const OSArchSchema = Type.String();
export type OSArch = Static<typeof OSArchSchema>;

export const InstanceStatusSchema = Type.Union([
  Type.Literal('pending'),
  Type.Literal('running'),
  Type.Literal('stopping'),
  Type.Literal('stopped'),
  Type.Literal('terminated'),
  Type.Literal('unknown'),
]);
export type InstanceStatus = Static<typeof InstanceStatusSchema>;

export function isSupportedOSType(osType: string): osType is SupportedOSType {
  return (OS_TYPES as readonly string[]).includes(osType);
}

// =============================================================================
// Tool Catalog
// =============================================================================

export const RunnerApplicationDownloadSchema = Type.Object({
  os: Type.String(),
  architecture: Type.String(),
  download_url: Type.String(),
  filename: Type.String(),
  sha256_checksum: Type.Optional(Type.String()),
  temp_download_token: Type.Optional(Type.String()),
});
export type RunnerApplicationDownload = Static<typeof RunnerApplicationDownloadSchema>;

// =============================================================================
// Bootstrap Request
// =============================================================================

export const BootstrapInstanceSchema = Type.Object({
  name: Type.String(),
  tools: Type.Array(RunnerApplicationDownloadSchema),
  repo_url: Type.String(),
  'callback-url': Type.String(),
  'metadata-url': Type.String(),
  'instance-token': Type.String(),
  'ssh-keys': Type.Optional(Type.Union([Type.Array(Type.String()), Type.Null()])),
  extra_specs: Type.Optional(Type.Unknown()),
  'github-runner-group': Type.Optional(Type.String()),
  'ca-cert-bundle': Type.Optional(Type.Union([Type.String(), Type.Null()])),
  os_type: OSTypeSchema,
  os_arch: OSArchSchema,
  flavor: Type.String(),
  image: Type.String(),
  labels: Type.Optional(Type.Union([Type.Array(Type.String()), Type.Null()])),
  pool_id: Type.String(),
  jit_config_enabled: Type.Optional(Type.Boolean()),
});
export type BootstrapInstance = Static<typeof BootstrapInstanceSchema>;

// =============================================================================
// Instance Record
// =============================================================================

export const AddressSchema = Type.Object({
  address: Type.String(),
  type: Type.Union([Type.Literal('public'), Type.Literal('private')]),
});
export type Address = Static<typeof AddressSchema>;

export const ProviderInstanceSchema = Type.Object({
  provider_id: Type.String(),
  name: Type.String(),
  os_type: OSTypeSchema,
  os_arch: OSArchSchema,
  os_name: Type.Optional(Type.String()),
  os_version: Type.Optional(Type.String()),
  addresses: Type.Optional(Type.Array(AddressSchema)),
  status: InstanceStatusSchema,
  provider_fault: Type.Optional(Type.String()),
});
export type ProviderInstance = Static<typeof ProviderInstanceSchema>;
