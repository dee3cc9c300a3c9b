// provider/config.ts - Read the provider's TOML configuration file
//
// The orchestrator hands each provider invocation a config file path. The file
// carries the region, the default subnet for new runners and a static set of
// AWS credentials:
//
//   region = "us-east-1"
//   subnet_id = "subnet-0abc"
//
//   [credentials]
//   access_key_id = "..."
//   secret_access_key = "..."
//   session_token = "..."

import { readFileSync } from "fs";
import { RunnerProviderError } from "@ec2-runner/contracts";

// =============================================================================
// Provider Config Types
// =============================================================================

export interface AWSCredentialsConfig {
  access_key_id: string;
  secret_access_key: string;
  session_token: string;
}

export interface ProviderConfig {
  region: string;
  subnet_id?: string;
  vpc_id?: string;
  credentials: AWSCredentialsConfig;
}

type TomlValue = string | number | boolean | TomlValue[];
type TomlSections = Record<string, Record<string, TomlValue>>;

const GLOBAL_SECTION = "__global__";

// =============================================================================
// Simple TOML Parser (subset: sections + key=value pairs)
// =============================================================================

/**
 * Parse a minimal TOML-like config. Supports:
 * - [section] headers
 * - key = value (strings, numbers, booleans)
 * - key = "quoted string"
 * - key = [array, of, values]
 * - # comments
 */
export function parseSimpleToml(content: string): TomlSections {
  const result: TomlSections = { [GLOBAL_SECTION]: {} };
  let currentSection = GLOBAL_SECTION;

  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    const sectionMatch = line.match(/^\[([a-zA-Z0-9_.-]+)\]$/);
    if (sectionMatch?.[1]) {
      currentSection = sectionMatch[1];
      result[currentSection] ??= {};
      continue;
    }

    const eqIdx = line.indexOf("=");
    if (eqIdx === -1) continue;

    const key = unquoteKey(line.slice(0, eqIdx).trim());
    const section = (result[currentSection] ??= {});
    section[key] = parseTomlValue(line.slice(eqIdx + 1).trim());
  }

  return result;
}

function unquoteKey(key: string): string {
  if (key.length >= 2 && key.startsWith('"') && key.endsWith('"')) return key.slice(1, -1);
  return key;
}

/**
 * Strip an inline comment (text after an unquoted `#`) from a raw TOML value.
 * A `#` inside a quoted string is not a comment delimiter.
 */
function stripInlineComment(value: string): string {
  let quote: string | null = null;
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if ((ch === '"' || ch === "'") && (i === 0 || value[i - 1] !== "\\")) {
      if (quote === null) quote = ch;
      else if (quote === ch) quote = null;
    }
    if (ch === "#" && quote === null) return value.slice(0, i).trim();
  }
  return value.trim();
}

function parseTomlValue(raw: string): TomlValue {
  const value = stripInlineComment(raw);

  if (value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) ||
       (value.startsWith("'") && value.endsWith("'")))) {
    return value.slice(1, -1);
  }

  if (value.startsWith("[") && value.endsWith("]")) {
    const inner = value.slice(1, -1).trim();
    if (!inner) return [];
    return inner.split(",").map((item) => parseTomlValue(item.trim()));
  }

  if (value === "true") return true;
  if (value === "false") return false;

  const num = Number(value);
  if (!isNaN(num) && value !== "") return num;

  return value;
}

// =============================================================================
// Mapping & Validation
// =============================================================================

function stringField(section: Record<string, TomlValue> | undefined, key: string): string {
  const value = section?.[key];
  return typeof value === "string" ? value : "";
}

function optionalStringField(section: Record<string, TomlValue> | undefined, key: string): string | undefined {
  const value = stringField(section, key);
  return value === "" ? undefined : value;
}

export function mapToProviderConfig(raw: TomlSections): ProviderConfig {
  const global = raw[GLOBAL_SECTION];
  const creds = raw.credentials;
  return {
    region: stringField(global, "region"),
    subnet_id: optionalStringField(global, "subnet_id"),
    vpc_id: optionalStringField(global, "vpc_id"),
    credentials: {
      access_key_id: stringField(creds, "access_key_id"),
      secret_access_key: stringField(creds, "secret_access_key"),
      session_token: stringField(creds, "session_token"),
    },
  };
}

/** Fails closed: a missing region or any empty credential field is fatal. */
export function validateConfig(config: ProviderConfig): void {
  const missing = (field: string) =>
    new RunnerProviderError("INVALID_CONFIG", `missing ${field}`, { details: { field } });

  if (!config.region) throw missing("region");
  if (!config.credentials.access_key_id) throw missing("access_key_id");
  if (!config.credentials.secret_access_key) throw missing("secret_access_key");
  if (!config.credentials.session_token) throw missing("session_token");
}

// =============================================================================
// Load Config
// =============================================================================

export function parseConfig(content: string): ProviderConfig {
  const config = mapToProviderConfig(parseSimpleToml(content));
  validateConfig(config);
  return config;
}

/**
 * Load and validate provider configuration from a TOML file.
 * Not cached: each provider invocation is a fresh process.
 */
export function loadConfig(configPath: string): ProviderConfig {
  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new RunnerProviderError(
      "INVALID_CONFIG",
      `failed to read config ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err, details: { configPath } },
    );
  }

  try {
    return parseConfig(content);
  } catch (err) {
    console.warn(`[config] Rejected ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    throw err;
  }
}
