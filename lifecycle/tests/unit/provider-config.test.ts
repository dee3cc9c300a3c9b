// tests/unit/provider-config.test.ts - Provider config tests

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, rmSync, writeFileSync } from "node:fs";
import { join } from "path";
import { mkdtemp } from "fs/promises";
import { tmpdir } from "os";
import {
  loadConfig,
  parseConfig,
  parseSimpleToml,
  validateConfig,
} from "../../control/src/provider/config";
import { catchProviderError, makeConfig } from "../fixtures";

const VALID_TOML = `
# provider config
region = "us-east-1"
subnet_id = "subnet-0abc"  # default subnet

[credentials]
access_key_id = "test-key"
secret_access_key = "test-secret"
session_token = "test-session"
`;

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "ec2-runner-config-test-"));
});

afterEach(() => {
  if (existsSync(tempDir)) {
    rmSync(tempDir, { recursive: true });
  }
});

describe("parseSimpleToml", () => {
  test("puts top-level keys in the global section", () => {
    const parsed = parseSimpleToml('region = "eu-west-1"\n[credentials]\naccess_key_id = "k"');
    expect(parsed).toEqual({
      __global__: { region: "eu-west-1" },
      credentials: { access_key_id: "k" },
    });
  });

  test("parses numbers, booleans and arrays", () => {
    const parsed = parseSimpleToml('count = 3\nenabled = true\nids = ["a", "b"]');
    expect(parsed.__global__).toEqual({ count: 3, enabled: true, ids: ["a", "b"] });
  });

  test("keeps # inside quoted strings", () => {
    const parsed = parseSimpleToml('token = "abc#def" # trailing');
    expect(parsed.__global__?.token).toBe("abc#def");
  });

  test("accepts quoted keys and single-quoted values", () => {
    const parsed = parseSimpleToml(`"region" = 'ap-south-1'`);
    expect(parsed.__global__?.region).toBe("ap-south-1");
  });
});

describe("parseConfig", () => {
  test("maps the file onto ProviderConfig", () => {
    expect(parseConfig(VALID_TOML)).toEqual({
      region: "us-east-1",
      subnet_id: "subnet-0abc",
      vpc_id: undefined,
      credentials: {
        access_key_id: "test-key",
        secret_access_key: "test-secret",
        session_token: "test-session",
      },
    });
  });

  test("ignores non-string values for string fields", () => {
    const err = catchProviderError(() => parseConfig(VALID_TOML.replace('"us-east-1"', "42")));
    expect(err.code).toBe("INVALID_CONFIG");
    expect(err.message).toBe("missing region");
  });
});

describe("validateConfig", () => {
  test("accepts a complete config", () => {
    expect(() => validateConfig(makeConfig())).not.toThrow();
  });

  test("subnet and vpc are optional", () => {
    expect(() => validateConfig(makeConfig({ subnet_id: undefined, vpc_id: undefined }))).not.toThrow();
  });

  test("names the first missing field", () => {
    const cases: Array<[ReturnType<typeof makeConfig>, string]> = [
      [makeConfig({ region: "" }), "region"],
      [makeConfig({ credentials: { access_key_id: "", secret_access_key: "s", session_token: "t" } }), "access_key_id"],
      [makeConfig({ credentials: { access_key_id: "k", secret_access_key: "", session_token: "t" } }), "secret_access_key"],
      [makeConfig({ credentials: { access_key_id: "k", secret_access_key: "s", session_token: "" } }), "session_token"],
    ];
    for (const [config, field] of cases) {
      const err = catchProviderError(() => validateConfig(config));
      expect(err.code).toBe("INVALID_CONFIG");
      expect(err.category).toBe("validation");
      expect(err.message).toBe(`missing ${field}`);
      expect(err.details).toEqual({ field });
    }
  });
});

describe("loadConfig", () => {
  test("reads and validates a file", () => {
    const path = join(tempDir, "provider.toml");
    writeFileSync(path, VALID_TOML);
    expect(loadConfig(path).region).toBe("us-east-1");
  });

  test("an unreadable file is INVALID_CONFIG with the cause attached", () => {
    const path = join(tempDir, "missing.toml");
    const err = catchProviderError(() => loadConfig(path));
    expect(err.code).toBe("INVALID_CONFIG");
    expect(err.message.startsWith(`failed to read config ${path}: `)).toBe(true);
    expect(err.cause).toBeInstanceOf(Error);
  });

  test("logs and rethrows a rejected config", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const path = join(tempDir, "provider.toml");
    writeFileSync(path, 'region = "us-east-1"\n');

    const err = catchProviderError(() => loadConfig(path));
    expect(err.message).toBe("missing access_key_id");
    expect(warn).toHaveBeenCalledWith(`[config] Rejected ${path}: missing access_key_id`);
  });
});
