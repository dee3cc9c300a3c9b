// provider/errors.ts - EC2 error mapping
//
// Translates AWS SDK v3 failures into RunnerProviderError so callers branch on
// `code`, never on AWS error names or message text.

import {
  RunnerProviderError,
  wrapWithOperation,
  type RunnerProviderErrorCode,
} from "@ec2-runner/contracts";

/**
 * Extract AWS error code from SDK v3 errors.
 *
 * AWS SDK v3 errors surface the code at different places depending on how
 * the error was constructed: .name (primary for SDK v3), .Code (some shapes),
 * or .code (older patterns). We check all three.
 */
export function getAwsErrorCode(err: unknown): string {
  if (err && typeof err === "object") {
    if ("name" in err && typeof err.name === "string" && err.name !== "Error") return err.name;
    if ("Code" in err && typeof err.Code === "string") return err.Code;
    if ("code" in err && typeof err.code === "string") return err.code;
  }
  return "Unknown";
}

export function isAbortError(err: unknown): boolean {
  return getAwsErrorCode(err) === "AbortError";
}

function codeForAwsError(awsErrorCode: string): RunnerProviderErrorCode {
  switch (awsErrorCode) {
    case "AbortError":
      return "CANCELLED";
    case "InvalidInstanceID.NotFound":
      return "NOT_FOUND";
    default:
      return "PROVIDER_ERROR";
  }
}

/**
 * Map an SDK failure from one EC2 call. The operation name becomes part of the
 * message; the SDK error stays reachable as `cause`.
 */
export function mapEC2Error(operation: string, err: unknown): RunnerProviderError {
  if (err instanceof RunnerProviderError) return wrapWithOperation(operation, err);

  const awsCode = getAwsErrorCode(err);
  const message = err instanceof Error ? err.message : String(err);
  return new RunnerProviderError(codeForAwsError(awsCode), `${operation}: ${message}`, {
    operation,
    details: { awsCode },
    cause: err,
  });
}

/**
 * Wrap one EC2 call with error mapping.
 *
 * Usage:
 *   await withEC2ErrorMapping("TerminateInstances", () => client.send(...));
 */
export async function withEC2ErrorMapping<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw mapEC2Error(operation, err);
  }
}
