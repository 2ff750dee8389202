/**
 * Telemetry and observability helpers
 *
 * Metrics are single lines on stderr, emitted only in verbose mode:
 *   metric cli.write_pipeline duration_ms=12 success=false err_code=E_KEY_INVALID
 */

import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Commands report expected failures as values; pick the error code out of one
 */
function failureCode(result: unknown): string | undefined {
  if (
    typeof result === "object" &&
    result !== null &&
    "ok" in result &&
    result.ok === false &&
    "code" in result &&
    typeof result.code === "string"
  ) {
    return result.code;
  }
  return undefined;
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    if (v === undefined) continue;
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Wrap a command with timing metrics. A resolved `{ ok: false }` result
 * counts as a failure.
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  let success = false;
  let errCode: string | undefined;

  try {
    const result = await fn();
    errCode = failureCode(result);
    success = errCode === undefined;
    return result;
  } catch (err) {
    errCode = err instanceof Error ? err.name : "UNKNOWN";
    throw err;
  } finally {
    emitMetric(label, {
      duration_ms: Date.now() - start,
      success,
      err_code: errCode,
    });
  }
}
