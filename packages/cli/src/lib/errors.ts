/**
 * CLI error handling and exit code mapping
 */

import {
  ConfigParseError,
  DagError,
  InvalidApiKeyError,
  MissingApiKeyError,
  PipelineNotFoundError,
  PipelineValidationError,
  PipeCloudError,
  TrackingServiceError,
} from "@pipecloud/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Expected failure of a cloud command, printed on stdout
 */
export interface CommandFailure {
  ok: false;
  code: string;
  message: string;
}

export const MISSING_KEY_MESSAGE = "API_Key not found. Set one with: pipecloud set_key <key>";
export const INVALID_KEY_MESSAGE = "API_Key not valid";

/**
 * Turn an SDK error into the message shown to the user
 * @param operation - Which command failed; not-found wording depends on it
 * @returns null when the error is not an expected cloud failure
 */
export function describeCloudError(
  error: unknown,
  operation: "write" | "read" | "delete"
): CommandFailure | null {
  if (!(error instanceof PipeCloudError)) {
    return null;
  }

  const code = error.code;
  const fail = (message: string): CommandFailure => ({ ok: false, code, message });

  if (error instanceof MissingApiKeyError) {
    return fail(MISSING_KEY_MESSAGE);
  }
  if (error instanceof InvalidApiKeyError) {
    return fail(INVALID_KEY_MESSAGE);
  }
  if (error instanceof PipelineNotFoundError) {
    return fail(
      operation === "delete"
        ? `Pipeline ${error.pipelineId} doesn't exist`
        : `Pipeline ${error.pipelineId} was not found`
    );
  }
  if (
    error instanceof PipelineValidationError ||
    error instanceof DagError ||
    error instanceof ConfigParseError
  ) {
    return fail(error.message);
  }
  if (error instanceof TrackingServiceError) {
    return fail(`Tracking service error: ${error.message}`);
  }

  return null;
}

/**
 * Map errors reaching the top-level handler to CLI exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 */
export function mapErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${error.cause}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
