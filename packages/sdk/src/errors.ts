/**
 * Error types for pipecloud operations
 *
 * Invariants:
 * - File errors include the absolute target path in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all pipecloud errors
 */
export abstract class PipeCloudError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when the user config file exists but cannot be read
 */
export class ConfigReadError extends PipeCloudError {
  readonly code = "CONFIG_READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read config: ${filePath}`, options);
  }
}

/**
 * Thrown when the user config file cannot be written
 */
export class ConfigWriteError extends PipeCloudError {
  readonly code = "CONFIG_WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write config: ${filePath}`, options);
  }
}

/**
 * Thrown instead of overwriting a config file that does not parse as a mapping
 */
export class ConfigParseError extends PipeCloudError {
  readonly code = "CONFIG_PARSE_ERROR";

  constructor(
    public readonly filePath: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Config file ${filePath} is not valid YAML (${reason}); fix or remove it first`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends PipeCloudError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when a tracking call is attempted without a stored API key
 */
export class MissingApiKeyError extends PipeCloudError {
  readonly code = "E_KEY_MISSING";

  constructor(options?: ErrorOptions) {
    super("API_Key not found", options);
  }
}

/**
 * Thrown when the tracking service rejects the API key
 */
export class InvalidApiKeyError extends PipeCloudError {
  readonly code = "E_KEY_INVALID";

  constructor(
    public readonly status: number,
    options?: ErrorOptions
  ) {
    super("API_Key not valid", options);
  }
}

/**
 * Thrown when a pipeline write is missing a required field
 */
export class PipelineValidationError extends PipeCloudError {
  readonly code = "E_PIPELINE_INPUT";

  constructor(
    public readonly field: "pipeline_id" | "status",
    options?: ErrorOptions
  ) {
    super(field === "pipeline_id" ? "No input pipeline_id" : "No input pipeline status", options);
  }
}

/**
 * Thrown when the tracking service has no record for an id
 */
export class PipelineNotFoundError extends PipeCloudError {
  readonly code = "ENOENT";

  constructor(
    public readonly pipelineId: string,
    options?: ErrorOptions
  ) {
    super(`Pipeline ${pipelineId} was not found`, options);
  }
}

/**
 * Thrown for transport failures, unexpected statuses and malformed responses
 */
export class TrackingServiceError extends PipeCloudError {
  readonly code = "E_SERVICE";

  constructor(
    message: string,
    public readonly status?: number,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when a task graph cannot be summarized
 */
export class DagError extends PipeCloudError {
  readonly code = "E_DAG";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}
