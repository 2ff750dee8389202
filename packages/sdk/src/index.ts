/**
 * pipecloud SDK
 *
 * Local API key storage and a client for the pipeline tracking service
 */

// Re-export types
export type {
  TaskSummary,
  DagSummary,
  PipelineRecord,
  PipelineWrite,
  GetPipelinesOptions,
  UserConfig,
  FetchLike,
  TrackingClientOptions,
  Tracker,
} from "./types.js";

// User config
export {
  DEFAULT_HOME_DIR,
  CONF_DIR,
  DEFAULT_USER_CONF,
  userConfigPath,
  parseUserConfig,
  loadUserConfig,
  saveUserConfig,
  setUserConfigValue,
  statsEnabled,
} from "./config.js";

// Credentials
export {
  KEY_PATTERN,
  MALFORMED_KEY_MESSAGE,
  isWellFormedKey,
  openCredentialStore,
  getCloudUser,
  type CredentialStore,
} from "./credentials.js";

// Tracking client
export { TrackingClient, connect, DEFAULT_HOST, LATEST, type ConnectOptions } from "./client.js";

// DAG summaries
export { summarizeDag, parseDagSummary, productPath, type TaskNode, type TaskGraph } from "./dag.js";

// Schemas
export {
  TaskSummarySchema,
  DagSummarySchema,
  PipelineRecordSchema,
  PipelineRecordListSchema,
  DeleteResponseSchema,
  formatIssues,
} from "./schemas.js";

// Errors
export {
  PipeCloudError,
  ConfigReadError,
  ConfigParseError,
  ConfigWriteError,
  DirectoryError,
  MissingApiKeyError,
  InvalidApiKeyError,
  PipelineValidationError,
  PipelineNotFoundError,
  TrackingServiceError,
  DagError,
} from "./errors.js";

// Observability
export { logger, type LogLevel, type LogEntry } from "./observability/logs.js";

export { VERSION } from "./version.js";
