/**
 * Core types for pipecloud
 */

/**
 * Per-task entry of a DAG summary
 */
export interface TaskSummary {
  /** Product path, or a mapping of named products to paths */
  products: string | Record<string, string>;
  /** Last known build status (e.g., "Executed", "Skipped", "Errored") */
  status: string;
  /** Task implementation kind (e.g., "ShellTask", "SQLScript") */
  type: string;
  /** Upstream task name -> that task's product path */
  upstream: Record<string, string>;
}

/**
 * Compact description of a pipeline's task graph
 */
export interface DagSummary {
  /** Number of tasks, serialized as a string */
  dag_size: string;
  tasks: Record<string, TaskSummary>;
}

/**
 * A tracked pipeline run as returned by the service
 */
export interface PipelineRecord {
  pipeline_id: string;
  status: string;
  log?: string;
  dag?: DagSummary;
  created_at?: string;
  updated_at?: string;
}

/**
 * Payload for creating or updating a pipeline run
 */
export interface PipelineWrite {
  pipeline_id?: string;
  status: string;
  log?: string;
  dag?: DagSummary;
}

/**
 * Options for reading pipeline runs
 */
export interface GetPipelinesOptions {
  /** Specific id, or "latest"; omit for every run */
  pipelineId?: string;
  /** Include the `dag` field in returned records (default: false) */
  includeDag?: boolean;
}

/**
 * Contents of the user config file. Unknown keys are preserved.
 */
export interface UserConfig {
  cloud_key?: string;
  /** Raw value as written; see statsEnabled() */
  stats_enabled?: unknown;
  [key: string]: unknown;
}

/**
 * Fetch-compatible function used by the tracking client
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Options for the tracking client
 */
export interface TrackingClientOptions {
  /** Base URL of the tracking service */
  host: string;
  /** API key sent with every request */
  apiKey: string;
  /** Alternative fetch implementation (default: global fetch) */
  fetch?: FetchLike;
  /** Abort requests after this many milliseconds (default: no timeout) */
  timeoutMs?: number;
}

/**
 * Pipeline tracking operations
 */
export interface Tracker {
  /**
   * Create or update a run. Fields are overwritten, not merged.
   */
  writePipeline(input: PipelineWrite): Promise<PipelineRecord>;

  /**
   * Read every run, one run by id, or the most recent run ("latest")
   */
  getPipelines(options?: GetPipelinesOptions): Promise<PipelineRecord[]>;

  /**
   * Delete a run by id
   */
  deletePipeline(pipelineId: string): Promise<{ pipeline_id: string }>;
}
