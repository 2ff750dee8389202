/**
 * HTTP client for the pipeline tracking service
 *
 * Wire contract:
 *   POST   /pipelines                 upsert, returns the record
 *   GET    /pipelines[?dag=true]      every record
 *   GET    /pipelines/:id[?dag=true]  one-element array; ":id" may be "latest"
 *   DELETE /pipelines/:id             returns { pipeline_id }
 *
 * The key travels in the `x-api-key` header. 401/403 mean the key was
 * rejected and 404 means the id is unknown.
 */

import type { z } from "zod";
import { openCredentialStore } from "./credentials.js";
import {
  InvalidApiKeyError,
  MissingApiKeyError,
  PipelineNotFoundError,
  PipelineValidationError,
  TrackingServiceError,
} from "./errors.js";
import { logger } from "./observability/logs.js";
import {
  DeleteResponseSchema,
  PipelineRecordListSchema,
  PipelineRecordSchema,
  formatIssues,
} from "./schemas.js";
import type {
  FetchLike,
  GetPipelinesOptions,
  PipelineRecord,
  PipelineWrite,
  Tracker,
  TrackingClientOptions,
} from "./types.js";

export const DEFAULT_HOST = "https://api.pipecloud.dev";

/** Virtual id resolving to the most recently written run */
export const LATEST = "latest";

interface RequestOptions {
  body?: unknown;
  /** Id to report when the service answers 404 */
  pipelineId?: string;
}

function withoutDag(record: PipelineRecord): PipelineRecord {
  const { dag: _dag, ...rest } = record;
  return rest;
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === "";
}

export class TrackingClient implements Tracker {
  readonly #host: string;
  readonly #apiKey: string;
  readonly #fetch: FetchLike;
  readonly #timeoutMs: number | undefined;

  constructor(options: TrackingClientOptions) {
    if (!options.apiKey) {
      throw new MissingApiKeyError();
    }

    this.#host = options.host.replace(/\/+$/, "");
    this.#apiKey = options.apiKey;
    this.#fetch = options.fetch ?? ((input, init) => fetch(input, init));
    this.#timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : undefined;
  }

  get host(): string {
    return this.#host;
  }

  async writePipeline(input: PipelineWrite): Promise<PipelineRecord> {
    if (input.pipeline_id !== undefined && isBlank(input.pipeline_id)) {
      throw new PipelineValidationError("pipeline_id");
    }
    if (isBlank(input.status)) {
      throw new PipelineValidationError("status");
    }

    const payload: PipelineWrite = { status: input.status };
    if (input.pipeline_id !== undefined) payload.pipeline_id = input.pipeline_id;
    if (input.log !== undefined) payload.log = input.log;
    if (input.dag !== undefined) payload.dag = input.dag;

    const body = await this.#request("POST", "/pipelines", { body: payload });
    const record = this.#parse(PipelineRecordSchema, body, "write");
    logger.debug("tracking.pipeline_written", {
      pipelineId: record.pipeline_id,
      message: record.status,
    });
    return record;
  }

  async getPipelines(options: GetPipelinesOptions = {}): Promise<PipelineRecord[]> {
    const { pipelineId, includeDag = false } = options;
    if (pipelineId !== undefined && isBlank(pipelineId)) {
      throw new PipelineValidationError("pipeline_id");
    }

    const path = pipelineId === undefined ? "/pipelines" : `/pipelines/${encodeURIComponent(pipelineId)}`;
    const query = includeDag ? "?dag=true" : "";

    const body = await this.#request("GET", `${path}${query}`, { pipelineId });
    const records = this.#parse(PipelineRecordListSchema, body, "read");

    if (pipelineId !== undefined && records.length === 0) {
      throw new PipelineNotFoundError(pipelineId);
    }

    return includeDag ? records : records.map(withoutDag);
  }

  async deletePipeline(pipelineId: string): Promise<{ pipeline_id: string }> {
    if (isBlank(pipelineId)) {
      throw new PipelineValidationError("pipeline_id");
    }

    const body = await this.#request("DELETE", `/pipelines/${encodeURIComponent(pipelineId)}`, {
      pipelineId,
    });
    return this.#parse(DeleteResponseSchema, body, "delete");
  }

  async #request(method: string, path: string, options: RequestOptions = {}): Promise<unknown> {
    const headers: Record<string, string> = {
      accept: "application/json",
      "x-api-key": this.#apiKey,
    };
    if (options.body !== undefined) {
      headers["content-type"] = "application/json";
    }

    const signal =
      this.#timeoutMs === undefined ? undefined : AbortSignal.timeout(this.#timeoutMs);

    let response: Response;
    try {
      response = await this.#fetch(`${this.#host}${path}`, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal,
      });
    } catch (err) {
      if (signal?.aborted) {
        throw new TrackingServiceError(`Request timed out after ${this.#timeoutMs}ms`, undefined, {
          cause: err,
        });
      }
      throw new TrackingServiceError(`Could not reach tracking service at ${this.#host}`, undefined, {
        cause: err,
      });
    }

    logger.debug("tracking.response", { message: `${method} ${path} -> ${response.status}` });

    if (response.status === 401 || response.status === 403) {
      throw new InvalidApiKeyError(response.status);
    }

    if (response.status === 404 && options.pipelineId !== undefined) {
      throw new PipelineNotFoundError(options.pipelineId);
    }

    const text = await response.text();

    if (!response.ok) {
      const detail = text.trim() ? `: ${text.trim()}` : "";
      throw new TrackingServiceError(
        `Tracking service responded ${response.status}${detail}`,
        response.status
      );
    }

    try {
      return JSON.parse(text);
    } catch (err) {
      throw new TrackingServiceError("Tracking service returned invalid JSON", response.status, {
        cause: err,
      });
    }
  }

  #parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, operation: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new TrackingServiceError(
        `Unexpected ${operation} response: ${formatIssues(result.error)}`
      );
    }
    return result.data;
  }
}

/**
 * Options for connecting with the key kept in the user config
 */
export interface ConnectOptions {
  /** Home directory holding the user config */
  home: string;
  host?: string;
  fetch?: FetchLike;
  timeoutMs?: number;
}

/**
 * Create a client authenticated with the stored key
 * @throws MissingApiKeyError when no key is stored
 */
export async function connect(options: ConnectOptions): Promise<TrackingClient> {
  const apiKey = await openCredentialStore(options.home).getKey();
  if (!apiKey) {
    throw new MissingApiKeyError();
  }

  return new TrackingClient({
    host: options.host ?? DEFAULT_HOST,
    apiKey,
    fetch: options.fetch,
    timeoutMs: options.timeoutMs,
  });
}
