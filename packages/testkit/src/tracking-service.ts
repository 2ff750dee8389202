/**
 * In-process stand-in for the pipeline tracking service
 *
 * Implements the same wire contract as the real service and exposes it as a
 * fetch function, so tests exercise the client without a network.
 */

import { randomUUID } from "node:crypto";
import { DagSummarySchema, type FetchLike, type PipelineRecord } from "@pipecloud/sdk";

/**
 * A request the fake service received
 */
export interface RecordedRequest {
  method: string;
  path: string;
  apiKey: string | null;
  body: unknown;
}

interface StoredRecord {
  record: PipelineRecord;
  /** Write order, used to resolve "latest" */
  seq: number;
}

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class FakeTrackingService {
  readonly requests: RecordedRequest[] = [];
  readonly #apiKeys: Set<string>;
  readonly #records = new Map<string, StoredRecord>();
  readonly #queued: Response[] = [];
  #seq = 0;

  constructor(apiKeys: string[]) {
    this.#apiKeys = new Set(apiKeys);
  }

  /**
   * fetch-compatible entry point
   */
  readonly fetch: FetchLike = async (input, init) => {
    const url = new URL(input);
    const method = (init?.method ?? "GET").toUpperCase();
    const apiKey = new Headers(init?.headers).get("x-api-key");
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;

    this.requests.push({ method, path: `${url.pathname}${url.search}`, apiKey, body });

    const queued = this.#queued.shift();
    if (queued) {
      return queued;
    }

    if (apiKey === null || !this.#apiKeys.has(apiKey)) {
      return json(401, { detail: "API_Key not valid" });
    }

    return this.#route(method, url, body);
  };

  /**
   * Answer the next request with a canned response instead of routing it
   */
  respondOnce(status: number, body: string): void {
    this.#queued.push(new Response(body, { status }));
  }

  /**
   * Current records in write order, dag included
   */
  records(): PipelineRecord[] {
    return [...this.#records.values()].sort((a, b) => a.seq - b.seq).map((entry) => entry.record);
  }

  #route(method: string, url: URL, body: unknown): Response {
    const segments = url.pathname.split("/").filter(Boolean);
    const includeDag = url.searchParams.get("dag") === "true";

    if (segments[0] !== "pipelines" || segments.length > 2) {
      return json(404, { detail: "Not found" });
    }

    const id = segments[1] === undefined ? undefined : decodeURIComponent(segments[1]);

    if (id === undefined) {
      if (method === "POST") return this.#write(body);
      if (method === "GET") return json(200, this.records().map((r) => this.#view(r, includeDag)));
      return json(405, { detail: "Method not allowed" });
    }

    const entry = id === "latest" ? this.#latest() : this.#records.get(id);
    if (!entry) {
      return json(404, { detail: `Pipeline ${id} was not found` });
    }

    if (method === "GET") return json(200, [this.#view(entry.record, includeDag)]);
    if (method === "DELETE") {
      this.#records.delete(entry.record.pipeline_id);
      return json(200, { pipeline_id: entry.record.pipeline_id });
    }
    return json(405, { detail: "Method not allowed" });
  }

  #write(body: unknown): Response {
    if (!isRecord(body) || typeof body.status !== "string" || body.status === "") {
      return json(422, { detail: "status is required" });
    }

    const id = typeof body.pipeline_id === "string" && body.pipeline_id ? body.pipeline_id : randomUUID();
    const now = new Date().toISOString();
    const previous = this.#records.get(id);

    // Writes replace every field; only the creation time survives
    const record: PipelineRecord = {
      pipeline_id: id,
      status: body.status,
      created_at: previous?.record.created_at ?? now,
      updated_at: now,
    };
    if (typeof body.log === "string") record.log = body.log;
    if (body.dag !== undefined) {
      const dag = DagSummarySchema.safeParse(body.dag);
      if (!dag.success) {
        return json(422, { detail: "dag is malformed" });
      }
      record.dag = dag.data;
    }

    this.#records.set(id, { record, seq: ++this.#seq });
    return json(200, record);
  }

  #latest(): StoredRecord | undefined {
    let latest: StoredRecord | undefined;
    for (const entry of this.#records.values()) {
      if (!latest || entry.seq > latest.seq) latest = entry;
    }
    return latest;
  }

  #view(record: PipelineRecord, includeDag: boolean): PipelineRecord {
    if (includeDag) return record;
    const { dag: _dag, ...rest } = record;
    return rest;
  }
}
