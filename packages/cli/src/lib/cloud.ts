/**
 * Cloud adapter for CLI
 * Thin wrapper over the SDK that turns expected failures into values
 */

import {
  MALFORMED_KEY_MESSAGE,
  PipelineValidationError,
  connect,
  openCredentialStore,
  parseDagSummary,
  type DagSummary,
  type FetchLike,
  type PipelineRecord,
} from "@pipecloud/sdk";
import { InvalidArgumentError } from "commander";
import { CliError, describeCloudError, type CommandFailure } from "./errors.js";
import { readDagSource } from "./io.js";

export const NO_KEY_MESSAGE = "No cloud API key was found";

export type CommandResult<T> = { ok: true; value: T } | CommandFailure;

/**
 * Where and how the commands reach their collaborators
 */
export interface CloudContext {
  /** Home directory holding the user config */
  home: string;
  /** Tracking service base URL */
  host: string;
  timeoutMs?: number;
  /** Replaces global fetch (tests) */
  fetch?: FetchLike;
}

export interface WritePipelineArgs {
  pipelineId?: string;
  status?: string;
  log?: string;
  /** Untrusted DAG summary, validated before sending */
  dag?: unknown;
  /** JSON file holding the DAG summary, or "-" for stdin; replaces `dag` */
  dagSource?: string;
}

export interface GetPipelinesArgs {
  pipelineId?: string;
  includeDag?: boolean;
}

export interface CloudCommands {
  setKey(value: string | undefined): Promise<CommandResult<string>>;
  getKey(): Promise<CommandResult<string>>;
  writePipeline(args: WritePipelineArgs): Promise<CommandResult<PipelineRecord>>;
  getPipelines(args: GetPipelinesArgs): Promise<CommandResult<PipelineRecord[]>>;
  deletePipeline(pipelineId: string | undefined): Promise<CommandResult<{ pipeline_id: string }>>;
}

function blank(value: string | undefined): boolean {
  return value === undefined || value.trim() === "";
}

async function attempt<T>(
  operation: "write" | "read" | "delete",
  fn: () => Promise<T>
): Promise<CommandResult<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    const failure = describeCloudError(err, operation);
    if (failure === null) {
      throw err;
    }
    return failure;
  }
}

function invalid(field: "pipeline_id" | "status"): CommandFailure {
  const error = new PipelineValidationError(field);
  return { ok: false, code: error.code, message: error.message };
}

/**
 * Open the command layer for one CLI invocation
 */
export function openCloudCommands(context: CloudContext): CloudCommands {
  const client = () =>
    connect({
      home: context.home,
      host: context.host,
      fetch: context.fetch,
      timeoutMs: context.timeoutMs,
    });

  return {
    async setKey(value): Promise<CommandResult<string>> {
      const stored = await attempt("write", () => openCredentialStore(context.home).setKey(value));
      if (!stored.ok) {
        return stored;
      }
      if (!stored.value) {
        return { ok: false, code: "E_KEY_MALFORMED", message: MALFORMED_KEY_MESSAGE };
      }
      return { ok: true, value: `Key was stored ${value}` };
    },

    async getKey(): Promise<CommandResult<string>> {
      const key = await openCredentialStore(context.home).getKey();
      if (key === null) {
        return { ok: false, code: "E_KEY_MISSING", message: NO_KEY_MESSAGE };
      }
      return { ok: true, value: key };
    },

    async writePipeline(args): Promise<CommandResult<PipelineRecord>> {
      // Input problems are reported before the key is even looked at
      if (blank(args.pipelineId)) return invalid("pipeline_id");
      if (blank(args.status)) return invalid("status");

      let raw = args.dag;
      if (args.dagSource !== undefined) {
        try {
          raw = await readDagSource(args.dagSource);
        } catch (err) {
          if (err instanceof CliError || err instanceof InvalidArgumentError) {
            return { ok: false, code: "E_DAG", message: err.message };
          }
          throw err;
        }
      }

      return attempt("write", async () => {
        const dag: DagSummary | undefined = raw === undefined ? undefined : parseDagSummary(raw);
        const tracker = await client();
        return tracker.writePipeline({
          pipeline_id: args.pipelineId,
          status: args.status ?? "",
          log: args.log,
          dag,
        });
      });
    },

    async getPipelines(args): Promise<CommandResult<PipelineRecord[]>> {
      if (args.pipelineId !== undefined && blank(args.pipelineId)) return invalid("pipeline_id");

      return attempt("read", async () => {
        const tracker = await client();
        return tracker.getPipelines({
          pipelineId: args.pipelineId,
          includeDag: args.includeDag ?? false,
        });
      });
    },

    async deletePipeline(pipelineId): Promise<CommandResult<{ pipeline_id: string }>> {
      if (pipelineId === undefined || blank(pipelineId)) return invalid("pipeline_id");
      const id = pipelineId;

      return attempt("delete", async () => {
        const tracker = await client();
        return tracker.deletePipeline(id);
      });
    },
  };
}
