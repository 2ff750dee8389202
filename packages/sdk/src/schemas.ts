/**
 * Zod schemas for tracking service payloads
 * Responses are validated before they reach callers
 */

import { z } from "zod";
import type { DagSummary, PipelineRecord, TaskSummary } from "./types.js";

export const TaskSummarySchema: z.ZodType<TaskSummary> = z.object({
  products: z.union([z.string(), z.record(z.string(), z.string())]),
  status: z.string(),
  type: z.string(),
  upstream: z.record(z.string(), z.string()),
});

export const DagSummarySchema: z.ZodType<DagSummary, z.ZodTypeDef, unknown> = z
  .object({
    dag_size: z.union([z.string(), z.number().int().nonnegative()]).transform(String),
    tasks: z.record(z.string(), TaskSummarySchema),
  })
  .superRefine((dag, ctx) => {
    for (const [name, task] of Object.entries(dag.tasks)) {
      for (const upstream of Object.keys(task.upstream)) {
        if (!(upstream in dag.tasks)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["tasks", name, "upstream", upstream],
            message: `upstream task "${upstream}" is not part of the DAG`,
          });
        }
      }
    }
  });

export const PipelineRecordSchema: z.ZodType<PipelineRecord, z.ZodTypeDef, unknown> = z.object({
  pipeline_id: z.string().min(1),
  status: z.string(),
  log: z.string().optional(),
  dag: DagSummarySchema.optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export const PipelineRecordListSchema = z.array(PipelineRecordSchema);

export const DeleteResponseSchema = z.object({
  pipeline_id: z.string().min(1),
});

/**
 * Render zod issues as a single line
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
