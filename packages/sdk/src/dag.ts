/**
 * Task graph summaries attached to pipeline runs
 */

import { DagError } from "./errors.js";
import { DagSummarySchema, formatIssues } from "./schemas.js";
import type { DagSummary, TaskSummary } from "./types.js";

/**
 * One task of an in-memory task graph
 */
export interface TaskNode {
  name: string;
  product: string | Record<string, string>;
  status: string;
  type: string;
  /** Names of tasks this one depends on */
  upstream?: string[];
}

export interface TaskGraph {
  tasks: TaskNode[];
}

/**
 * Flatten a product to the single path reported for downstream tasks
 */
export function productPath(product: TaskNode["product"]): string {
  if (typeof product === "string") {
    return product;
  }
  return Object.values(product).join(", ");
}

/**
 * Build the summary sent along with a pipeline run
 * @throws DagError on duplicate task names or unknown upstream tasks
 */
export function summarizeDag(graph: TaskGraph): DagSummary {
  const byName = new Map<string, TaskNode>();
  for (const task of graph.tasks) {
    if (byName.has(task.name)) {
      throw new DagError(`Duplicate task name "${task.name}"`);
    }
    byName.set(task.name, task);
  }

  const tasks: Record<string, TaskSummary> = {};
  for (const task of graph.tasks) {
    const upstream: Record<string, string> = {};
    for (const dependency of task.upstream ?? []) {
      const source = byName.get(dependency);
      if (!source) {
        throw new DagError(`Task "${task.name}" depends on unknown task "${dependency}"`);
      }
      upstream[dependency] = productPath(source.product);
    }

    tasks[task.name] = {
      products: task.product,
      status: task.status,
      type: task.type,
      upstream,
    };
  }

  return { dag_size: String(graph.tasks.length), tasks };
}

/**
 * Validate an untrusted DAG summary (e.g. read from a JSON file)
 * @throws DagError listing every problem found
 */
export function parseDagSummary(value: unknown): DagSummary {
  const result = DagSummarySchema.safeParse(value);
  if (!result.success) {
    throw new DagError(`Invalid DAG summary: ${formatIssues(result.error)}`);
  }
  return result.data;
}
