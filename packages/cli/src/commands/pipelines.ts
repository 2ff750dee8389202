/**
 * Pipeline tracking commands for CLI
 */

import type { Command } from "commander";
import { openCloudCommands, type CloudContext } from "../lib/cloud.js";
import { printJson } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

/**
 * Register `write_pipeline`, `get_pipelines` and `delete_pipeline`
 */
export function registerPipelineCommands(program: Command, context: () => CloudContext): void {
  program
    .command("write_pipeline [pipeline_id] [status] [log]")
    .alias("write-pipeline")
    .description("Create or update a pipeline run")
    .option("--dag <path>", "Attach a JSON DAG summary read from a file (- for stdin)")
    .action(
      async (
        pipelineId: string | undefined,
        status: string | undefined,
        log: string | undefined,
        options: { dag?: string }
      ) => {
        const result = await withTiming("cli.write_pipeline", () =>
          openCloudCommands(context()).writePipeline({ pipelineId, status, log, dagSource: options.dag })
        );

        if (result.ok) {
          console.log(`Pipeline ${result.value.pipeline_id} stored with status ${result.value.status}`);
        } else {
          console.log(result.message);
        }
      }
    );

  program
    .command("get_pipelines [pipeline_id]")
    .alias("get-pipelines")
    .description('Print pipeline runs as JSON (all, one id, or "latest")')
    .option("-d, --dag", "Include the DAG summary of each run")
    .action(async (pipelineId: string | undefined, options: { dag?: boolean }) => {
      const result = await withTiming("cli.get_pipelines", () =>
        openCloudCommands(context()).getPipelines({ pipelineId, includeDag: options.dag === true })
      );
      printJson(result.ok ? result.value : result.message);
    });

  program
    .command("delete_pipeline <pipeline_id>")
    .alias("delete-pipeline")
    .description("Delete a pipeline run")
    .action(async (pipelineId: string) => {
      const result = await withTiming("cli.delete_pipeline", () =>
        openCloudCommands(context()).deletePipeline(pipelineId)
      );
      console.log(result.ok ? `Deleted pipeline ${result.value.pipeline_id}` : result.message);
    });
}
