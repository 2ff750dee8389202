/**
 * API key commands for CLI
 */

import type { Command } from "commander";
import type { CloudContext } from "../lib/cloud.js";
import { openCloudCommands } from "../lib/cloud.js";
import { withTiming } from "../lib/telemetry.js";

/**
 * Register `set_key` and `get_key`
 */
export function registerKeyCommands(program: Command, context: () => CloudContext): void {
  program
    .command("set_key <key>")
    .alias("set-key")
    .description("Store the cloud API key in the user config")
    .action(async (key: string) => {
      const result = await withTiming("cli.set_key", () =>
        openCloudCommands(context()).setKey(key)
      );
      console.log(result.ok ? result.value : result.message);
    });

  program
    .command("get_key")
    .alias("get-key")
    .description("Print the stored cloud API key")
    .action(async () => {
      const result = await withTiming("cli.get_key", () => openCloudCommands(context()).getKey());
      console.log(result.ok ? result.value : result.message);
    });
}
