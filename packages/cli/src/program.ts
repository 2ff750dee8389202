/**
 * pipecloud command tree
 */

import { Command } from "commander";
import { VERSION, type FetchLike } from "@pipecloud/sdk";
import { registerKeyCommands } from "./commands/key.js";
import { registerPipelineCommands } from "./commands/pipelines.js";
import { parseNonNegativeInt } from "./lib/arg.js";
import { colorize } from "./lib/render.js";
import type { CloudContext } from "./lib/cloud.js";
import { resolveHome, resolveHost } from "./lib/env.js";

export interface GlobalOptions {
  home?: string;
  host?: string;
  timeout?: number;
  verbose?: boolean;
}

export interface ProgramDeps {
  /** Replaces global fetch for tracking requests */
  fetch?: FetchLike;
}

/**
 * Build a fresh program. Each invocation should use its own instance.
 *
 * Commander errors (unknown command, missing argument, --help, --version)
 * are thrown as CommanderError instead of exiting, so callers decide.
 */
export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();

  // Set before any subcommand exists so they inherit it
  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  program
    .name("pipecloud")
    .description("pipecloud - track pipeline runs in the cloud")
    .version(VERSION)
    .option("--home <path>", "Directory holding the user config (default ~/.pipecloud)")
    .option("--host <url>", "Tracking service base URL")
    .option("--timeout <ms>", "Abort tracking requests after <ms> milliseconds", (val) =>
      parseNonNegativeInt(val, "--timeout", 600000)
    )
    .option("--verbose", "Verbose diagnostics");

  const context = (): CloudContext => {
    const opts = program.opts<GlobalOptions>();
    return {
      home: resolveHome(opts.home),
      host: resolveHost(opts.host),
      timeoutMs: opts.timeout,
      fetch: deps.fetch,
    };
  };

  registerKeyCommands(program, context);
  registerPipelineCommands(program, context);

  return program;
}
