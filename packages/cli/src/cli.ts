#!/usr/bin/env node

/**
 * pipecloud CLI entry point
 */

import { CommanderError, InvalidArgumentError } from "commander";
import { createProgram, type GlobalOptions } from "./program.js";
import { mapErrorToExitCode, formatCliError } from "./lib/errors.js";

const program = createProgram();

// Top-level error handler
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Commander has already printed help, version or its own parse error;
    // InvalidArgumentError thrown from an action has not been printed yet
    if (err instanceof CommanderError && !(err instanceof InvalidArgumentError)) {
      process.exit(err.exitCode);
    }

    const opts = program.opts<GlobalOptions>();
    console.error(`Error: ${formatCliError(err, opts.verbose)}`);
    process.exit(mapErrorToExitCode(err));
  }
}

void main();
