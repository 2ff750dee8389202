/**
 * CLI testing utilities
 */

import { createRequire } from "node:module";
import { fileURLToPath, pathToFileURL } from "node:url";
import { execa } from "execa";

/**
 * Entry point of the CLI, run from source through tsx
 */
export const CLI_ENTRY = fileURLToPath(new URL("../../cli/src/cli.ts", import.meta.url));

/**
 * tsx loader, resolved from here so the child can run in any directory
 */
export const TSX_LOADER = pathToFileURL(createRequire(import.meta.url).resolve("tsx")).href;

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
  /** Terminating signal when the process didn't exit normally */
  signal: string | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Current working directory */
  cwd?: string;
  /** Environment variables */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
  /** Kill the process after this many milliseconds (default: 15000) */
  timeout?: number;
}

/**
 * Execute the CLI in a child process. Never rejects on a non-zero exit.
 * @param args - Command arguments
 * @param options - Execution options
 */
export async function runCli(args: string[], options: CliExecOptions = {}): Promise<CliResult> {
  const { cwd, env, input, timeout = 15000 } = options;

  const result = await execa(process.execPath, ["--import", TSX_LOADER, CLI_ENTRY, ...args], {
    cwd,
    env: { ...process.env, ...env },
    input,
    timeout,
    reject: false,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
    signal: result.signal ?? null,
  };
}

/**
 * Parse JSON output from CLI
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
