/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { DEFAULT_HOME_DIR, DEFAULT_HOST } from "@pipecloud/sdk";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the pipecloud home directory
 * Priority: CLI option > PIPECLOUD_HOME env var > default "~/.pipecloud"
 */
export function resolveHome(cliHome?: string): string {
  const home = cliHome ?? process.env.PIPECLOUD_HOME ?? DEFAULT_HOME_DIR;
  return path.resolve(expandTilde(home));
}

/**
 * Resolve the tracking service base URL
 * Priority: CLI option > PIPECLOUD_HOST env var > default host
 */
export function resolveHost(cliHost?: string): string {
  return cliHost ?? process.env.PIPECLOUD_HOST ?? DEFAULT_HOST;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.PIPECLOUD_CLI_DEBUG === "1";
}
