/**
 * File system test utilities
 */

import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { userConfigPath } from "@pipecloud/sdk";

/**
 * Create a unique temporary directory to use as a pipecloud home
 * @param prefix - Prefix for the temp directory (default: "pipecloud-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempHome(prefix = "pipecloud-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Seed the user config file of a home directory with raw YAML
 * @returns Path of the written file
 */
export async function writeUserConfig(home: string, yaml: string): Promise<string> {
  const filePath = userConfigPath(home);
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, yaml, "utf-8");
  return filePath;
}

/**
 * Execute a function with a clean temp home directory
 * @returns Result of fn
 */
export async function withTempHome<T>(fn: (home: string) => Promise<T>): Promise<T> {
  const home = await createTempHome();
  try {
    return await fn(home);
  } finally {
    await removeDir(home);
  }
}
