/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { InvalidArgumentError } from "commander";
import { parseJson } from "./arg.js";
import { CliError } from "./errors.js";

/**
 * Read from stdin with size limit (default 10MB)
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 10 * 1024 * 1024): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit during streaming to prevent memory exhaustion
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Read JSON from a file
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CliError(`Failed to read ${filePath}: ${reason}`, { cause: err });
  }
  return parseJson(content, `file ${filePath}`);
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}

/**
 * Load a DAG summary from a JSON file, or from stdin when the path is "-"
 */
export async function readDagSource(source: string): Promise<unknown> {
  if (source !== "-") {
    return readJsonFromFile(source);
  }

  if (isStdinTTY()) {
    throw new InvalidArgumentError("--dag - expects a JSON DAG summary piped to stdin");
  }

  let stdin: string;
  try {
    stdin = await readStdin();
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : "Failed to read from stdin");
  }
  if (!stdin.trim()) {
    throw new InvalidArgumentError("stdin is empty");
  }
  return parseJson(stdin, "stdin");
}
