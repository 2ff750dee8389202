/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

/**
 * Parse a non-negative integer argument
 * @param max - Largest accepted value (default 10000)
 */
export function parseNonNegativeInt(value: string, name: string, max = 10000): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed > max) {
    throw new InvalidArgumentError(`${name} must be <= ${max}`);
  }

  return parsed;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}
