/**
 * User config file handling
 *
 * The config lives at `<home>/stats/config.yaml`. It is shared with other
 * settings (e.g. `stats_enabled`), so reads tolerate anything and writes
 * keep keys this module does not know about.
 */

import { join } from "node:path";
import { isMap, isScalar, parseDocument, stringify, type Pair, type Scalar } from "yaml";
import { ConfigParseError } from "./errors.js";
import { atomicWrite, readTextFile } from "./io.js";
import { logger } from "./observability/logs.js";
import type { UserConfig } from "./types.js";

export const DEFAULT_HOME_DIR = "~/.pipecloud";
export const CONF_DIR = "stats";
export const DEFAULT_USER_CONF = "config.yaml";

const STATS_DISABLED_VALUES = new Set(["false", "0", "no", "off"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Absolute path of the user config file under a home directory
 */
export function userConfigPath(home: string): string {
  return join(home, CONF_DIR, DEFAULT_USER_CONF);
}

function isKey(pair: Pair<unknown, unknown>, key: string): boolean {
  return isScalar(pair.key) && pair.key.value === key;
}

/**
 * Text of a scalar as written, so an all-digit key keeps every digit
 */
function scalarText(node: Scalar<unknown>, text: string): string | undefined {
  if (typeof node.value === "string") {
    return node.value;
  }
  if (typeof node.value === "number") {
    return node.range ? text.slice(node.range[0], node.range[1]) : String(node.value);
  }
  return undefined;
}

/**
 * Parse user config text. Malformed content yields an empty config.
 *
 * Duplicate keys are accepted; the last occurrence wins. Values other than
 * `cloud_key` are returned as written.
 */
export function parseUserConfig(text: string, source = DEFAULT_USER_CONF): UserConfig {
  const doc = parseDocument(text, { uniqueKeys: false });
  const [error] = doc.errors;
  if (error) {
    logger.warn("config.malformed", { message: `Ignoring unparsable ${source}: ${error.message}` });
    return {};
  }

  const data: unknown = doc.toJS();
  if (data === null || data === undefined) {
    return {};
  }

  if (!isRecord(data) || !isMap(doc.contents)) {
    logger.warn("config.malformed", { message: `Ignoring ${source}: expected a mapping` });
    return {};
  }

  const pairs = doc.contents.items;
  const config: UserConfig = {};
  for (const [key, value] of Object.entries(data)) {
    if (key !== "cloud_key") {
      config[key] = value;
      continue;
    }

    const node = pairs.filter((pair) => isKey(pair, key)).at(-1)?.value;
    if (value === null || value === undefined) {
      continue;
    }
    const cloudKey = isScalar(node) ? scalarText(node, text) : undefined;
    if (cloudKey === undefined) {
      logger.warn("config.invalid_field", { message: "cloud_key must be a string" });
    } else {
      config.cloud_key = cloudKey;
    }
  }

  return config;
}

/**
 * Load the user config. A missing file is an empty config.
 */
export async function loadUserConfig(home: string): Promise<UserConfig> {
  const filePath = userConfigPath(home);
  const text = await readTextFile(filePath);
  if (text === null) {
    return {};
  }
  return parseUserConfig(text, filePath);
}

/**
 * Replace the user config file, creating its directory when needed
 */
export async function saveUserConfig(home: string, config: UserConfig): Promise<void> {
  const filePath = userConfigPath(home);
  await atomicWrite(filePath, stringify(config));
  logger.debug("config.saved", { message: filePath });
}

/**
 * Set one top-level key in the config file. Every other key, value and
 * comment is kept as written; repeated entries of `key` collapse into one.
 * @throws ConfigParseError when the existing file is not a YAML mapping
 */
export async function setUserConfigValue(home: string, key: string, value: string): Promise<void> {
  const filePath = userConfigPath(home);
  const text = await readTextFile(filePath);
  const doc = parseDocument(text ?? "", { uniqueKeys: false });

  const [error] = doc.errors;
  if (error) {
    throw new ConfigParseError(filePath, error.message, { cause: error });
  }

  const contents = doc.contents;
  if (isMap(contents)) {
    const first = contents.items.find((pair) => isKey(pair, key));
    contents.items = contents.items.filter((pair) => pair === first || !isKey(pair, key));
  } else if (contents !== null) {
    throw new ConfigParseError(filePath, "expected a mapping");
  }

  doc.set(key, value);
  await atomicWrite(filePath, doc.toString());
  logger.debug("config.saved", { message: filePath });
}

function disablesStats(value: unknown): boolean {
  if (typeof value === "boolean") {
    return !value;
  }
  if (typeof value === "string" || typeof value === "number") {
    return STATS_DISABLED_VALUES.has(String(value).trim().toLowerCase());
  }
  return false;
}

/**
 * Whether anonymous usage stats are enabled.
 * Priority: PIPECLOUD_STATS_ENABLED env var > `stats_enabled` in config > true
 *
 * `false`, `0`, `no` and `off` disable stats in either place, in any case.
 */
export async function statsEnabled(
  home: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<boolean> {
  const fromEnv = env.PIPECLOUD_STATS_ENABLED;
  if (fromEnv !== undefined && fromEnv.trim() !== "") {
    return !disablesStats(fromEnv);
  }

  const config = await loadUserConfig(home);
  return !disablesStats(config.stats_enabled);
}
