/**
 * Local storage of the cloud API key
 */

import { loadUserConfig, setUserConfigValue, userConfigPath } from "./config.js";
import { logger } from "./observability/logs.js";

/** Issued keys are 22 URL-safe characters */
export const KEY_PATTERN = /^[A-Za-z0-9_-]{22}$/;

export const MALFORMED_KEY_MESSAGE =
  "The API key is malformed. Please validate your key or contact the admin.";

/**
 * Check the shape of an API key without contacting the service
 */
export function isWellFormedKey(value: unknown): value is string {
  return typeof value === "string" && KEY_PATTERN.test(value);
}

export interface CredentialStore {
  /** Absolute path of the backing config file */
  readonly configPath: string;

  /**
   * Store the key, replacing any previous one. A malformed key is reported
   * as a warning and not stored. Other settings in the file are kept.
   * @returns true when the key was written
   * @throws ConfigParseError when the existing file cannot be edited safely
   */
  setKey(value: string | null | undefined): Promise<boolean>;

  /**
   * Read the stored key
   * @returns The key, or null when none is stored
   */
  getKey(): Promise<string | null>;
}

/**
 * Open the credential store kept in the user config under `home`
 */
export function openCredentialStore(home: string): CredentialStore {
  const configPath = userConfigPath(home);

  return {
    configPath,

    async setKey(value): Promise<boolean> {
      if (!isWellFormedKey(value)) {
        logger.warn("credentials.malformed_key", { message: MALFORMED_KEY_MESSAGE });
        return false;
      }

      await setUserConfigValue(home, "cloud_key", value);
      logger.debug("credentials.key_stored", { message: configPath });
      return true;
    },

    async getKey(): Promise<string | null> {
      const config = await loadUserConfig(home);
      return config.cloud_key ? config.cloud_key : null;
    },
  };
}

/**
 * The stored key when this user has set one up for the cloud, else null
 */
export async function getCloudUser(home: string): Promise<string | null> {
  return openCredentialStore(home).getKey();
}
