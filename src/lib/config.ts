/**
 * Configuration loading and validation utilities.
 *
 * The helper can read its paths from an optional JSON file so that repeated
 * invocations do not have to spell out every flag.
 */

import { access, readFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { HelperConfigFile, LoadedHelperConfig } from '../types/config.js';
import { isBuildMode } from '../types/build.js';
import { CONFIG_FILE_NAME } from './branding.js';
import { loadSchema, validateWithSchema } from './schema.js';

export { CONFIG_FILE_NAME };

/** Location of the JSON schema the config file is checked against */
export const CONFIG_SCHEMA_PATH = fileURLToPath(
  new URL('../../schemas/helper-config.schema.json', import.meta.url)
);

const PATH_KEYS = ['package_path', 'build_path', 'toolchain', 'install_path'] as const;

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Searches for a configuration file by walking upward from `startDir`.
 * Stops at the filesystem root if not found.
 *
 * @returns Path to the config file if found, null otherwise
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    try {
      await access(configPath);
      return configPath;
    } catch {
      // Not here; keep walking up.
    }

    if (currentDir === dirname(currentDir)) {
      return null;
    }
    currentDir = dirname(currentDir);
  }
}

/**
 * Structural check used after schema validation to narrow the parsed value.
 */
export function isHelperConfigFile(value: unknown): value is HelperConfigFile {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }

  const c = value as Record<string, unknown>;

  for (const key of PATH_KEYS) {
    if (c[key] !== undefined && typeof c[key] !== 'string') return false;
  }
  if (c.configuration !== undefined && (typeof c.configuration !== 'string' || !isBuildMode(c.configuration))) {
    return false;
  }
  if (c.verbose !== undefined && typeof c.verbose !== 'boolean') return false;

  return true;
}

/**
 * Makes every relative path in the file relative to the file's directory.
 */
export function resolveConfigPaths(values: HelperConfigFile, baseDir: string): HelperConfigFile {
  const resolved: HelperConfigFile = { ...values };
  for (const key of PATH_KEYS) {
    const value = values[key];
    if (value !== undefined) {
      resolved[key] = resolve(baseDir, value);
    }
  }
  return resolved;
}

/**
 * Loads and validates the helper configuration file.
 *
 * @param configPath - Explicit path (from `--config`). When omitted, the file
 *                     is searched for upward from the working directory and
 *                     a missing file yields empty values.
 * @throws {ConfigError} If the file cannot be read, parsed or validated, or
 *                       if an explicit path does not exist
 *
 * @example
 * ```typescript
 * const { values } = await loadHelperConfig('ci/swift-backtrace-helper.config.json');
 * ```
 */
export async function loadHelperConfig(configPath?: string): Promise<LoadedHelperConfig> {
  const resolvedPath = configPath ? resolve(configPath) : await findConfigFile();
  if (!resolvedPath) {
    return { path: null, values: {} };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Failed to read configuration file ${resolvedPath}: ${error instanceof Error ? error.message : String(error)}`,
      resolvedPath,
      error instanceof Error ? error : undefined
    );
  }

  const schema = await loadSchema(CONFIG_SCHEMA_PATH);
  const result = validateWithSchema(raw, schema, isHelperConfigFile);
  if (!result.valid || !result.data) {
    throw new ConfigError(
      `Invalid configuration file ${resolvedPath}: ${result.errors.join('; ')}`,
      resolvedPath
    );
  }

  return {
    path: resolvedPath,
    values: resolveConfigPaths(result.data, dirname(resolvedPath)),
  };
}
