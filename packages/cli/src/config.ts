/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { error, ok, type Result } from "@signet/dispatch";
import type { SortOrder } from "@signet/sources";
import type { SignetConfig, CliOptions, ResolvedConfig } from "./types.js";

export const CONFIG_FILE = "signet.json";

export const DEFAULT_BASE_URL =
  "http://soleil.i4ds.ch/solarradio/data/2002-20yy_Callisto";

const SORT_ORDERS: readonly SortOrder[] = ["name", "none"];

export const isSortOrder = (value: unknown): value is SortOrder =>
  SORT_ORDERS.some((order) => order === value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const optionalString = (
  record: Record<string, unknown>,
  key: string
): Result<string | undefined, string> => {
  const value = record[key];
  return value === undefined || typeof value === "string"
    ? ok(value)
    : error(`${CONFIG_FILE}: '${key}' must be a string`);
};

/**
 * Validate parsed JSON as a SignetConfig
 */
export const parseConfig = (value: unknown): Result<SignetConfig, string> => {
  if (!isRecord(value)) {
    return error(`${CONFIG_FILE}: expected an object`);
  }

  const baseUrl = optionalString(value, "baseUrl");
  if (!baseUrl.ok) return baseUrl;
  const instrument = optionalString(value, "instrument");
  if (!instrument.ok) return instrument;

  const sortBy = value.sortBy;
  if (sortBy === undefined || isSortOrder(sortBy)) {
    return ok({
      baseUrl: baseUrl.value,
      instrument: instrument.value,
      sortBy,
    });
  }
  return error(`${CONFIG_FILE}: 'sortBy' must be "name" or "none"`);
};

/**
 * Load signet.json from a path
 */
export const loadConfig = (
  configPath: string
): Result<SignetConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return parseConfig(JSON.parse(content));
  } catch (caught) {
    return error(
      `Failed to parse ${CONFIG_FILE}: ${caught instanceof Error ? caught.message : String(caught)}`
    );
  }
};

/**
 * Find signet.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args.
 * The caller validates `cliOptions.sort` before resolving.
 */
export const resolveConfig = (
  config: SignetConfig,
  cliOptions: CliOptions
): ResolvedConfig => ({
  baseUrl: cliOptions.baseUrl ?? config.baseUrl ?? DEFAULT_BASE_URL,
  instrument: cliOptions.instrument ?? config.instrument,
  sortBy: isSortOrder(cliOptions.sort)
    ? cliOptions.sort
    : (config.sortBy ?? "name"),
  verbose: cliOptions.verbose ?? false,
  quiet: cliOptions.quiet ?? false,
});
