/**
 * Discovery config resolution for the CLI.
 *
 * Layers, lowest precedence first: built-in defaults, the nearest
 * sway-paths.yaml found walking up from the working directory, then the
 * SWAY_PATHS_EXTENSION / SWAY_PATHS_MANIFEST environment variables.
 */

import * as fs from "fs";
import * as path from "path";
import YAML from "yaml";
import type { DiscoveryConfig, Result } from "@sway-paths/core";
import {
  CONFIG_FILE_NAME,
  ENV_EXTENSION,
  ENV_MANIFEST,
  findParentDirWithFile,
  parseDiscoveryConfig,
} from "@sway-paths/core";

export interface LoadedConfig {
  config: DiscoveryConfig;
  /** The sway-paths.yaml that contributed values, if any */
  configFile: string | null;
}

/**
 * Locate the nearest sway-paths.yaml at or above `cwd`.
 */
export function findConfigFile(cwd: string = process.cwd()): string | null {
  const dir = findParentDirWithFile(cwd, CONFIG_FILE_NAME);
  return dir === null ? null : path.join(dir, CONFIG_FILE_NAME);
}

/**
 * Resolve the discovery config for `cwd`. Never throws; read, YAML and
 * validation failures come back as `{ ok: false }`.
 */
export function loadDiscoveryConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Result<LoadedConfig> {
  const configFile = findConfigFile(cwd);

  let fileValues: Record<string, unknown> = {};
  if (configFile !== null) {
    let raw: unknown;
    try {
      raw = YAML.parse(fs.readFileSync(configFile, "utf-8"));
    } catch (err) {
      return { ok: false, error: `Failed to read ${configFile}: ${err instanceof Error ? err.message : String(err)}` };
    }
    if (isRecord(raw)) {
      fileValues = raw;
    } else if (raw !== null) {
      return { ok: false, error: `${configFile}: expected a mapping at the top level` };
    }
  }

  const overrides: Record<string, string> = {};
  const envExtension = env[ENV_EXTENSION];
  if (envExtension) overrides.extension = envExtension;
  const envManifest = env[ENV_MANIFEST];
  if (envManifest) overrides.manifestFileName = envManifest;

  const parsed = parseDiscoveryConfig({ ...fileValues, ...overrides });
  if (!parsed.ok) {
    return { ok: false, error: `Invalid configuration: ${parsed.error}` };
  }
  return { ok: true, value: { config: parsed.value, configFile } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
