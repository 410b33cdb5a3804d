/**
 * Discovery config parsing — validates raw values against DiscoveryConfigSchema.
 */

import { DiscoveryConfigSchema } from "./schemas";
import type { DiscoveryConfig, Result } from "./types";

/**
 * Parse a raw config object, filling defaults for missing fields.
 * `null`/`undefined` (e.g. an empty YAML file) yields the defaults.
 */
export function parseDiscoveryConfig(raw: unknown): Result<DiscoveryConfig> {
  const parsed = DiscoveryConfigSchema.safeParse(raw ?? {});
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  const error = parsed.error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "config"}: ${issue.message}`)
    .join("; ");
  return { ok: false, error };
}

/** The built-in configuration ("sw" sources, "Forc.toml" manifests) */
export function defaultDiscoveryConfig(): DiscoveryConfig {
  return DiscoveryConfigSchema.parse({});
}
