/**
 * Module path checks — verifies `a`, `a::b`, `a::b::c` in turn against the
 * project's src/ tree.
 */

import * as path from "path";
import type { DiscoveryConfig, Result } from "@sway-paths/core";
import { hasExtension, iterPrefixes } from "@sway-paths/core";

/** Outcome for one prefix of a module path */
export interface ModuleCheck {
  /** Prefix joined with "::" (e.g. "storage::keys") */
  modulePath: string;
  /** Expected source file (e.g. <root>/src/storage/keys.sw) */
  file: string;
  exists: boolean;
}

/**
 * Split "a::b::c" into segments, rejecting empty segments, segments with
 * surrounding whitespace and path separators.
 */
export function parseModulePath(input: string): Result<string[]> {
  const segments = input.split("::");
  for (const segment of segments) {
    if (segment.length === 0) {
      return { ok: false, error: `Invalid module path "${input}": empty segment` };
    }
    if (segment !== segment.trim()) {
      return { ok: false, error: `Invalid module path "${input}": segment "${segment}" has surrounding whitespace` };
    }
    if (/[\\/]/.test(segment)) {
      return { ok: false, error: `Invalid module path "${input}": segment "${segment}" contains a path separator` };
    }
  }
  return { ok: true, value: segments };
}

/**
 * Check each prefix of `segments`, shortest first, stopping at the first
 * prefix whose module file is missing (the rest cannot exist either).
 */
export function checkModulePath(
  projectRoot: string,
  segments: readonly string[],
  config: DiscoveryConfig
): ModuleCheck[] {
  const checks: ModuleCheck[] = [];
  for (const prefix of iterPrefixes(segments)) {
    const file = `${path.join(projectRoot, "src", ...prefix)}.${config.extension}`;
    const exists = hasExtension(file, config.extension);
    checks.push({ modulePath: prefix.join("::"), file, exists });
    if (!exists) break;
  }
  return checks;
}
