/**
 * Shared type definitions for sway-paths.
 * Types are derived from Zod schemas — the schemas are the source of truth.
 */

import type { z } from "zod";
import type { DiscoveryConfigSchema } from "./schemas";

/** Extension and manifest filename used by discovery */
export type DiscoveryConfig = z.infer<typeof DiscoveryConfigSchema>;

/** An entry yielded while walking a directory subtree */
export interface WalkEntry {
  /** Full path (the walk root joined with each segment) */
  path: string;
  /** Final path segment */
  name: string;
  isDirectory: boolean;
}

/** Caller-supplied acceptance check for a candidate manifest directory */
export type DirCheck = (dir: string) => boolean;

/**
 * Discriminated union for fallible operations that return a value on success.
 * After narrowing with `if (result.ok)`, `result.value` is typed as `T`.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: string };
