/**
 * Shared UI helpers using @clack/prompts
 */

import * as path from "path";
import * as p from "@clack/prompts";
import pc from "picocolors";

/**
 * Display the command banner
 */
export function showBanner(title: string): void {
  p.intro(pc.bgCyan(pc.black(` sway-paths — ${title} `)));
}

/**
 * Show an error and exit
 */
export function exitWithError(message: string): never {
  p.log.error(message);
  process.exit(1);
}

/**
 * Format a path relative to `base` for display ("." for base itself)
 */
export function formatPath(target: string, base: string = process.cwd()): string {
  const relative = path.relative(base, target);
  if (relative === "") return ".";
  return relative.startsWith("..") || path.isAbsolute(relative) ? target : relative;
}

/**
 * Print a value as pretty JSON on stdout
 */
export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
