/**
 * Project root detection for Forc manifests.
 *
 * Walks up from process.cwd() looking for the manifest file to decide which
 * directory the CLI should treat as the project root.
 */

import type { DiscoveryConfig } from "@sway-paths/core";
import { defaultDiscoveryConfig, findParentDirWithFile, hasExtension, walkTree } from "@sway-paths/core";

/**
 * Walk up from `startDir` looking for a directory that contains the manifest.
 * Returns the directory path if found, or null if the filesystem root is reached.
 */
export function findProjectRoot(
  startDir: string = process.cwd(),
  config: DiscoveryConfig = defaultDiscoveryConfig()
): string | null {
  return findParentDirWithFile(startDir, config.manifestFileName);
}

/**
 * Directory to scan when the user gives none: the enclosing project root,
 * falling back to `startDir` outside a project.
 */
export function resolveSearchRoot(
  startDir: string = process.cwd(),
  config: DiscoveryConfig = defaultDiscoveryConfig()
): string {
  return findProjectRoot(startDir, config) ?? startDir;
}

/**
 * True as soon as one source file is found below `dir`; the walk stops at the
 * first match.
 */
export function containsSourceFile(
  dir: string,
  config: DiscoveryConfig = defaultDiscoveryConfig()
): boolean {
  for (const entry of walkTree(dir)) {
    if (!entry.isDirectory && hasExtension(entry.path, config.extension)) {
      return true;
    }
  }
  return false;
}
