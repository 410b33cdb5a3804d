/**
 * Manifest directory discovery.
 *
 * Downward searches look for a manifest nested below a starting point;
 * upward searches walk toward the filesystem root. Every locator returns the
 * directory that contains the file, or null when there is none.
 */

import * as fs from "fs";
import * as path from "path";
import { MANIFEST_FILE_NAME } from "./constants";
import type { DirCheck } from "./types";
import { statPath, walkTree } from "./walk";

/**
 * Walk down the file tree until a Forc manifest is found.
 */
export function findNestedManifestDir(startPath: string): string | null {
  return findNestedDirWithFile(startPath, MANIFEST_FILE_NAME);
}

/**
 * Walk down the file tree until an entry named `fileName` is found and
 * return its parent directory.
 *
 * When `startPath` is a file, its directory is searched instead. A file sitting
 * directly at `<startDir>/<fileName>` is skipped: only matches in child
 * directories count. With several matches, which one wins depends on readdir
 * order.
 */
export function findNestedDirWithFile(startPath: string, fileName: string): string | null {
  const stat = statPath(startPath);
  if (stat === null) return null;

  const startDir = stat.isDirectory() ? startPath : path.dirname(startPath);
  const selfMatch = path.join(startDir, fileName);

  for (const entry of walkTree(startDir)) {
    if (entry.name === fileName && entry.path !== selfMatch) {
      return path.dirname(entry.path);
    }
  }
  return null;
}

/**
 * Walk up the file tree until a directory containing `fileName` is found.
 *
 * `startPath` is canonicalized first (symlinks, `.` and `..`); if that fails
 * the result is null. The search starts at the canonical path itself and stops
 * before the filesystem root.
 */
export function findParentDirWithFile(startPath: string, fileName: string): string | null {
  let dir: string;
  try {
    dir = fs.realpathSync(startPath);
  } catch {
    return null;
  }

  const root = path.parse(dir).root;
  while (dir !== root) {
    if (fs.existsSync(path.join(dir, fileName))) {
      return dir;
    }
    dir = path.dirname(dir);
  }
  return null;
}

/**
 * Walk up the file tree until a Forc manifest is found.
 */
export function findParentManifestDir(startPath: string): string | null {
  return findParentDirWithFile(startPath, MANIFEST_FILE_NAME);
}

/**
 * Walk up the file tree until a directory containing `fileName` is found for
 * which `check` returns true. Rejected directories are skipped and the search
 * resumes from their parent.
 */
export function findParentDirWithFileAndCheck(
  startPath: string,
  fileName: string,
  check: DirCheck
): string | null {
  let from = startPath;
  while (true) {
    const found = findParentDirWithFile(from, fileName);
    if (found === null) return null;
    if (check(found)) return found;

    const parent = path.dirname(found);
    if (parent === found) return null;
    from = parent;
  }
}

/**
 * Walk up the file tree until a Forc manifest is found whose directory
 * satisfies `check` (e.g. "the manifest declares package X").
 */
export function findParentManifestDirWithCheck(startPath: string, check: DirCheck): string | null {
  return findParentDirWithFileAndCheck(startPath, MANIFEST_FILE_NAME, check);
}
