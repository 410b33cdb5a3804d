/**
 * Filesystem walking primitives shared by the collectors and locators.
 */

import * as fs from "fs";
import * as path from "path";
import type { WalkEntry } from "./types";

/**
 * stat() that reports any failure (missing, ENOTDIR, EACCES, ELOOP) as null.
 * Follows symlinks.
 */
export function statPath(entryPath: string): fs.Stats | null {
  try {
    return fs.statSync(entryPath);
  } catch {
    return null;
  }
}

/**
 * Depth-first, pre-order walk of everything below `root` (root itself is not
 * yielded). Entries come in readdir order; symlinked directories are yielded
 * but not descended into. Unreadable directories contribute no children.
 */
export function* walkTree(root: string): Generator<WalkEntry> {
  const pending = readEntries(root).reverse();

  let entry: WalkEntry | undefined;
  while ((entry = pending.pop()) !== undefined) {
    yield entry;
    if (entry.isDirectory) {
      pending.push(...readEntries(entry.path).reverse());
    }
  }
}

function readEntries(dir: string): WalkEntry[] {
  try {
    return fs.readdirSync(dir, { withFileTypes: true }).map((dirent) => ({
      path: path.join(dir, dirent.name),
      name: dirent.name,
      isDirectory: dirent.isDirectory(),
    }));
  } catch {
    return [];
  }
}
