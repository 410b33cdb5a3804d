/**
 * Source file discovery — extension filter and recursive collector.
 */

import * as fs from "fs";
import * as path from "path";
import { SWAY_EXTENSION } from "./constants";
import { statPath } from "./walk";

/**
 * True when `filePath` is an existing regular file whose extension is exactly
 * `extension` (no leading dot, case-sensitive).
 */
export function hasExtension(filePath: string, extension: string): boolean {
  if (!statPath(filePath)?.isFile()) return false;
  return path.extname(filePath) === `.${extension}`;
}

/**
 * True when `filePath` is an existing Sway source file.
 */
export function isSwayFile(filePath: string): boolean {
  return hasExtension(filePath, SWAY_EXTENSION);
}

/**
 * Collect every file under `root` (any depth) that passes hasExtension().
 *
 * Uses a work-list of pending directories. Directories that can't be read
 * (permissions, removed mid-walk) are skipped and the walk carries on.
 * Order follows the walk and carries no meaning.
 */
export function getFilesWithExtension(root: string, extension: string): string[] {
  const files: string[] = [];
  const pending = [root];

  let dir: string | undefined;
  while ((dir = pending.pop()) !== undefined) {
    let names: string[];
    try {
      names = fs.readdirSync(dir);
    } catch {
      continue;
    }

    for (const name of names) {
      const entryPath = path.join(dir, name);
      if (isDirectory(entryPath)) {
        pending.push(entryPath);
      } else if (hasExtension(entryPath, extension)) {
        files.push(entryPath);
      }
    }
  }
  return files;
}

/**
 * Collect every Sway source file under `root`.
 */
export function getSwayFiles(root: string): string[] {
  return getFilesWithExtension(root, SWAY_EXTENSION);
}

// Follows symlinks, so a linked directory is walked like a real one
function isDirectory(entryPath: string): boolean {
  return statPath(entryPath)?.isDirectory() ?? false;
}
