/**
 * List source files under a directory (default: the enclosing project root)
 */

import * as p from "@clack/prompts";
import pc from "picocolors";
import * as path from "path";
import { getFilesWithExtension } from "@sway-paths/core";
import { loadDiscoveryConfig } from "../lib/config";
import { resolveSearchRoot } from "../lib/project";
import { exitWithError, formatPath, printJson, showBanner } from "../lib/ui";

export interface FilesOptions {
  /** Output as JSON */
  json?: boolean;
}

export async function filesCommand(dir: string | undefined, opts: FilesOptions): Promise<void> {
  const loaded = loadDiscoveryConfig();
  if (!loaded.ok) exitWithError(loaded.error);
  const { config } = loaded.value;

  const root = dir !== undefined ? path.resolve(dir) : resolveSearchRoot(process.cwd(), config);
  const files = getFilesWithExtension(root, config.extension).sort();

  if (opts.json) {
    printJson({ root, extension: config.extension, files });
    return;
  }

  showBanner("Files");
  p.log.info(`Scanning ${pc.bold(formatPath(root))} for ${pc.cyan(`*.${config.extension}`)}`);
  if (files.length === 0) {
    p.log.warn("No source files found.");
  } else {
    p.log.message(files.map((file) => formatPath(file)).join("\n"));
  }
  p.outro(`${files.length} file(s)`);
}
