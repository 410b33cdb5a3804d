/**
 * Locate the manifest directory above (or below) a path
 */

import * as p from "@clack/prompts";
import pc from "picocolors";
import {
  findNestedDirWithFile,
  findParentDirWithFile,
  findParentDirWithFileAndCheck,
} from "@sway-paths/core";
import { loadDiscoveryConfig } from "../lib/config";
import { containsSourceFile } from "../lib/project";
import { exitWithError, formatPath, printJson, showBanner } from "../lib/ui";

export interface RootOptions {
  /** Search descendants instead of ancestors */
  nested?: boolean;
  /** Manifest filename override */
  file?: string;
  /** Only accept manifest directories that contain source files */
  withSources?: boolean;
  /** Output as JSON */
  json?: boolean;
}

export async function rootCommand(start: string | undefined, opts: RootOptions): Promise<void> {
  const loaded = loadDiscoveryConfig();
  if (!loaded.ok) exitWithError(loaded.error);
  const { config } = loaded.value;

  if (opts.nested && opts.withSources) {
    exitWithError("--with-sources only applies to the upward search; drop --nested.");
  }

  const startPath = start ?? process.cwd();
  const fileName = opts.file ?? config.manifestFileName;

  let found: string | null;
  if (opts.nested) {
    found = findNestedDirWithFile(startPath, fileName);
  } else if (opts.withSources) {
    found = findParentDirWithFileAndCheck(
      startPath,
      fileName,
      (dir) => containsSourceFile(dir, config)
    );
  } else {
    found = findParentDirWithFile(startPath, fileName);
  }

  if (opts.json) {
    printJson({ start: startPath, fileName, direction: opts.nested ? "down" : "up", root: found });
    if (found === null) process.exit(1);
    return;
  }

  showBanner("Root");
  if (found === null) {
    exitWithError(
      opts.nested
        ? `No ${fileName} found below ${formatPath(startPath)}`
        : `${fileName} not found in ${formatPath(startPath)} or any parent`
    );
  }
  p.log.success(`${pc.bold(fileName)} found in ${pc.green(formatPath(found))}`);
  p.outro(found);
}
