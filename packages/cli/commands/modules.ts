/**
 * Check that every prefix of a module path resolves to a source file
 */

import * as p from "@clack/prompts";
import pc from "picocolors";
import * as path from "path";
import { checkModulePath, parseModulePath } from "../lib/modules";
import { loadDiscoveryConfig } from "../lib/config";
import { findProjectRoot } from "../lib/project";
import { exitWithError, formatPath, printJson, showBanner } from "../lib/ui";

export interface ModulesOptions {
  /** Project root (default: nearest manifest directory) */
  root?: string;
  /** Output as JSON */
  json?: boolean;
}

export async function modulesCommand(modulePath: string, opts: ModulesOptions): Promise<void> {
  const loaded = loadDiscoveryConfig();
  if (!loaded.ok) exitWithError(loaded.error);
  const { config } = loaded.value;

  const segments = parseModulePath(modulePath);
  if (!segments.ok) exitWithError(segments.error);

  const root = opts.root !== undefined ? path.resolve(opts.root) : findProjectRoot(process.cwd(), config);
  if (root === null) {
    exitWithError(`${config.manifestFileName} not found in current directory or any parent (pass --root)`);
  }

  const checks = checkModulePath(root, segments.value, config);
  const missing = checks.find((check) => !check.exists);

  if (opts.json) {
    printJson({ root, modulePath, checks });
    if (missing) process.exit(1);
    return;
  }

  showBanner("Modules");
  for (const check of checks) {
    const line = `${pc.bold(check.modulePath)} ${pc.dim(formatPath(check.file))}`;
    if (check.exists) {
      p.log.success(line);
    } else {
      p.log.error(line);
    }
  }

  if (missing) {
    exitWithError(`Module ${missing.modulePath} has no source file`);
  }
  p.outro(`${modulePath} resolves`);
}
