#!/usr/bin/env node

/**
 * sway-paths CLI — Entry point
 *
 * Discovery commands for Forc projects: files, root, modules
 */

import * as fs from "fs";
import * as path from "path";
import { Command } from "commander";
import { findParentDirWithFile } from "@sway-paths/core";
import { filesCommand } from "./commands/files";
import { rootCommand } from "./commands/root";
import { modulesCommand } from "./commands/modules";

// Nearest package.json above this file, so source and compiled layouts both work
function readVersion(): string {
  const pkgDir = findParentDirWithFile(__dirname, "package.json");
  if (pkgDir === null) return "0.0.0";
  const pkgJson: unknown = JSON.parse(fs.readFileSync(path.join(pkgDir, "package.json"), "utf-8"));
  if (typeof pkgJson === "object" && pkgJson !== null && "version" in pkgJson && typeof pkgJson.version === "string") {
    return pkgJson.version;
  }
  return "0.0.0";
}

const program = new Command();

program
  .name("sway-paths")
  .description("Locate Forc project roots and Sway source files")
  .version(readVersion());

program
  .command("files [dir]")
  .description("List source files under a directory (default: project root)")
  .option("--json", "Output as JSON")
  .action(async (dir: string | undefined, opts: { json?: boolean }) => {
    await filesCommand(dir, opts);
  });

program
  .command("root [path]")
  .description("Find the directory containing the nearest manifest")
  .option("--nested", "Search below the path instead of above it")
  .option("-f, --file <name>", "Manifest filename to look for")
  .option("--with-sources", "Skip manifest directories without source files")
  .option("--json", "Output as JSON")
  .action(async (start: string | undefined, opts: { nested?: boolean; file?: string; withSources?: boolean; json?: boolean }) => {
    await rootCommand(start, opts);
  });

program
  .command("modules <modulePath>")
  .description("Check that each prefix of a module path (a::b::c) has a source file")
  .option("-r, --root <dir>", "Project root (default: nearest manifest directory)")
  .option("--json", "Output as JSON")
  .action(async (modulePath: string, opts: { root?: string; json?: boolean }) => {
    await modulesCommand(modulePath, opts);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
