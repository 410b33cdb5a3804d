import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, writeFileSync, rmSync, realpathSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

// Silence the interactive UI; only --json output is asserted
vi.mock("@clack/prompts", () => ({
  intro: vi.fn(),
  outro: vi.fn(),
  log: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), success: vi.fn(), message: vi.fn() },
}));

import { filesCommand } from "../files";
import { rootCommand } from "../root";
import { modulesCommand } from "../modules";

describe("commands (--json)", () => {
  let tmpDir: string;
  let output: string[];

  beforeEach(() => {
    tmpDir = realpathSync(mkdtempSync(join(tmpdir(), "commands-test-")));
    mkdirSync(join(tmpDir, "src", "utils"), { recursive: true });
    writeFileSync(join(tmpDir, "Forc.toml"), "[project]\n");
    writeFileSync(join(tmpDir, "src", "main.sw"), "contract;\n");
    writeFileSync(join(tmpDir, "src", "utils.sw"), "library;\n");
    writeFileSync(join(tmpDir, "src", "utils", "math.sw"), "library;\n");
    writeFileSync(join(tmpDir, "README.md"), "");

    vi.spyOn(process, "cwd").mockReturnValue(join(tmpDir, "src", "utils"));
    vi.spyOn(process, "exit").mockImplementation((code?: string | number | null) => {
      throw new Error(`process.exit(${code})`);
    });
    output = [];
    vi.spyOn(console, "log").mockImplementation((message?: unknown) => {
      output.push(String(message));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function printed(): unknown {
    return JSON.parse(output[0] ?? "null");
  }

  it("files lists sources under the enclosing project root", async () => {
    await filesCommand(undefined, { json: true });

    expect(printed()).toEqual({
      root: tmpDir,
      extension: "sw",
      files: [
        join(tmpDir, "src", "main.sw"),
        join(tmpDir, "src", "utils.sw"),
        join(tmpDir, "src", "utils", "math.sw"),
      ],
    });
  });

  it("root finds the manifest above the working directory", async () => {
    await rootCommand(undefined, { json: true });

    expect(printed()).toEqual({
      start: join(tmpDir, "src", "utils"),
      fileName: "Forc.toml",
      direction: "up",
      root: tmpDir,
    });
  });

  it("root --nested skips the start directory's own manifest", async () => {
    mkdirSync(join(tmpDir, "member"));
    writeFileSync(join(tmpDir, "member", "Forc.toml"), "[project]\n");

    await rootCommand(tmpDir, { json: true, nested: true });

    expect(printed()).toEqual({ start: tmpDir, fileName: "Forc.toml", direction: "down", root: join(tmpDir, "member") });
  });

  it("root exits 1 when nothing is found", async () => {
    await expect(rootCommand(tmpDir, { json: true, file: "Missing.toml" })).rejects.toThrow("process.exit(1)");
    expect(printed()).toEqual({ start: tmpDir, fileName: "Missing.toml", direction: "up", root: null });
  });

  it("root --with-sources skips a manifest directory without sources", async () => {
    mkdirSync(join(tmpDir, "tools", "scripts"), { recursive: true });
    writeFileSync(join(tmpDir, "tools", "Forc.toml"), "[project]\n");
    writeFileSync(join(tmpDir, "tools", "scripts", "deploy.txt"), "");

    await rootCommand(join(tmpDir, "tools", "scripts"), { json: true, withSources: true });

    expect(printed()).toEqual({
      start: join(tmpDir, "tools", "scripts"),
      fileName: "Forc.toml",
      direction: "up",
      root: tmpDir,
    });
  });

  it("root without --with-sources stops at the nearest manifest", async () => {
    mkdirSync(join(tmpDir, "tools"));
    writeFileSync(join(tmpDir, "tools", "Forc.toml"), "[project]\n");

    await rootCommand(join(tmpDir, "tools"), { json: true });

    expect(printed()).toEqual({ start: join(tmpDir, "tools"), fileName: "Forc.toml", direction: "up", root: join(tmpDir, "tools") });
  });

  it("root rejects --nested together with --with-sources", async () => {
    await expect(rootCommand(tmpDir, { json: true, nested: true, withSources: true })).rejects.toThrow(
      "process.exit(1)"
    );
    expect(output).toEqual([]);
  });

  it("modules reports each resolved prefix", async () => {
    await modulesCommand("utils::math", { json: true });

    expect(printed()).toEqual({
      root: tmpDir,
      modulePath: "utils::math",
      checks: [
        { modulePath: "utils", file: join(tmpDir, "src", "utils.sw"), exists: true },
        { modulePath: "utils::math", file: join(tmpDir, "src", "utils", "math.sw"), exists: true },
      ],
    });
  });

  it("modules exits 1 at the first missing prefix", async () => {
    await expect(modulesCommand("utils::trig", { json: true })).rejects.toThrow("process.exit(1)");
  });
});
