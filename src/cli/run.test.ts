import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import type { MetadataSource } from "../media/metadata-source.js";
import type { MetadataTags } from "../rename/types.js";
import { MetadataReadError } from "../rename/errors.js";
import { createMetadataRecord } from "../rename/types.js";
import { VERSION } from "../version.js";
import { runCli, type CliRuntime } from "./run.js";

function createRuntime() {
  const out: string[] = [];
  const err: string[] = [];
  const runtime: CliRuntime = {
    log: (message) => out.push(message),
    error: (message) => err.push(message),
  };
  return { runtime, out, err };
}

function fakeSource(tagsByPath: Record<string, MetadataTags>): MetadataSource {
  return {
    read: vi.fn(async (filePath: string) => {
      const tags = tagsByPath[filePath];
      if (!tags) {
        throw new MetadataReadError(filePath, new Error("unreadable"));
      }
      return createMetadataRecord(tags);
    }),
  };
}

const library: Record<string, MetadataTags> = {
  "a/01.mp3": { artist: "Boards of Canada", title: "Roygbiv", track: 1, year: 1998 },
  "a/02.flac": { artist: "AC/DC", title: "T.N.T.", track: 2 },
  "a/03.ogg": { artist: "Nobody" },
};

describe("runCli", () => {
  let home: string;

  beforeAll(async () => {
    home = await fs.mkdtemp(path.join(os.tmpdir(), "tagrename-cli-test-"));
  });

  afterAll(async () => {
    await fs.rm(home, { recursive: true, force: true });
  });

  function deps(runtime: CliRuntime, env: NodeJS.ProcessEnv = {}) {
    return { runtime, env, homedir: () => home, source: fakeSource(library) };
  }

  it("prints one renamed path per input", async () => {
    const { runtime, out, err } = createRuntime();
    const code = await runCli(["%track - %title", "a/01.mp3", "a/02.flac"], deps(runtime));
    expect(code).toBe(0);
    expect(out).toEqual([path.join("a", "1 - Roygbiv.mp3"), path.join("a", "2 - T.N.T..flac")]);
    expect(err).toEqual([]);
  });

  it("stops at the first failing file after printing earlier ones", async () => {
    const { runtime, out, err } = createRuntime();
    const code = await runCli(["%title", "a/01.mp3", "a/03.ogg", "a/02.flac"], deps(runtime));
    expect(code).toBe(1);
    expect(out).toEqual([path.join("a", "Roygbiv.mp3")]);
    expect(err).toEqual(["missing required tag: Title"]);
  });

  it("reports unreadable files", async () => {
    const { runtime, err } = createRuntime();
    const code = await runCli(["%title", "a/missing.mp3"], deps(runtime));
    expect(code).toBe(1);
    expect(err).toEqual(["a/missing.mp3: unreadable"]);
  });

  it("rejects unknown template keys before reading files", async () => {
    const { runtime, out, err } = createRuntime();
    const d = deps(runtime);
    const code = await runCli(["%genre", "a/01.mp3"], d);
    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual(["bad format key: genre"]);
    expect(d.source.read).not.toHaveBeenCalled();
  });

  it("sanitizes tag values with --sanitize", async () => {
    const { runtime, out } = createRuntime();
    const code = await runCli(["--sanitize", "%artist", "a/02.flac"], deps(runtime));
    expect(code).toBe(0);
    expect(out).toEqual([path.join("a", "AC_DC.flac")]);
  });

  it("takes the template from --template", async () => {
    const { runtime, out } = createRuntime();
    const code = await runCli(["a/01.mp3", "-t", "%year"], deps(runtime));
    expect(code).toBe(0);
    expect(out).toEqual([path.join("a", "1998.mp3")]);
  });

  it("takes the template and sanitize setting from the config file", async () => {
    const configPath = path.join(home, "cfg.json");
    await fs.writeFile(configPath, JSON.stringify({ template: "%artist", sanitize: true }));
    const { runtime, out } = createRuntime();
    const code = await runCli(["--config", configPath, "a/02.flac"], deps(runtime));
    expect(code).toBe(0);
    expect(out).toEqual([path.join("a", "AC_DC.flac")]);
  });

  it("treats every positional as a path when the config sets a template", async () => {
    const configPath = path.join(home, "title.json");
    await fs.writeFile(configPath, JSON.stringify({ template: "%title" }));
    const { runtime, out, err } = createRuntime();
    const d = deps(runtime);
    const code = await runCli(["--config", configPath, "%artist", "a/01.mp3"], d);
    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual(["%artist: unreadable"]);
    expect(d.source.read).toHaveBeenCalledWith("%artist");
  });

  it("fails on an invalid config file", async () => {
    const configPath = path.join(home, "bad.json");
    await fs.writeFile(configPath, JSON.stringify({ verbose: "loud" }));
    const { runtime, err } = createRuntime();
    const code = await runCli(["--config", configPath, "%title", "a/01.mp3"], deps(runtime));
    expect(code).toBe(1);
    expect(err).toHaveLength(1);
    expect(err[0]).toContain(`${configPath}: /verbose:`);
  });

  it("logs diagnostics to stderr when verbose", async () => {
    const { runtime, out, err } = createRuntime();
    const code = await runCli(
      ["%title", "a/01.mp3"],
      deps(runtime, { TAGRENAME_VERBOSE: "1" } as NodeJS.ProcessEnv),
    );
    expect(code).toBe(0);
    expect(out).toEqual([path.join("a", "Roygbiv.mp3")]);
    expect(err).toEqual([
      `[tagrename] config: ${path.join(home, ".config", "tagrename", "config.json")}`,
      `[tagrename] 1/1 a/01.mp3 -> ${path.join("a", "Roygbiv.mp3")}`,
    ]);
  });

  describe("--check", () => {
    it("prints ok for a valid template", async () => {
      const { runtime, out } = createRuntime();
      expect(await runCli(["--check", "%artist - %title"], deps(runtime))).toBe(0);
      expect(out).toEqual(["ok"]);
    });

    it("checks the given template over the configured one", async () => {
      const configPath = path.join(home, "check.json");
      await fs.writeFile(configPath, JSON.stringify({ template: "%title" }));
      const { runtime, out, err } = createRuntime();
      expect(await runCli(["--config", configPath, "--check", "%genre"], deps(runtime))).toBe(1);
      expect(out).toEqual([]);
      expect(err).toEqual(["Unknown field: %genre"]);
    });

    it("checks the configured template when none is given", async () => {
      const configPath = path.join(home, "check-only.json");
      await fs.writeFile(configPath, JSON.stringify({ template: "%bogus" }));
      const { runtime, err } = createRuntime();
      expect(await runCli(["--config", configPath, "--check"], deps(runtime))).toBe(1);
      expect(err).toEqual(["Unknown field: %bogus"]);
    });

    it("lists every problem", async () => {
      const { runtime, err } = createRuntime();
      expect(await runCli(["--check", "%genre %disc"], deps(runtime))).toBe(1);
      expect(err).toEqual(["Unknown field: %genre", "Unknown field: %disc"]);
    });
  });

  it("prints usage when paths are missing", async () => {
    const { runtime, err } = createRuntime();
    expect(await runCli(["%title"], deps(runtime))).toBe(2);
    expect(err).toEqual([
      "tagrename: no input paths",
      "Usage: tagrename [options] <template> <path...>",
    ]);
  });

  it("prints usage when the template is missing", async () => {
    const { runtime, err } = createRuntime();
    expect(await runCli([], deps(runtime))).toBe(2);
    expect(err[0]).toBe("tagrename: missing template");
  });

  it("prints usage on bad arguments", async () => {
    const { runtime, err } = createRuntime();
    expect(await runCli(["--nope"], deps(runtime))).toBe(2);
    expect(err[0]).toBe("tagrename: Unknown option: --nope");
  });

  it("prints help and version", async () => {
    const help = createRuntime();
    expect(await runCli(["--help"], deps(help.runtime))).toBe(0);
    expect(help.out[0]).toContain("Usage: tagrename [options] <template> <path...>");

    const version = createRuntime();
    expect(await runCli(["-V"], deps(version.runtime))).toBe(0);
    expect(version.out).toEqual([VERSION]);
  });
});
