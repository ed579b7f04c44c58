import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { appendUserPreset, findPreset, listPresets, readUserPresets, BUILT_IN_PRESETS } from "../presets-config.js";
import { matchFiles } from "../renamer.js";

describe("user presets", () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "regex-rename-presets-"));
    path = join(dir, "nested", "presets.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns [] when the file is missing or not JSON", async () => {
    expect(await readUserPresets(path)).toEqual([]);
    const broken = join(dir, "broken.json");
    writeFileSync(broken, "{ not json");
    expect(await readUserPresets(broken)).toEqual([]);
  });

  it("drops invalid entries", async () => {
    const file = join(dir, "mixed.json");
    writeFileSync(
      file,
      JSON.stringify([
        { name: "ok", pattern: "(\\d+)", replacement: "n\\1" },
        { name: "", pattern: "x" },
        { name: "no pattern" },
        { name: "match only", pattern: "\\.tmp$" },
      ]),
    );
    expect(await readUserPresets(file)).toEqual([
      { name: "ok", pattern: "(\\d+)", replacement: "n\\1" },
      { name: "match only", pattern: "\\.tmp$" },
    ]);
  });

  it("appends to the file, creating its directory", async () => {
    await appendUserPreset({ name: "first", pattern: "a", replacement: "b" }, path);
    await appendUserPreset({ name: "second", pattern: "c" }, path);
    expect((await readUserPresets(path)).map((p) => p.name)).toEqual(["first", "second"]);
    expect(await listPresets(path)).toHaveLength(BUILT_IN_PRESETS.length + 2);
  });

  it("looks up user presets before built-in ones", async () => {
    await appendUserPreset({ name: "Lowercase extension", pattern: "mine" }, path);
    expect((await findPreset("Lowercase extension", path))?.pattern).toBe("mine");
    expect((await findPreset("Uppercase extension", path))?.replacement).toBe("\\1.\\U\\2");
    expect(await findPreset("nope", path)).toBeUndefined();
  });
});

describe("built-in presets", () => {
  function preset(name: string) {
    const found = BUILT_IN_PRESETS.find((p) => p.name === name);
    if (found === undefined) throw new Error(`missing preset ${name}`);
    return found;
  }

  it("Lowercase extension", () => {
    const { pattern, replacement } = preset("Lowercase extension");
    const [match] = matchFiles({ pattern, replacement, listFiles: () => ["Photo.JPG"] });
    expect(match.targetName).toBe("Photo.jpg");
  });

  it("Number last", () => {
    const { pattern, replacement } = preset("Number last");
    const [match] = matchFiles({ pattern, replacement, listFiles: () => ["07 - Intro.mp3"] });
    expect(match.targetName).toBe("Intro 07.mp3");
  });

  it("Pad trailing number", () => {
    const { pattern, replacement } = preset("Pad trailing number");
    const [match] = matchFiles({ pattern, replacement, padding: 3, listFiles: () => ["scan9.png"] });
    expect(match.targetName).toBe("scan009.png");
  });
});
