/**
 * Rename presets: built-in pattern/template pairs and the user's own (~/.regex-rename/presets.json).
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";

export interface RenamePreset {
  name: string;
  pattern: string;
  replacement?: string;
}

export const BUILT_IN_PRESETS: RenamePreset[] = [
  { name: "Lowercase extension", pattern: "^(.+)\\.([^.]+)$", replacement: "\\1.\\L\\2" },
  { name: "Uppercase extension", pattern: "^(.+)\\.([^.]+)$", replacement: "\\1.\\U\\2" },
  { name: "Lowercase name", pattern: "^(.+)$", replacement: "\\L\\1" },
  { name: "Number last", pattern: "^(\\d+)[ _-]+(.+)(\\.[^.]+)$", replacement: "\\2 \\1\\3" },
  { name: "Number first", pattern: "^(.+?)[ _-]+(\\d+)(\\.[^.]+)$", replacement: "\\2 \\1\\3" },
  { name: "Pad trailing number", pattern: "^(.*?)(\\d+)(\\.[^.]+)$", replacement: "\\1\\2\\3" },
];

export const PRESETS_PATH = join(homedir(), ".regex-rename", "presets.json");

function isValidEntry(obj: unknown): obj is RenamePreset {
  if (obj === null || typeof obj !== "object") return false;
  const o = obj as Record<string, unknown>;
  return (
    typeof o.name === "string" &&
    o.name.length > 0 &&
    typeof o.pattern === "string" &&
    (o.replacement === undefined || typeof o.replacement === "string")
  );
}

/**
 * Load user presets. Returns [] if the file is missing or invalid; invalid entries are dropped.
 */
export async function readUserPresets(path: string = PRESETS_PATH): Promise<RenamePreset[]> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch {
    return [];
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return [];
  }
  if (!Array.isArray(data)) return [];
  return data.filter(isValidEntry);
}

/**
 * Append one preset to the user file, creating its directory if needed. Throws on write error.
 */
export async function appendUserPreset(
  preset: RenamePreset,
  path: string = PRESETS_PATH,
): Promise<void> {
  const current = await readUserPresets(path);
  current.push(preset);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(current, null, 2), "utf-8");
}

/** User presets shadow built-in ones of the same name. */
export async function findPreset(
  name: string,
  path: string = PRESETS_PATH,
): Promise<RenamePreset | undefined> {
  const user = await readUserPresets(path);
  return user.find((p) => p.name === name) ?? BUILT_IN_PRESETS.find((p) => p.name === name);
}

export async function listPresets(path: string = PRESETS_PATH): Promise<RenamePreset[]> {
  return [...BUILT_IN_PRESETS, ...(await readUserPresets(path))];
}
