/**
 * CLI flag parsing and usage/version output.
 */

import { parse } from "@bomb.sh/args";
import { UsageError } from "./errors.js";

export const VERSION = "0.1.0";

export interface ParsedArgs {
  help: boolean;
  version: boolean;
  rename: boolean;
  full: boolean;
  recursive: boolean;
  continueOnError: boolean;
  listPresets: boolean;
  padding: number;
  dir: string;
  pattern: string | undefined;
  replacement: string | undefined;
  preset: string | undefined;
  savePreset: string | undefined;
}

const ARGS_CONFIG = {
  boolean: ["help", "version", "rename", "full", "recursive", "continue-on-error", "list-presets"] as const,
  string: ["dir", "pad-to", "preset", "save-preset"] as const,
  alias: { h: "help", v: "version", f: "full", r: "recursive" } as const,
};

function parsePadding(value: string | undefined): number {
  if (value === undefined) return 0;
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`--pad-to expects a non-negative integer, got "${value}".`);
  }
  return Number.parseInt(value, 10);
}

export function parseArgs(argv: string[]): ParsedArgs {
  const raw = parse(argv, ARGS_CONFIG);
  const positionals = raw._.map(String);
  if (positionals.length > 2) {
    throw new UsageError(`Unexpected argument: ${positionals[2]}`);
  }
  return {
    help: Boolean(raw.help),
    version: Boolean(raw.version),
    rename: Boolean(raw.rename),
    full: Boolean(raw.full),
    recursive: Boolean(raw.recursive),
    continueOnError: Boolean(raw["continue-on-error"]),
    listPresets: Boolean(raw["list-presets"]),
    padding: parsePadding(raw["pad-to"]),
    dir: raw.dir ?? ".",
    pattern: positionals[0],
    replacement: positionals[1],
    preset: raw.preset,
    savePreset: raw["save-preset"],
  };
}

export function printHelp(): void {
  const usage = `regex-rename – bulk rename files matching a regular expression

Usage:
  regex-rename <pattern> [replacement] [options]
  regex-rename --preset <name> [options]
  regex-rename --list-presets
  regex-rename --help | --version

Without --rename nothing is renamed: matches and their new names are only shown.

Replacement syntax:
  \\1, \\2 …            Insert a matched group
  \\L\\1                Insert group 1 in lower case
  \\U\\1                Insert group 1 in upper case

Options:
  --rename               Apply the renames (default: dry run)
  --full, -f             Pattern must match the whole file name
  --recursive, -r        Also match files in sub-directories
  --pad-to <n>           Zero-pad numeric groups to n digits
  --dir <path>           Directory to work in (default: .)
  --continue-on-error    Keep renaming after a failed rename
  --preset <name>        Take pattern and replacement from a saved preset
  --save-preset <name>   Save pattern and replacement as a preset after the run
  --list-presets         Show built-in and saved presets

Examples:
  regex-rename "a(\\d)\\.txt" "x\\1.dat"
  regex-rename "(\\w+)\\.(\\w+)" "\\1.\\L\\2" --full --rename
  regex-rename "item(\\d+)\\.txt" "item_\\1.txt" --pad-to 3 --rename`;
  console.log(usage);
}

export function printVersion(): void {
  console.log(VERSION);
}
