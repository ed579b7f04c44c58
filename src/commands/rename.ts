/**
 * Rename command: match files in --dir, show the result, rename when --rename is given.
 */

import * as p from "@clack/prompts";
import pc from "picocolors";
import { UsageError, describeError } from "../errors.js";
import type { ParsedArgs } from "../flags.js";
import { appendUserPreset, findPreset } from "../presets-config.js";
import { bulkRename } from "../renamer.js";
import { createConsoleReporter } from "../reporter.js";
import { ensureDir, exitWithError } from "./common.js";

interface RenameRequest {
  pattern: string;
  replacement: string | undefined;
}

async function resolveRequest(args: ParsedArgs): Promise<RenameRequest> {
  const { pattern, replacement, preset } = args;
  if (preset === undefined) {
    if (pattern === undefined) {
      throw new UsageError("A pattern is required. Run with --help for usage.");
    }
    return { pattern, replacement };
  }
  if (pattern !== undefined) {
    throw new UsageError("Use either a pattern or --preset, not both.");
  }
  const found = await findPreset(preset);
  if (found === undefined) {
    throw new UsageError(`Unknown preset: ${preset}. Run with --list-presets to see them.`);
  }
  return { pattern: found.pattern, replacement: found.replacement };
}

export async function runRename(args: ParsedArgs): Promise<void> {
  const { dir, rename, full, recursive, padding, continueOnError, savePreset } = args;
  let request: RenameRequest;
  try {
    request = await resolveRequest(args);
  } catch (err: unknown) {
    exitWithError(err);
  }
  ensureDir(dir);

  p.intro(pc.bold(pc.cyan("regex-rename")));
  const dryRun = !rename;
  try {
    bulkRename({
      pattern: request.pattern,
      replacement: request.replacement,
      root: dir,
      dryRun,
      fullMatch: full,
      recursive,
      padding,
      continueOnError,
      reporter: createConsoleReporter(),
    });
  } catch (err: unknown) {
    exitWithError(err);
  }

  if (savePreset !== undefined) {
    try {
      await appendUserPreset({ name: savePreset, ...request });
      p.log.success(`Saved as "${savePreset}".`);
    } catch (err: unknown) {
      p.log.error(`Could not save preset: ${describeError(err)}`);
    }
  }

  if (dryRun) {
    p.note("Dry run: no files were renamed. Add --rename to apply.", "Done");
  }
  p.outro(pc.green("Done."));
}
