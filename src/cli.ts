#!/usr/bin/env node
/**
 * regex-rename – bulk rename files matching a regular expression.
 * Dry run by default; --rename applies the computed names.
 */

import { parseArgs, printHelp, printVersion } from "./flags.js";
import type { ParsedArgs } from "./flags.js";
import { exitWithError } from "./commands/common.js";
import { runListPresets } from "./commands/presets.js";
import { runRename } from "./commands/rename.js";

async function main(): Promise<void> {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err: unknown) {
    exitWithError(err);
  }

  if (args.help) {
    printHelp();
    process.exit(0);
  }
  if (args.version) {
    printVersion();
    process.exit(0);
  }
  if (args.listPresets) {
    await runListPresets();
    return;
  }

  await runRename(args);
}

main().catch((err: unknown) => {
  exitWithError(err);
});
