/**
 * Shared helpers for the CLI commands.
 */

import { existsSync, statSync } from "node:fs";
import * as p from "@clack/prompts";
import { DuplicateTargetError, RenameBatchError, describeError } from "../errors.js";

export function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    p.log.error(`Directory does not exist: ${dir}`);
    process.exit(1);
  }
  if (!statSync(dir).isDirectory()) {
    p.log.error(`Not a directory: ${dir}`);
    process.exit(1);
  }
}

export function formatFailure(err: unknown): string {
  if (err instanceof DuplicateTargetError) {
    return [err.message, ...err.targets.map((t) => `  • ${t}`)].join("\n");
  }
  if (err instanceof RenameBatchError) {
    const lines = err.failures.map((f) => `  • ${f.source} → ${f.target}: ${describeError(f.error)}`);
    const stranded = err.stranded.map((t) => `  • left as ${t}`);
    return [`${err.failures.length} rename(s) failed, ${err.renamedCount} succeeded:`, ...lines, ...stranded].join("\n");
  }
  return describeError(err);
}

export function exitWithError(err: unknown): never {
  p.log.error(formatFailure(err));
  process.exit(1);
}
