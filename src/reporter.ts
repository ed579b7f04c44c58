/**
 * Reporting hooks for a rename batch. The core only talks to a RenameReporter it is given.
 */

import * as p from "@clack/prompts";
import pc from "picocolors";
import { describeError } from "./errors.js";
import type { GroupCapture } from "./matcher.js";
import type { Match } from "./renamer.js";

export interface BatchSummary {
  readonly matched: number;
  readonly renamed: number;
  readonly dryRun: boolean;
}

export interface RenameReporter {
  noMatch(filename: string): void;
  /** Called once per match after the whole set is built. */
  match(match: Match, dryRun: boolean): void;
  renamed(match: Match): void;
  renameFailed(match: Match, error: unknown): void;
  finished(summary: BatchSummary): void;
}

export const silentReporter: RenameReporter = {
  noMatch() {},
  match() {},
  renamed() {},
  renameFailed() {},
  finished() {},
};

export function formatGroups(groups: ReadonlyMap<number, GroupCapture>): string {
  return [...groups]
    .map(([index, capture]) =>
      capture.kind === "participated" ? `${index}: ${JSON.stringify(capture.text)}` : `${index}: (none)`,
    )
    .join(", ");
}

export function formatMatch(match: Match): string {
  const head =
    match.targetName === undefined ? match.sourceName : `${match.sourceName} → ${match.targetName}`;
  return match.groups.size === 0 ? head : `${head}  [${formatGroups(match.groups)}]`;
}

export function createConsoleReporter(): RenameReporter {
  return {
    noMatch(filename) {
      p.log.warn(`No match: ${pc.dim(filename)}`);
    },
    match(match) {
      const groups = match.groups.size === 0 ? "" : pc.dim(`  [${formatGroups(match.groups)}]`);
      const head =
        match.targetName === undefined
          ? pc.bold(match.sourceName)
          : `${match.sourceName} ${pc.dim("→")} ${pc.bold(pc.green(match.targetName))}`;
      p.log.step(`${head}${groups}`);
    },
    renamed() {},
    renameFailed(match, error) {
      p.log.error(`${match.sourceName} → ${match.targetName ?? ""}: ${describeError(error)}`);
    },
    finished({ matched, renamed, dryRun }) {
      if (dryRun) {
        p.log.info(`${matched} file(s) matched.`);
      } else {
        p.log.success(`${renamed} file(s) renamed.`);
      }
    },
  };
}
