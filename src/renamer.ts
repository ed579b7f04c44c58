/**
 * Renamer core: list files, match them, expand targets, check duplicates, apply with safe ordering.
 */

import type { Stats } from "node:fs";
import { existsSync, lstatSync, mkdirSync, readdirSync, renameSync, statSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import {
  DuplicateTargetError,
  EmptyTargetError,
  MissingReplacementError,
  RenameBatchError,
  RenameFailedError,
  TargetExistsError,
  TargetNotFreedError,
} from "./errors.js";
import type { RenameFailure } from "./errors.js";
import type { GroupCapture, Matcher } from "./matcher.js";
import { createMatcher, padGroups } from "./matcher.js";
import { expandReplacement, validateReplacement } from "./replacement.js";
import type { RenameReporter } from "./reporter.js";
import { silentReporter } from "./reporter.js";

/** One matched file: its relative path, its target (when a template was given) and its groups. */
export interface Match {
  readonly sourceName: string;
  readonly targetName: string | undefined;
  /** Post-padding captures, keyed 1..G. */
  readonly groups: ReadonlyMap<number, GroupCapture>;
  readonly matchedText: string;
  readonly span: readonly [start: number, end: number];
}

export type RenameMatch = Match & { readonly targetName: string };

export type FileLister = (root: string, recursive: boolean) => string[];

export function hasTarget(match: Match): match is RenameMatch {
  return match.targetName !== undefined;
}

/** Regular files under `dir`; symlinks to files count, symlinked directories are not descended into. */
export function listFiles(dir: string, recursive = false): string[] {
  const files: string[] = [];
  const walk = (relative: string): void => {
    for (const name of readdirSync(join(dir, relative))) {
      const entry = relative === "" ? name : join(relative, name);
      let stats: Stats;
      try {
        stats = lstatSync(join(dir, entry));
        if (stats.isSymbolicLink()) {
          if (statSync(join(dir, entry)).isFile()) files.push(entry);
          continue;
        }
      } catch {
        // Skip entries we can't stat (e.g. permission denied, dangling link)
        continue;
      }
      if (stats.isFile()) files.push(entry);
      else if (recursive && stats.isDirectory()) walk(entry);
    }
  };
  walk("");
  return files;
}

/** Order strings by Unicode code point rather than UTF-16 code unit. */
export function compareCodePoints(a: string, b: string): number {
  const ca = Array.from(a, (c) => c.codePointAt(0) ?? 0);
  const cb = Array.from(b, (c) => c.codePointAt(0) ?? 0);
  const length = Math.min(ca.length, cb.length);
  for (let i = 0; i < length; i++) {
    if (ca[i] !== cb[i]) return ca[i] - cb[i];
  }
  return ca.length - cb.length;
}

/** An empty template means no template at all. */
function templateOf(replacement: string | undefined): string | undefined {
  return replacement === "" ? undefined : replacement;
}

export function buildMatch(
  filename: string,
  matcher: Matcher,
  replacement: string | undefined,
  padding: number,
): Match | undefined {
  const result = matcher(filename);
  if (result === undefined) return undefined;
  const groups = padGroups(result.groups, padding);
  let targetName: string | undefined;
  if (replacement !== undefined) {
    validateReplacement(replacement, groups.size);
    targetName = expandReplacement(replacement, groups);
  }
  return {
    sourceName: filename,
    targetName,
    groups,
    matchedText: result.matchedText,
    span: result.span,
  };
}

export interface MatchOptions {
  pattern: string;
  replacement?: string;
  /** Directory the relative file names are resolved against. Defaults to ".". */
  root?: string;
  fullMatch?: boolean;
  recursive?: boolean;
  /** Zero-pad numeric groups to this width; 0 disables. */
  padding?: number;
  listFiles?: FileLister;
  reporter?: RenameReporter;
}

export function matchFiles(options: MatchOptions): Match[] {
  const {
    pattern,
    root = ".",
    fullMatch = false,
    recursive = false,
    padding = 0,
    listFiles: lister = listFiles,
    reporter = silentReporter,
  } = options;
  const replacement = templateOf(options.replacement);
  const matcher = createMatcher(pattern, fullMatch);
  const filenames = [...lister(root, recursive)].sort(compareCodePoints);
  const matches: Match[] = [];
  for (const filename of filenames) {
    const match = buildMatch(filename, matcher, replacement, padding);
    if (match === undefined) {
      reporter.noMatch(filename);
    } else {
      matches.push(match);
    }
  }
  return matches;
}

export function findDuplicates(matches: readonly Match[]): void {
  const counts = new Map<string, number>();
  for (const { targetName } of matches) {
    if (targetName === undefined) continue;
    counts.set(targetName, (counts.get(targetName) ?? 0) + 1);
  }
  const duplicates = [...counts].filter(([, n]) => n > 1).map(([name]) => name);
  if (duplicates.length > 0) {
    throw new DuplicateTargetError(duplicates.sort());
  }
}

function sameFile(a: string, b: string): boolean {
  const sa = lstatSync(a);
  const sb = lstatSync(b);
  return sa.dev === sb.dev && sa.ino === sb.ino;
}

function pathTaken(path: string): boolean {
  try {
    lstatSync(path);
    return true;
  } catch {
    return false;
  }
}

/** A temporary name beside `source` that is neither on disk nor part of the batch. */
function freeTempName(root: string, source: string, i: number, reserved: Set<string>): string {
  for (let attempt = 0; ; attempt++) {
    const tag = attempt === 0 ? `${i}` : `${i}.${attempt}`;
    const name = join(dirname(source), `__regex_rename_${tag}_${basename(source)}`);
    if (!reserved.has(name) && !pathTaken(join(root, name))) {
      reserved.add(name);
      return name;
    }
  }
}

export interface ApplyOptions {
  /** Keep going after a failed rename and report all failures at the end. Default: stop at the first. */
  continueOnError?: boolean;
  reporter?: RenameReporter;
}

/**
 * Rename every match's source to its target under `root`. Returns the number of files renamed.
 * Renames already applied are not undone when a later one fails; files that were moved aside
 * and not yet renamed are moved back where their original name is still free.
 */
export function applyRenames(
  root: string,
  matches: readonly RenameMatch[],
  options: ApplyOptions = {},
): number {
  const { continueOnError = false, reporter = silentReporter } = options;
  const pending = matches.filter((m) => m.targetName !== m.sourceName);
  if (pending.length === 0) return 0;

  const sources = new Set(pending.map((m) => m.sourceName));
  for (const { sourceName, targetName } of pending) {
    if (targetName === "") throw new EmptyTargetError(sourceName);
    const to = join(root, targetName);
    if (existsSync(to) && !sources.has(targetName) && !sameFile(join(root, sourceName), to)) {
      throw new TargetExistsError(sourceName, targetName);
    }
  }

  const renamed: string[] = [];
  const failures: RenameFailure[] = [];
  // source → temporary name, for files moved aside and not yet renamed
  const staged = new Map<string, string>();
  // sources whose file still sits at its original name after a failure
  const occupied = new Set<string>();
  const failed = new Set<string>();

  const restore = (source: string): boolean => {
    const temp = staged.get(source);
    if (temp === undefined) return true;
    const original = join(root, source);
    if (pathTaken(original)) return false;
    try {
      renameSync(join(root, temp), original);
    } catch {
      return false;
    }
    staged.delete(source);
    return true;
  };

  const restoreAll = (): string[] => {
    const stranded: string[] = [];
    for (const [source, temp] of [...staged]) {
      if (!restore(source)) stranded.push(temp);
    }
    return stranded;
  };

  const fail = (match: RenameMatch, error: unknown): void => {
    if (!continueOnError) {
      throw new RenameFailedError(match.sourceName, match.targetName, renamed, restoreAll(), error);
    }
    failed.add(match.sourceName);
    failures.push({ source: match.sourceName, target: match.targetName, error });
    reporter.renameFailed(match, error);
    if (restore(match.sourceName)) occupied.add(match.sourceName);
  };

  // Sources that are also targets move aside first so a chain like a→b, b→c loses nothing.
  const targets = new Set(pending.map((m) => m.targetName));
  const reserved = new Set([...sources, ...targets]);
  pending.forEach((match, i) => {
    const { sourceName } = match;
    if (!targets.has(sourceName)) return;
    const tempName = freeTempName(root, sourceName, i, reserved);
    try {
      renameSync(join(root, sourceName), join(root, tempName));
    } catch (err: unknown) {
      fail(match, err);
      return;
    }
    staged.set(sourceName, tempName);
  });

  for (const match of pending) {
    if (failed.has(match.sourceName)) continue;
    if (occupied.has(match.targetName)) {
      fail(match, new TargetNotFreedError(match.sourceName, match.targetName));
      continue;
    }
    const from = staged.get(match.sourceName) ?? match.sourceName;
    const to = join(root, match.targetName);
    try {
      mkdirSync(dirname(to), { recursive: true });
      renameSync(join(root, from), to);
    } catch (err: unknown) {
      fail(match, err);
      continue;
    }
    staged.delete(match.sourceName);
    renamed.push(match.targetName);
    reporter.renamed(match);
  }

  const stranded = restoreAll();
  if (failures.length > 0 || stranded.length > 0) {
    throw new RenameBatchError(failures, renamed.length, stranded);
  }
  return renamed.length;
}

export interface BulkRenameOptions extends MatchOptions {
  /** Only compute and report; never write to the filesystem. */
  dryRun: boolean;
  continueOnError?: boolean;
}

/**
 * Match files under `root` and, unless this is a dry run, rename them.
 * Everything that can abort the batch is checked before the first rename.
 */
export function bulkRename(options: BulkRenameOptions): Match[] {
  const { dryRun, root = ".", reporter = silentReporter, continueOnError } = options;
  const replacement = templateOf(options.replacement);
  if (!dryRun && replacement === undefined) {
    throw new MissingReplacementError();
  }

  const matches = matchFiles({ ...options, replacement });
  for (const match of matches) {
    reporter.match(match, dryRun);
  }

  if (replacement !== undefined) {
    findDuplicates(matches);
  }

  let renamedCount = 0;
  if (!dryRun) {
    renamedCount = applyRenames(root, matches.filter(hasTarget), { continueOnError, reporter });
  }
  reporter.finished({ matched: matches.length, renamed: renamedCount, dryRun });
  return matches;
}
