/**
 * Matching a pattern against one filename, and zero-padding of numeric groups.
 */

import { InvalidPatternError } from "./errors.js";

/** A capture group either took part in the match (possibly as "") or did not. */
export type GroupCapture =
  | { readonly kind: "participated"; readonly text: string }
  | { readonly kind: "absent" };

export interface CaptureResult {
  /** Keys are exactly 1..G, G being the number of capture groups in the pattern. */
  readonly groups: ReadonlyMap<number, GroupCapture>;
  readonly matchedText: string;
  readonly span: readonly [start: number, end: number];
}

export type Matcher = (filename: string) => CaptureResult | undefined;

export const ABSENT: GroupCapture = { kind: "absent" };

export function participated(text: string): GroupCapture {
  return { kind: "participated", text };
}

/** Text of a capture, with absent groups read as "". */
export function captureText(capture: GroupCapture | undefined): string {
  return capture?.kind === "participated" ? capture.text : "";
}

export function compilePattern(pattern: string, fullMatch: boolean): RegExp {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (err: unknown) {
    throw new InvalidPatternError(pattern, { cause: err });
  }
  // Wrapping only after the raw pattern compiled, so "a)(b" is still rejected.
  return fullMatch ? new RegExp(`^(?:${pattern})$`) : regex;
}

export function createMatcher(pattern: string, fullMatch: boolean): Matcher {
  const regex = compilePattern(pattern, fullMatch);
  return (filename) => {
    const m = regex.exec(filename);
    if (m === null) return undefined;
    const groups = new Map<number, GroupCapture>();
    for (let i = 1; i < m.length; i++) {
      const text: string | undefined = m[i];
      groups.set(i, text === undefined ? ABSENT : participated(text));
    }
    return { groups, matchedText: m[0], span: [m.index, m.index + m[0].length] };
  };
}

export function matchFilename(
  pattern: string,
  filename: string,
  fullMatch: boolean,
): CaptureResult | undefined {
  return createMatcher(pattern, fullMatch)(filename);
}

const DIGITS = /^\d+$/;

export function isNumeric(text: string): boolean {
  return DIGITS.test(text);
}

/**
 * Left-pad every all-digit capture with "0" to at least `padding` characters.
 * A padding of 0 (or less) leaves the groups as they are.
 */
export function padGroups(
  groups: ReadonlyMap<number, GroupCapture>,
  padding: number,
): ReadonlyMap<number, GroupCapture> {
  if (padding <= 0) return groups;
  const padded = new Map<number, GroupCapture>();
  for (const [index, capture] of groups) {
    padded.set(
      index,
      capture.kind === "participated" && isNumeric(capture.text)
        ? participated(capture.text.padStart(padding, "0"))
        : capture,
    );
  }
  return padded;
}
