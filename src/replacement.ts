/**
 * Replacement templates: `\N` inserts group N, `\L\N` and `\U\N` insert it lower- or upper-cased.
 */

import { InvalidReplacementTemplateError } from "./errors.js";
import type { GroupCapture } from "./matcher.js";
import { captureText } from "./matcher.js";

export const LOWER_MARKER = "\\L";
export const UPPER_MARKER = "\\U";

/** One find/replace step of an expansion; steps run in plan order. */
export interface SubstitutionStep {
  readonly find: RegExp;
  readonly value: string;
}

/** Escape special regex characters so the string can be used as a literal in a regex. */
function escapeRegexLiteral(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function isDigit(c: string | undefined): boolean {
  return c !== undefined && c >= "0" && c <= "9";
}

/**
 * Check that the template, with case markers removed, only refers to groups 1..groupCount.
 * A reference is one digit, or two when a second digit follows.
 */
export function validateReplacement(template: string, groupCount: number): void {
  const simplified = template.split(LOWER_MARKER).join("").split(UPPER_MARKER).join("");
  for (let i = 0; i < simplified.length; i++) {
    if (simplified[i] !== "\\") continue;
    const next: string | undefined = simplified[i + 1];
    if (next === undefined) {
      throw new InvalidReplacementTemplateError(template, "dangling backslash at end of template");
    }
    if (isDigit(next)) {
      const digits = isDigit(simplified[i + 2]) ? simplified.slice(i + 1, i + 3) : next;
      const index = Number.parseInt(digits, 10);
      if (index < 1 || index > groupCount) {
        throw new InvalidReplacementTemplateError(
          template,
          `invalid group reference \\${digits} (pattern has ${groupCount} group(s))`,
        );
      }
      i += digits.length;
      continue;
    }
    if (/[A-Za-z]/.test(next)) {
      throw new InvalidReplacementTemplateError(template, `bad escape \\${next}`);
    }
    i += 1;
  }
}

function referencePattern(prefix: string, index: number): RegExp {
  const literal = escapeRegexLiteral(`${prefix}\\${index}`);
  // \1 must not eat the front of \12
  return new RegExp(index < 10 ? `${literal}(?!\\d)` : literal, "g");
}

/**
 * Steps in ascending group order; within a group the case-directive forms go
 * before the plain reference, which would otherwise consume them.
 */
export function planExpansion(
  template: string,
  groups: ReadonlyMap<number, GroupCapture>,
): SubstitutionStep[] {
  const hasLower = template.includes(LOWER_MARKER);
  const hasUpper = template.includes(UPPER_MARKER);
  const indices = [...groups.keys()].sort((a, b) => a - b);
  const steps: SubstitutionStep[] = [];
  for (const index of indices) {
    const text = captureText(groups.get(index));
    if (hasLower) {
      steps.push({ find: referencePattern(LOWER_MARKER, index), value: text.toLowerCase() });
    }
    if (hasUpper) {
      steps.push({ find: referencePattern(UPPER_MARKER, index), value: text.toUpperCase() });
    }
    steps.push({ find: referencePattern("", index), value: text });
  }
  return steps;
}

export function expandReplacement(
  template: string,
  groups: ReadonlyMap<number, GroupCapture>,
): string {
  return planExpansion(template, groups).reduce(
    (name, step) => name.replace(step.find, () => step.value),
    template,
  );
}
