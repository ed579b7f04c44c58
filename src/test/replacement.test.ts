import { describe, expect, it } from "vitest";
import { InvalidReplacementTemplateError } from "../errors.js";
import type { GroupCapture } from "../matcher.js";
import { ABSENT, participated } from "../matcher.js";
import { expandReplacement, planExpansion, validateReplacement } from "../replacement.js";

function groupsOf(...texts: (string | undefined)[]): Map<number, GroupCapture> {
  return new Map(texts.map((t, i): [number, GroupCapture] => [i + 1, t === undefined ? ABSENT : participated(t)]));
}

describe("expandReplacement", () => {
  it("applies lower and upper case directives", () => {
    expect(expandReplacement("\\L\\1-\\U\\2", groupsOf("Abc", "abc"))).toBe("abc-ABC");
  });

  it("is idempotent for the same template and groups", () => {
    const groups = groupsOf("Track", "07");
    const first = expandReplacement("\\2 \\U\\1.mp3", groups);
    expect(first).toBe("07 TRACK.mp3");
    expect(expandReplacement("\\2 \\U\\1.mp3", groups)).toBe(first);
  });

  it("uses the directive form before the plain reference of the same group", () => {
    expect(expandReplacement("\\U\\1\\1", groupsOf("ab"))).toBe("ABab");
  });

  it("expands absent groups to an empty string", () => {
    expect(expandReplacement("\\1_\\2", groupsOf("a", undefined))).toBe("a_");
    expect(expandReplacement("\\U\\2x", groupsOf("a", undefined))).toBe("x");
  });

  it("inserts group text literally", () => {
    expect(expandReplacement("x\\1", groupsOf("$&"))).toBe("x$&");
  });

  it("does not let \\1 consume the start of \\12", () => {
    const groups = groupsOf(...Array.from({ length: 12 }, (_, i) => `g${i + 1}`));
    expect(expandReplacement("\\12-\\1", groups)).toBe("g12-g1");
  });
});

describe("planExpansion", () => {
  it("orders steps by group, directives first", () => {
    const steps = planExpansion("\\L\\1\\2", groupsOf("Ab", "Cd"));
    expect(steps.map((s) => s.value)).toEqual(["ab", "Ab", "cd", "Cd"]);
  });

  it("only adds directive steps for markers present in the template", () => {
    expect(planExpansion("\\1", groupsOf("a", "b"))).toHaveLength(2);
  });
});

describe("validateReplacement", () => {
  it("accepts references to existing groups, with or without directives", () => {
    expect(() => validateReplacement("x\\1.dat", 1)).not.toThrow();
    expect(() => validateReplacement("\\L\\1.\\U\\1", 1)).not.toThrow();
    expect(() => validateReplacement("\\10", 10)).not.toThrow();
    expect(() => validateReplacement("a\\.b", 0)).not.toThrow();
  });

  it("rejects a reference to a group the pattern does not have", () => {
    expect(() => validateReplacement("\\2_new", 1)).toThrow(InvalidReplacementTemplateError);
    expect(() => validateReplacement("\\2_new", 1)).toThrow(
      'Invalid replacement template "\\2_new": invalid group reference \\2 (pattern has 1 group(s))',
    );
  });

  it("reads two digits as one reference", () => {
    expect(() => validateReplacement("\\10", 1)).toThrow(/invalid group reference \\10/);
  });

  it("rejects group 0, letter escapes and a trailing backslash", () => {
    expect(() => validateReplacement("\\0", 1)).toThrow(/invalid group reference \\0/);
    expect(() => validateReplacement("\\q1", 1)).toThrow(/bad escape \\q/);
    expect(() => validateReplacement("name\\", 1)).toThrow(/dangling backslash/);
  });
});
