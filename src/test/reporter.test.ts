import { describe, expect, it } from "vitest";
import type { GroupCapture } from "../matcher.js";
import { ABSENT, participated } from "../matcher.js";
import { formatGroups, formatMatch } from "../reporter.js";

describe("formatGroups", () => {
  it("quotes captured text and marks groups that did not take part", () => {
    const groups = new Map<number, GroupCapture>([
      [1, participated("Abc")],
      [2, ABSENT],
      [3, participated("")],
    ]);
    expect(formatGroups(groups)).toBe('1: "Abc", 2: (none), 3: ""');
  });
});

describe("formatMatch", () => {
  it("shows source, target and groups", () => {
    const line = formatMatch({
      sourceName: "a1.txt",
      targetName: "x1.dat",
      groups: new Map([[1, participated("1")]]),
      matchedText: "a1.txt",
      span: [0, 6],
    });
    expect(line).toBe('a1.txt → x1.dat  [1: "1"]');
  });

  it("shows only the source for a plain match without groups", () => {
    const line = formatMatch({
      sourceName: "a.txt",
      targetName: undefined,
      groups: new Map(),
      matchedText: "a",
      span: [0, 1],
    });
    expect(line).toBe("a.txt");
  });
});
