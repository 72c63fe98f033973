import { describe, expect, it } from "vitest";
import { formatCandidates, parseSelection } from "../src/utils/selection.js";

describe("parseSelection", () => {
  it("selects everything with 0", () => {
    expect(parseSelection("0", 3)).toEqual([0, 1, 2]);
  });

  it("maps one-based numbers to indices without duplicates", () => {
    expect(parseSelection(" 2, 1,2 ", 3)).toEqual([1, 0]);
  });

  it("drops numbers out of range", () => {
    expect(parseSelection("1,9", 3)).toEqual([0]);
    expect(parseSelection("9", 3)).toBeNull();
  });

  it("rejects anything but numbers", () => {
    expect(parseSelection("foo", 3)).toBeNull();
    expect(parseSelection("1,-2", 3)).toBeNull();
    expect(parseSelection("", 3)).toBeNull();
  });
});

describe("formatCandidates", () => {
  it("aligns names and versions", () => {
    expect(
      formatCandidates([
        { name: "foo", currentVersion: "1.2.0-1", newVersion: "1.3.0-1" },
        { name: "libbar", currentVersion: "10.0-1", newVersion: "10.1-1" },
      ]),
    ).toEqual(["[1] foo    1.2.0-1 -> 1.3.0-1", "[2] libbar 10.0-1  -> 10.1-1"]);
  });
});
