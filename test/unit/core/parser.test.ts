import { describe, it, expect } from "vitest";
import { parseDependencyField } from "../../../src/core/parser.js";

describe("parseDependencyField", () => {
  it("should return an empty list for an empty field", () => {
    expect(parseDependencyField("")).toEqual([]);
    expect(parseDependencyField("   ")).toEqual([]);
  });

  it("should split conjunctive terms on commas", () => {
    expect(parseDependencyField("libc6, libtinfo6, debianutils")).toEqual([
      "libc6",
      "libtinfo6",
      "debianutils",
    ]);
  });

  it("should strip version constraints", () => {
    expect(
      parseDependencyField("libc6 (>= 2.34), libtinfo6 (>= 6), base-files"),
    ).toEqual(["libc6", "libtinfo6", "base-files"]);
  });

  it("should keep every alternative of an OR group", () => {
    expect(parseDependencyField("X | Y, Z")).toEqual(["X", "Y", "Z"]);
  });

  it("should strip constraints inside OR groups", () => {
    expect(parseDependencyField("debconf (>= 0.5) | debconf-2.0")).toEqual([
      "debconf",
      "debconf-2.0",
    ]);
  });

  it("should drop duplicates keeping the first position", () => {
    expect(parseDependencyField("A, A, B")).toEqual(["A", "B"]);
    expect(parseDependencyField("a, b | a, c (<< 2), b")).toEqual([
      "a",
      "b",
      "c",
    ]);
  });

  it("should normalize whitespace and skip empty terms", () => {
    expect(parseDependencyField("  a,\n   b  ,,\t c ")).toEqual([
      "a",
      "b",
      "c",
    ]);
  });
});
