import { describe, it, expect } from "vitest";
import {
  matchesFilter,
  packageExists,
  findMissingPackages,
} from "../../../src/core/utils.js";
import { createRepository } from "../../../src/core/repository.js";

describe("matchesFilter", () => {
  it("should match on substrings", () => {
    expect(matchesFilter("libgcc-s1", "gcc")).toBe(true);
    expect(matchesFilter("gcc", "gcc")).toBe(true);
    expect(matchesFilter("bash", "zsh")).toBe(false);
  });

  it("should never match with an empty filter", () => {
    expect(matchesFilter("bash", "")).toBe(false);
  });
});

describe("packageExists", () => {
  const repository = createRepository([{ name: "bash", dependencies: [] }]);

  it("should return true for defined packages", () => {
    expect(packageExists(repository, "bash")).toBe(true);
  });

  it("should return false for unknown packages", () => {
    expect(packageExists(repository, "zsh")).toBe(false);
  });
});

describe("findMissingPackages", () => {
  it("should list referenced names that are not defined", () => {
    const repository = createRepository([
      { name: "a", dependencies: ["b", "x"] },
      { name: "b", dependencies: ["x", "y"] },
    ]);

    expect(findMissingPackages(repository)).toEqual(["x", "y"]);
  });
});
