import path from "node:path";
import { describe, expect, it } from "vitest";
import { isSameOrDescendant, isWithinBoundary } from "../../src/core/transfer/index.js";

const home = path.resolve("/home/al");
const work = path.resolve("/srv/work");

describe("isSameOrDescendant", () => {
  it("accepts the root itself and anything below it", () => {
    expect(isSameOrDescendant(home, home)).toBe(true);
    expect(isSameOrDescendant(home, path.join(home, "docs"))).toBe(true);
    expect(isSameOrDescendant(home, path.join(home, "docs", "deep", "file.txt"))).toBe(true);
  });

  it("rejects parents and siblings that share a name prefix", () => {
    expect(isSameOrDescendant(home, path.dirname(home))).toBe(false);
    expect(isSameOrDescendant(home, path.resolve("/home/alice"))).toBe(false);
    expect(isSameOrDescendant(home, path.resolve("/home/al-backup/x"))).toBe(false);
  });

  it("normalizes dot segments before comparing", () => {
    expect(isSameOrDescendant(home, `${home}${path.sep}..${path.sep}bob`)).toBe(false);
    expect(isSameOrDescendant(home, `${home}${path.sep}.${path.sep}docs`)).toBe(true);
  });

  it("treats a child whose name starts with two dots as inside", () => {
    expect(isSameOrDescendant(home, path.join(home, "..cache"))).toBe(true);
  });
});

describe("isWithinBoundary", () => {
  const roots = { homeDir: home, cwd: work };

  it("accepts paths under either root", () => {
    expect(isWithinBoundary(roots, path.join(home, "a"))).toBe(true);
    expect(isWithinBoundary(roots, path.join(work, "b"))).toBe(true);
    expect(isWithinBoundary(roots, work)).toBe(true);
  });

  it("rejects paths outside both roots", () => {
    expect(isWithinBoundary(roots, path.resolve("/etc/unsafe_dest"))).toBe(false);
  });
});
