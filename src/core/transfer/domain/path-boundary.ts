import path from "node:path";
import type { BoundaryRoots } from "../../ports/boundary-roots.port.js";

/**
 * True when `candidate` is `root` itself or lies underneath it. Both paths
 * must already be absolute; comparison is by path segment, so `/home/al`
 * does not contain `/home/alice`.
 */
export function isSameOrDescendant(root: string, candidate: string): boolean {
  const relative = path.relative(path.normalize(root), path.normalize(candidate));
  if (relative === "") {
    return true;
  }
  return relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

export function isWithinBoundary(roots: BoundaryRoots, candidate: string): boolean {
  return isSameOrDescendant(roots.homeDir, candidate) || isSameOrDescendant(roots.cwd, candidate);
}
