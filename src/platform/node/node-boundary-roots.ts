import os from "node:os";
import type { BoundaryRoots, BoundaryRootsProvider } from "../../core/ports/boundary-roots.port.js";

export class NodeBoundaryRootsProvider implements BoundaryRootsProvider {
  public getRoots(): BoundaryRoots {
    return {
      homeDir: os.homedir(),
      cwd: process.cwd()
    };
  }
}
