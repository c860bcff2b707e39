export interface BoundaryRoots {
  homeDir: string;
  cwd: string;
}

export interface BoundaryRootsProvider {
  getRoots(): BoundaryRoots;
}
