export type PathKind = "file" | "directory" | "other";

export interface FileSystemPort {
  ensureDir(path: string): Promise<void>;
  removeDir(path: string): Promise<void>;
  /** Recursive copy that merges into an existing target, overwriting same-named files. */
  copyDir(sourcePath: string, targetPath: string): Promise<void>;
  /** Copies a single file, keeping its mode and timestamps. */
  copyFile(sourcePath: string, targetPath: string): Promise<void>;
  move(sourcePath: string, targetPath: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  /** Follows symlinks. Returns null when nothing exists at the path. */
  kindOf(path: string): Promise<PathKind | null>;
  realPath(path: string): Promise<string>;
}
