import { access, copyFile, cp, mkdir, realpath, rename, rm, stat, utimes } from "node:fs/promises";
import { constants } from "node:fs";
import type { FileSystemPort, PathKind } from "../../core/ports/file-system.port.js";

export class NodeFileSystem implements FileSystemPort {
  public async ensureDir(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }

  public async removeDir(path: string): Promise<void> {
    await rm(path, { recursive: true, force: true });
  }

  public async copyDir(sourcePath: string, targetPath: string): Promise<void> {
    await cp(sourcePath, targetPath, { recursive: true, force: true, preserveTimestamps: true });
  }

  public async copyFile(sourcePath: string, targetPath: string): Promise<void> {
    // copyFile keeps the mode bits but not the timestamps.
    await copyFile(sourcePath, targetPath);
    const source = await stat(sourcePath);
    await utimes(targetPath, source.atime, source.mtime);
  }

  public async move(sourcePath: string, targetPath: string): Promise<void> {
    try {
      await rename(sourcePath, targetPath);
    } catch (error) {
      if (!isCrossDevice(error)) {
        throw error;
      }
      await cp(sourcePath, targetPath, { recursive: true, force: true, preserveTimestamps: true });
      await rm(sourcePath, { recursive: true, force: true });
    }
  }

  public async exists(path: string): Promise<boolean> {
    try {
      await access(path, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  public async kindOf(path: string): Promise<PathKind | null> {
    try {
      const stats = await stat(path);
      if (stats.isDirectory()) {
        return "directory";
      }
      return stats.isFile() ? "file" : "other";
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  public realPath(path: string): Promise<string> {
    return realpath(path);
  }
}

function isNotFound(error: unknown): error is NodeJS.ErrnoException {
  if (typeof error !== "object" || error === null) {
    return false;
  }

  const code = (error as NodeJS.ErrnoException).code;
  return code === "ENOENT" || code === "ENOTDIR";
}

function isCrossDevice(error: unknown): boolean {
  return typeof error === "object" && error !== null && (error as NodeJS.ErrnoException).code === "EXDEV";
}
