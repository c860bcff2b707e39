import path from "node:path";
import { createNoopLogger, type Logger } from "../../logging/index.js";
import type { BoundaryRoots, BoundaryRootsProvider } from "../../ports/boundary-roots.port.js";
import type { FileSystemPort } from "../../ports/file-system.port.js";
import { timestampedName } from "../domain/collision.js";
import { isSameOrDescendant, isWithinBoundary } from "../domain/path-boundary.js";
import {
  type CollisionPolicy,
  type SourceKind,
  type TransferErrorKind,
  type TransferOperation,
  type TransferOutcome,
  isTransferOperation,
  transferMessages
} from "../domain/transfer.js";

interface TransferServiceDeps {
  fileSystem: FileSystemPort;
  boundaryRoots: BoundaryRootsProvider;
  logger?: Logger;
  collisionPolicy?: CollisionPolicy;
  /** When false, the home/cwd boundary and self-nesting guards are skipped. */
  enforceBoundary?: boolean;
  now?: () => Date;
}

const UNRESOLVABLE_PATH_CODES = new Set(["ENOENT", "ENOTDIR", "ELOOP"]);

export class TransferService {
  private readonly fileSystem: FileSystemPort;
  private readonly boundaryRoots: BoundaryRootsProvider;
  private readonly logger: Logger;
  private readonly collisionPolicy: CollisionPolicy;
  private readonly enforceBoundary: boolean;
  private readonly now: () => Date;

  public constructor(deps: TransferServiceDeps) {
    this.fileSystem = deps.fileSystem;
    this.boundaryRoots = deps.boundaryRoots;
    this.logger = (deps.logger ?? createNoopLogger()).child({ scope: "transfer-service" });
    this.collisionPolicy = deps.collisionPolicy ?? "merge";
    this.enforceBoundary = deps.enforceBoundary ?? true;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Copies or moves `sourcePath` into the directory `destinationPath`.
   * Never rejects: every failure is reported through the outcome.
   *
   * An unknown `operation` is reported once the source kind is known.
   */
  public async transfer(
    sourcePath: string,
    destinationPath: string,
    operation: TransferOperation | (string & {}) = "copy"
  ): Promise<TransferOutcome> {
    if (!(await this.fileSystem.exists(sourcePath))) {
      return this.fail("SourceNotFound", transferMessages.sourceNotFound(sourcePath));
    }

    if (this.enforceBoundary) {
      if (!(await this.isSafeDestination(destinationPath))) {
        return this.fail("UnsafeDestination", transferMessages.unsafeDestination(destinationPath));
      }
      if (await this.isSelfNesting(sourcePath, destinationPath)) {
        return this.fail("SelfNesting", transferMessages.selfNesting());
      }
    }

    const prepared = await this.prepareDestination(destinationPath);
    if (prepared) {
      return prepared;
    }

    try {
      const kind = await this.fileSystem.kindOf(sourcePath);
      if (kind !== "directory" && kind !== "file") {
        return this.fail("UnsupportedSourceType", transferMessages.unsupportedSourceType(sourcePath));
      }
      if (!isTransferOperation(operation)) {
        return this.invalidOperation(operation, kind);
      }
      return kind === "directory"
        ? await this.transferDirectory(sourcePath, destinationPath, operation)
        : await this.transferFile(sourcePath, destinationPath, operation);
    } catch (error) {
      return this.fail("TransferFailed", transferMessages.transferFailed(operation, describeError(error)));
    }
  }

  private async transferDirectory(
    sourcePath: string,
    destinationPath: string,
    operation: TransferOperation
  ): Promise<TransferOutcome> {
    const name = path.basename(path.resolve(sourcePath));
    const nestedTarget = path.join(destinationPath, name);

    if (operation === "copy") {
      const target = await this.resolveCopyTarget(destinationPath, name);
      await this.fileSystem.copyDir(sourcePath, target);
      return this.succeed(transferMessages.copiedDirectory(sourcePath, target), target);
    }

    if (await this.fileSystem.exists(nestedTarget)) {
      // The replaced directory must not be the source or one of its ancestors.
      const source = await this.fileSystem.realPath(sourcePath);
      if (isSameOrDescendant(await this.fileSystem.realPath(nestedTarget), source)) {
        return this.fail("TargetContainsSource", transferMessages.targetContainsSource(sourcePath, nestedTarget));
      }
      this.logger.warn("Replacing existing directory before move.", { target: nestedTarget });
      await this.fileSystem.removeDir(nestedTarget);
    }
    await this.fileSystem.move(sourcePath, nestedTarget);
    return this.succeed(transferMessages.movedDirectory(sourcePath, destinationPath), nestedTarget);
  }

  private async transferFile(
    sourcePath: string,
    destinationPath: string,
    operation: TransferOperation
  ): Promise<TransferOutcome> {
    const target = path.join(destinationPath, path.basename(sourcePath));

    if (operation === "copy") {
      await this.fileSystem.copyFile(sourcePath, target);
      return this.succeed(transferMessages.copiedFile(sourcePath, destinationPath), target);
    }

    await this.fileSystem.move(sourcePath, target);
    return this.succeed(transferMessages.movedFile(sourcePath, destinationPath), target);
  }

  private async resolveCopyTarget(destinationPath: string, name: string): Promise<string> {
    const target = path.join(destinationPath, name);
    if (this.collisionPolicy === "timestamp" && (await this.fileSystem.exists(target))) {
      return path.join(destinationPath, timestampedName(name, this.now()));
    }
    return target;
  }

  private async prepareDestination(destinationPath: string): Promise<TransferOutcome | undefined> {
    try {
      if ((await this.fileSystem.kindOf(destinationPath)) === "directory") {
        return undefined;
      }
      await this.fileSystem.ensureDir(destinationPath);
    } catch (error) {
      return this.fail(
        "DestinationCreateFailed",
        transferMessages.destinationCreateFailed(destinationPath, describeError(error))
      );
    }

    this.logger.info(transferMessages.destinationCreated(destinationPath));
    return undefined;
  }

  private async isSafeDestination(destinationPath: string): Promise<boolean> {
    const roots = this.boundaryRoots.getRoots();
    try {
      const canonical = await this.fileSystem.realPath(destinationPath);
      const canonicalRoots: BoundaryRoots = {
        homeDir: await this.fileSystem.realPath(roots.homeDir),
        cwd: await this.fileSystem.realPath(roots.cwd)
      };
      return isWithinBoundary(canonicalRoots, canonical);
    } catch (error) {
      if (isUnresolvable(error)) {
        return isWithinBoundary(roots, path.resolve(destinationPath));
      }
      this.logger.error(`Path safety check failed for '${destinationPath}': ${describeError(error)}`);
      return false;
    }
  }

  private async isSelfNesting(sourcePath: string, destinationPath: string): Promise<boolean> {
    let source: string;
    try {
      source = await this.fileSystem.realPath(sourcePath);
    } catch (error) {
      this.logger.debug("Skipping self-nesting check; source not resolvable.", {
        source: sourcePath,
        reason: describeError(error)
      });
      return false;
    }

    let destination: string;
    try {
      destination = await this.resolveThroughExistingAncestor(destinationPath);
    } catch (error) {
      this.logger.debug("Comparing an unresolved destination for self-nesting.", {
        destination: destinationPath,
        reason: describeError(error)
      });
      destination = path.resolve(destinationPath);
    }
    return isSameOrDescendant(source, destination);
  }

  /**
   * Canonical form of a path that may not exist yet: the deepest existing
   * ancestor is resolved and the missing segments are appended to it.
   */
  private async resolveThroughExistingAncestor(target: string): Promise<string> {
    const missing: string[] = [];
    let current = path.resolve(target);
    for (;;) {
      try {
        return path.join(await this.fileSystem.realPath(current), ...missing);
      } catch (error) {
        const parent = path.dirname(current);
        if (!isUnresolvable(error) || parent === current) {
          throw error;
        }
        missing.unshift(path.basename(current));
        current = parent;
      }
    }
  }

  private invalidOperation(operation: string, kind: SourceKind): TransferOutcome {
    return this.fail("InvalidOperation", transferMessages.invalidOperation(operation, kind));
  }

  private succeed(message: string, targetPath: string): TransferOutcome {
    this.logger.info(message);
    return { success: true, message, targetPath };
  }

  private fail(errorKind: TransferErrorKind, message: string): TransferOutcome {
    this.logger.error(message, { errorKind });
    return { success: false, message, errorKind };
  }
}

function isUnresolvable(error: unknown): boolean {
  return isErrnoException(error) && typeof error.code === "string" && UNRESOLVABLE_PATH_CODES.has(error.code);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
