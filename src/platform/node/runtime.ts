import type { DataSinkConfig } from "../../core/config/index.js";
import type { Logger } from "../../core/logging/index.js";
import { TransferService } from "../../core/transfer/index.js";
import { NodeBoundaryRootsProvider } from "./node-boundary-roots.js";
import { NodeFileSystem } from "./node-file-system.js";
import { createFileLogger } from "./node-logger.js";

export interface DataSinkRuntime {
  service: TransferService;
  logger: Logger;
  logFile: string;
  close(): Promise<void>;
}

export function createDataSinkRuntime(config: DataSinkConfig): DataSinkRuntime {
  const logHandle = createFileLogger({
    filePath: config.logFile,
    level: config.logLevel
  });

  const service = new TransferService({
    fileSystem: new NodeFileSystem(),
    boundaryRoots: new NodeBoundaryRootsProvider(),
    logger: logHandle.logger,
    collisionPolicy: config.collisionPolicy,
    enforceBoundary: config.enforceBoundary
  });

  return {
    service,
    logger: logHandle.logger,
    logFile: logHandle.filePath,
    close: () => logHandle.close()
  };
}
