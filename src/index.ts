export * from "./core/config/index.js";
export * from "./core/logging/index.js";
export * from "./core/transfer/index.js";
export type { FileSystemPort, PathKind } from "./core/ports/file-system.port.js";
export type { BoundaryRoots, BoundaryRootsProvider } from "./core/ports/boundary-roots.port.js";
export { NodeFileSystem } from "./platform/node/node-file-system.js";
export { NodeBoundaryRootsProvider } from "./platform/node/node-boundary-roots.js";
export { createFileLogger, createNodeLogger, formatLocalTimestamp } from "./platform/node/node-logger.js";
export type { FileLoggerConfig, FileLoggerHandle, NodeLoggerConfig } from "./platform/node/node-logger.js";
export { createDataSinkRuntime } from "./platform/node/runtime.js";
export type { DataSinkRuntime } from "./platform/node/runtime.js";
export { runCli } from "./apps/cli/cli.js";
export type { RunCliOptions } from "./apps/cli/cli.js";
