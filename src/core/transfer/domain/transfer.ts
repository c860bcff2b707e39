export const TRANSFER_OPERATIONS = ["copy", "move"] as const;

export type TransferOperation = (typeof TRANSFER_OPERATIONS)[number];

export type CollisionPolicy = "merge" | "timestamp";

export type TransferErrorKind =
  | "SourceNotFound"
  | "UnsafeDestination"
  | "SelfNesting"
  | "TargetContainsSource"
  | "DestinationCreateFailed"
  | "UnsupportedSourceType"
  | "InvalidOperation"
  | "TransferFailed";

export type TransferOutcome =
  | {
      success: true;
      message: string;
      /** Where the source now lives, or where its copy was written. */
      targetPath: string;
    }
  | {
      success: false;
      message: string;
      errorKind: TransferErrorKind;
    };

export type SourceKind = "file" | "directory";

const TRANSFER_OPERATION_SET: ReadonlySet<string> = new Set(TRANSFER_OPERATIONS);

export function isTransferOperation(value: unknown): value is TransferOperation {
  return typeof value === "string" && TRANSFER_OPERATION_SET.has(value);
}

export const transferMessages = {
  sourceNotFound: (source: string) => `Error: Source path '${source}' does not exist.`,
  unsafeDestination: (destination: string) =>
    `Error: Destination path '${destination}' is outside of the allowed directories (your home directory or current working directory).`,
  selfNesting: () => "Error: Cannot copy or move a directory into itself or a subdirectory.",
  targetContainsSource: (source: string, target: string) =>
    `Error: Cannot move '${source}' to '${target}' because the target contains the source.`,
  destinationCreated: (destination: string) => `Created destination directory: '${destination}'`,
  destinationCreateFailed: (destination: string, reason: string) =>
    `Error: Could not create destination directory '${destination}'. Reason: ${reason}`,
  unsupportedSourceType: (source: string) => `Error: Source path '${source}' is not a file or directory.`,
  invalidOperation: (operation: string, kind: SourceKind) =>
    `Invalid operation '${operation}' specified for ${kind}.`,
  transferFailed: (operation: string, reason: string) =>
    `An error occurred during the '${operation}' operation: ${reason}`,
  copiedDirectory: (source: string, target: string) => `Successfully copied directory '${source}' to '${target}'.`,
  movedDirectory: (source: string, destination: string) =>
    `Successfully moved directory '${source}' to '${destination}'.`,
  copiedFile: (source: string, destination: string) => `Successfully copied file '${source}' to '${destination}'.`,
  movedFile: (source: string, destination: string) => `Successfully moved file '${source}' to '${destination}'.`
} as const;
