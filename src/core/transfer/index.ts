export { TransferService } from "./application/transfer.service.js";
export type {
  CollisionPolicy,
  SourceKind,
  TransferErrorKind,
  TransferOperation,
  TransferOutcome
} from "./domain/transfer.js";
export { TRANSFER_OPERATIONS, isTransferOperation, transferMessages } from "./domain/transfer.js";
export { formatTimestampSuffix, timestampedName } from "./domain/collision.js";
export { isSameOrDescendant, isWithinBoundary } from "./domain/path-boundary.js";
