import type { TransferService } from "../../../core/transfer/index.js";

export type TransferRunner = Pick<TransferService, "transfer">;

export interface CliContext {
  service: TransferRunner;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  logFile: string;
  strictExit: boolean;
}

export interface CliCommand {
  path: string[];
  description: string;
  usage: string;
  run(args: string[], context: CliContext): Promise<number>;
}

export class CliUsageError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}
