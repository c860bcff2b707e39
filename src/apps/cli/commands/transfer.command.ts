import type { TransferOperation } from "../../../core/transfer/index.js";
import type { CliCommand } from "../framework/command.js";

const TRANSFER_USAGE = "Usage: datasink <source> <destination> [-m|--move] [--strict-exit]";

export const transferCommand: CliCommand = {
  path: [],
  description: "Copy or move a file or directory into a destination directory.",
  usage: TRANSFER_USAGE,
  async run(args, context): Promise<number> {
    const parsed = parseTransferArgs(args);
    if (!parsed.ok) {
      context.stderr.write(`${parsed.error}\n`);
      context.stderr.write(`${TRANSFER_USAGE}\n`);
      return 2;
    }

    context.stdout.write(`Starting '${parsed.operation}' operation...\n`);
    context.stdout.write(`Source: ${parsed.source}\n`);
    context.stdout.write(`Destination: ${parsed.destination}\n`);

    const outcome = await context.service.transfer(parsed.source, parsed.destination, parsed.operation);

    if (outcome.success) {
      context.stdout.write(`\nSuccess: ${outcome.message}\n`);
    } else {
      context.stdout.write(`\nError: ${outcome.message}\n`);
    }
    context.stdout.write(`Check '${context.logFile}' for detailed logs.\n`);

    // The outcome goes to stdout; the exit status only reflects it under --strict-exit.
    return !outcome.success && context.strictExit ? 1 : 0;
  }
};

type ParsedTransferArgs =
  | {
      ok: true;
      source: string;
      destination: string;
      operation: TransferOperation;
    }
  | {
      ok: false;
      error: string;
    };

function parseTransferArgs(args: string[]): ParsedTransferArgs {
  const positionals: string[] = [];
  let operation: TransferOperation = "copy";
  let positionalOnly = false;

  for (const token of args) {
    if (positionalOnly) {
      positionals.push(token);
      continue;
    }
    if (token === "--") {
      positionalOnly = true;
      continue;
    }
    if (token === "-m" || token === "--move") {
      operation = "move";
      continue;
    }
    if (token.startsWith("-") && token !== "-") {
      return { ok: false, error: `Unknown option: ${token}` };
    }
    positionals.push(token);
  }

  if (positionals.length < 2) {
    return { ok: false, error: "Missing <source> or <destination>." };
  }
  if (positionals.length > 2) {
    return { ok: false, error: `Unexpected argument: ${positionals[2]}` };
  }

  const [source, destination] = positionals;
  if (!source || !destination) {
    return { ok: false, error: "Source and destination cannot be empty." };
  }

  return { ok: true, source, destination, operation };
}
