import { DataSinkConfigError, loadDataSinkConfig, type DataSinkConfig, type DataSinkConfigInput } from "../../core/config/index.js";
import { isLogLevel, type LogLevel } from "../../core/logging/index.js";
import type { CollisionPolicy } from "../../core/transfer/index.js";
import { createDataSinkRuntime, type DataSinkRuntime } from "../../platform/node/runtime.js";
import { transferCommand } from "./commands/transfer.command.js";
import { CliUsageError, type TransferRunner } from "./framework/command.js";

export const CLI_VERSION = "0.1.0";

export interface RunCliOptions {
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
  createRuntime?: (config: DataSinkConfig) => DataSinkRuntime;
}

export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;

  const invocation = resolveInvocation(argv, options.env ?? process.env);
  if (!invocation.ok) {
    stderr.write(`${invocation.error}\n`);
    stderr.write(`${transferCommand.usage}\n`);
    return 2;
  }
  const { globalOptions, config } = invocation;

  if (globalOptions.help) {
    stdout.write(renderHelp());
    return 0;
  }
  if (globalOptions.version) {
    stdout.write(`${CLI_VERSION}\n`);
    return 0;
  }

  // The log file is only opened once a transfer actually runs.
  const createRuntime = options.createRuntime ?? createDataSinkRuntime;
  const runtime = createLazyRuntime(() => createRuntime(config));
  const service: TransferRunner = {
    transfer(source, destination, operation) {
      return runtime.get().service.transfer(source, destination, operation);
    }
  };

  try {
    return await transferCommand.run(globalOptions.passthroughArgv, {
      service,
      stdout,
      stderr,
      logFile: config.logFile,
      strictExit: globalOptions.strictExit
    });
  } finally {
    await runtime.close();
  }
}

function createLazyRuntime(factory: () => DataSinkRuntime): { get(): DataSinkRuntime; close(): Promise<void> } {
  let instance: DataSinkRuntime | undefined;

  const ensureInstance = (): DataSinkRuntime => {
    if (!instance) {
      instance = factory();
    }
    return instance;
  };

  return {
    get: ensureInstance,
    async close(): Promise<void> {
      if (instance) {
        await instance.close();
      }
    }
  };
}

type Invocation =
  | {
      ok: true;
      globalOptions: GlobalCliOptions;
      config: DataSinkConfig;
    }
  | {
      ok: false;
      error: string;
    };

function resolveInvocation(argv: string[], env: NodeJS.ProcessEnv): Invocation {
  try {
    const globalOptions = parseGlobalCliOptions(argv);
    const config = loadDataSinkConfig(env, globalOptions.overrides);
    return { ok: true, globalOptions, config };
  } catch (error) {
    if (error instanceof CliUsageError || error instanceof DataSinkConfigError) {
      return { ok: false, error: error.message };
    }
    throw error;
  }
}

interface GlobalCliOptions {
  passthroughArgv: string[];
  overrides: DataSinkConfigInput;
  strictExit: boolean;
  help: boolean;
  version: boolean;
}

function parseGlobalCliOptions(argv: string[]): GlobalCliOptions {
  const passthrough: string[] = [];
  const overrides: DataSinkConfigInput = {};
  let strictExit = false;
  let help = false;
  let version = false;

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === undefined) {
      continue;
    }

    if (token === "--") {
      passthrough.push(...argv.slice(index));
      break;
    }

    if (token === "-h" || token === "--help") {
      help = true;
      continue;
    }

    if (token === "-v" || token === "--version") {
      version = true;
      continue;
    }

    if (token === "--strict-exit") {
      strictExit = true;
      continue;
    }

    if (token === "--no-boundary") {
      overrides.enforceBoundary = false;
      continue;
    }

    const valueFlag = matchValueFlag(argv, index);
    if (valueFlag) {
      index += valueFlag.consumed;
      if (valueFlag.name === "--log-file") {
        overrides.logFile = valueFlag.value;
      } else if (valueFlag.name === "--log-level") {
        overrides.logLevel = parseLogLevel(valueFlag.value);
      } else {
        overrides.collisionPolicy = parseCollisionPolicy(valueFlag.value);
      }
      continue;
    }

    passthrough.push(token);
  }

  return {
    passthroughArgv: passthrough,
    overrides,
    strictExit,
    help,
    version
  };
}

const VALUE_FLAGS = ["--log-file", "--log-level", "--on-collision"] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];

function matchValueFlag(
  argv: string[],
  index: number
): { name: ValueFlag; value: string; consumed: number } | undefined {
  const token = argv[index] ?? "";
  for (const name of VALUE_FLAGS) {
    if (token === name) {
      const value = argv[index + 1];
      if (!value || value === "--") {
        throw new CliUsageError(`Missing value for ${name}.`);
      }
      return { name, value, consumed: 1 };
    }
    if (token.startsWith(`${name}=`)) {
      return { name, value: token.slice(name.length + 1), consumed: 0 };
    }
  }
  return undefined;
}

function parseLogLevel(raw: string): LogLevel {
  const value = raw.trim().toLowerCase();
  if (isLogLevel(value)) {
    return value;
  }
  throw new CliUsageError('Invalid --log-level. Use "silent", "error", "warn", "info", or "debug".');
}

function parseCollisionPolicy(raw: string): CollisionPolicy {
  const value = raw.trim().toLowerCase();
  if (value === "merge" || value === "timestamp") {
    return value;
  }
  throw new CliUsageError('Invalid --on-collision. Use "merge" or "timestamp".');
}

function renderHelp(): string {
  return [
    transferCommand.usage,
    "",
    transferCommand.description,
    "",
    "Options:",
    "  -m, --move                  Move the source instead of copying it (copy is the default).",
    "  --on-collision <policy>     Directory copy collision policy: merge (default) or timestamp.",
    "  --no-boundary               Skip the home/working-directory boundary and self-nesting checks.",
    "  --log-file <path>           Append log lines to this file (default: datasync_log.txt).",
    "  --log-level <level>         silent, error, warn, info (default) or debug.",
    "  --strict-exit               Exit with status 1 when the transfer fails.",
    "  -h, --help                  Show this help.",
    "  -v, --version               Print the version.",
    ""
  ].join("\n");
}
