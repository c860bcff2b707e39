import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { CLI_VERSION, runCli } from "../../src/apps/cli/cli.js";
import type { DataSinkConfig } from "../../src/core/config/index.js";
import { TransferService } from "../../src/core/transfer/index.js";
import { NodeFileSystem } from "../../src/platform/node/node-file-system.js";
import type { DataSinkRuntime } from "../../src/platform/node/runtime.js";
import { createRecordingLogger } from "../helpers/recording-logger.js";
import { createStreamCapture } from "../helpers/stream-capture.js";
import { createTempDir, createTransferSandbox, removeTempDir } from "../helpers/temp-dir.js";

const roots: string[] = [];

afterEach(async () => {
  while (roots.length > 0) {
    const root = roots.pop();
    if (root) {
      await removeTempDir(root);
    }
  }
});

function createIo(env: NodeJS.ProcessEnv = {}) {
  const stdout = createStreamCapture();
  const stderr = createStreamCapture();
  return { stdout, stderr, options: { stdout: stdout.stream, stderr: stderr.stream, env } };
}

describe("runCli", () => {
  it("shows help without opening a log file", async () => {
    const io = createIo();
    const createRuntime = vi.fn();

    const code = await runCli(["--help"], { ...io.options, createRuntime });

    expect(code).toBe(0);
    expect(createRuntime).not.toHaveBeenCalled();
    expect(io.stdout.output().startsWith("Usage: datasink <source> <destination>")).toBe(true);
  });

  it("prints the version", async () => {
    const io = createIo();
    const packageJson = JSON.parse(await readFile(path.resolve("package.json"), "utf-8")) as { version: string };

    const code = await runCli(["--version"], io.options);

    expect(code).toBe(0);
    expect(io.stdout.output()).toBe(`${CLI_VERSION}\n`);
    expect(CLI_VERSION).toBe(packageJson.version);
  });

  it("returns 2 on invalid global flags", async () => {
    const io = createIo();

    const code = await runCli(["--on-collision", "rename", "a", "b"], io.options);

    expect(code).toBe(2);
    expect(io.stderr.output()).toContain('Invalid --on-collision. Use "merge" or "timestamp".\n');
  });

  it("rejects a --log-level that is not a level name", async () => {
    const io = createIo();

    const code = await runCli(["--log-level", "toString", "a", "b"], io.options);

    expect(code).toBe(2);
    expect(io.stderr.output()).toContain(
      'Invalid --log-level. Use "silent", "error", "warn", "info", or "debug".\n'
    );
  });

  it("returns 2 on invalid environment configuration", async () => {
    const io = createIo({ DATASINK_LOG_LEVEL: "loud" });

    const code = await runCli(["a", "b"], io.options);

    expect(code).toBe(2);
    expect(io.stderr.output().startsWith("Invalid DataSink configuration: logLevel: ")).toBe(true);
  });

  it("passes global flags into the runtime config and closes the runtime", async () => {
    const sandbox = await createTransferSandbox();
    roots.push(sandbox.root);
    const io = createIo();
    const { logger } = createRecordingLogger();
    const close = vi.fn(async () => undefined);
    const configs: DataSinkConfig[] = [];
    const createRuntime = (config: DataSinkConfig): DataSinkRuntime => {
      configs.push(config);
      return {
        service: new TransferService({ fileSystem: new NodeFileSystem(), boundaryRoots: sandbox.roots, logger }),
        logger,
        logFile: config.logFile,
        close
      };
    };

    const code = await runCli(
      ["--log-level=debug", "--on-collision", "timestamp", "--log-file", "custom.log", sandbox.sourceFile, sandbox.destinationDir],
      { ...io.options, createRuntime }
    );

    expect(code).toBe(0);
    expect(configs).toEqual([
      { logFile: "custom.log", logLevel: "debug", collisionPolicy: "timestamp", enforceBoundary: true }
    ]);
    expect(close).toHaveBeenCalledOnce();
    expect(io.stdout.output()).toContain(
      `Success: Successfully copied file '${sandbox.sourceFile}' to '${sandbox.destinationDir}'.\n`
    );
    expect(io.stdout.output()).toContain("Check 'custom.log' for detailed logs.\n");
  });

  it("runs a real copy end to end and appends to the log file", async () => {
    const root = await createTempDir("datasink-cli-");
    roots.push(root);
    const source = path.join(root, "report.txt");
    const destination = path.join(root, "backup");
    const logFile = path.join(root, "datasync_log.txt");
    await writeFile(source, "quarterly numbers", "utf-8");
    const io = createIo();

    const code = await runCli(["--no-boundary", "--log-file", logFile, source, destination], io.options);

    expect(code).toBe(0);
    expect(await readFile(path.join(destination, "report.txt"), "utf-8")).toBe("quarterly numbers");
    const lines = (await readFile(logFile, "utf-8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]?.endsWith(` - INFO - Created destination directory: '${destination}'`)).toBe(true);
    expect(lines[1]?.endsWith(` - INFO - Successfully copied file '${source}' to '${destination}'.`)).toBe(true);
  });

  it("reports a failed transfer on stdout with exit code 0, or 1 under --strict-exit", async () => {
    const root = await createTempDir("datasink-cli-");
    roots.push(root);
    const logFile = path.join(root, "datasync_log.txt");
    const missing = path.join(root, "missing.txt");

    const lenient = createIo();
    const lenientCode = await runCli(["--log-file", logFile, missing, root], lenient.options);
    const strict = createIo();
    const strictCode = await runCli(["--strict-exit", "--log-file", logFile, missing, root], strict.options);

    expect(lenientCode).toBe(0);
    expect(strictCode).toBe(1);
    expect(lenient.stdout.output()).toContain(`\nError: Error: Source path '${missing}' does not exist.\n`);
    const lines = (await readFile(logFile, "utf-8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[1]?.endsWith(` - ERROR - Error: Source path '${missing}' does not exist.`)).toBe(true);
  });
});
