import { z } from "zod";

export const DEFAULT_LOG_FILE = "datasync_log.txt";

const booleanFlagSchema = z
  .union([z.boolean(), z.enum(["true", "false", "1", "0"])])
  .transform((value) => value === true || value === "true" || value === "1");

export const dataSinkConfigSchema = z.object({
  logFile: z.string().trim().min(1, "Log file path cannot be empty.").default(DEFAULT_LOG_FILE),
  logLevel: z.enum(["silent", "error", "warn", "info", "debug"]).default("info"),
  collisionPolicy: z.enum(["merge", "timestamp"]).default("merge"),
  enforceBoundary: booleanFlagSchema.default(true)
});

export type DataSinkConfig = z.infer<typeof dataSinkConfigSchema>;
export type DataSinkConfigInput = z.input<typeof dataSinkConfigSchema>;

export class DataSinkConfigError extends Error {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(`Invalid DataSink configuration: ${issues.join("; ")}`);
    this.name = "DataSinkConfigError";
    this.issues = issues;
  }
}

/**
 * Reads `DATASINK_*` variables from `env`, then applies `overrides`
 * (typically parsed CLI flags) on top.
 */
export function loadDataSinkConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: DataSinkConfigInput = {}
): DataSinkConfig {
  const fromEnv: Record<string, unknown> = {
    logFile: readEnv(env.DATASINK_LOG_FILE),
    logLevel: readEnv(env.DATASINK_LOG_LEVEL)?.toLowerCase(),
    collisionPolicy: readEnv(env.DATASINK_COLLISION_POLICY)?.toLowerCase(),
    enforceBoundary: readEnv(env.DATASINK_ENFORCE_BOUNDARY)?.toLowerCase()
  };

  const parsed = dataSinkConfigSchema.safeParse({ ...dropUndefined(fromEnv), ...dropUndefined(overrides) });
  if (!parsed.success) {
    throw new DataSinkConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    );
  }
  return parsed.data;
}

function readEnv(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function dropUndefined(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));
}
