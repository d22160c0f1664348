import { z } from "zod";
import { ConfigError } from "@stowage/shared";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const ClientConfigSchema = z.object({
  identity: z.string({ required_error: "identity is required" }).min(1, "identity must not be empty"),
  baseUrl: z
    .string({ required_error: "base URL is required" })
    .min(1, "base URL must not be empty")
    .url("base URL must be an absolute URL")
    .transform((value) => value.replace(/\/+$/, "")),
  timeoutMs: z.number().int().positive().optional(),
  logLevel: LogLevelSchema.default("info"),
  prettyLogs: z.boolean().default(false)
});

export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
export type ClientConfig = z.output<typeof ClientConfigSchema>;

const REMEDIATION =
  "Pass a non-empty identity and baseUrl to the client, or set STOWAGE_USER_ID and STOWAGE_API_URL";

export function validateConfig(input: ClientConfigInput): ClientConfig {
  const result = ClientConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message
    }));
    throw new ConfigError(issues.map((issue) => issue.message).join("; "), {
      remediation: REMEDIATION,
      details: { issues }
    });
  }
  return result.data;
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  let timeoutMs: number | undefined;
  if (env.STOWAGE_TIMEOUT_MS) {
    timeoutMs = Number(env.STOWAGE_TIMEOUT_MS);
    if (Number.isNaN(timeoutMs)) {
      throw new ConfigError("STOWAGE_TIMEOUT_MS must be a number", {
        details: { value: env.STOWAGE_TIMEOUT_MS }
      });
    }
  }

  const logLevel = LogLevelSchema.safeParse(env.STOWAGE_LOG_LEVEL ?? "info");
  if (!logLevel.success) {
    throw new ConfigError(`STOWAGE_LOG_LEVEL must be one of ${LogLevelSchema.options.join(", ")}`, {
      details: { value: env.STOWAGE_LOG_LEVEL }
    });
  }

  return validateConfig({
    identity: env.STOWAGE_USER_ID ?? "",
    baseUrl: env.STOWAGE_API_URL ?? "",
    timeoutMs,
    logLevel: logLevel.data,
    prettyLogs: (env.NODE_ENV ?? "production") === "development"
  });
}
