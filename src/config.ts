import { z } from "zod";

const base64UrlKey = z
  .string()
  .regex(/^[A-Za-z0-9_-]+$/, "must be base64url encoded")
  .refine(
    (value) => {
      const length = Buffer.from(value, "base64url").length;
      return length === 32 || length === 64;
    },
    { message: "must decode to 32 bytes (A256GCM) or 64 bytes (A256CBC-HS512)" }
  );

const ConfigSchema = z.object({
  // Server
  port: z.coerce.number().int().positive().default(3000),
  host: z.string().default("0.0.0.0"),
  logLevel: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),

  // Validation
  vconVersion: z
    .string()
    .regex(/^\d+\.\d+\.\d+$/, "Invalid version format")
    .default("0.0.1"),
  scanConcurrency: z.coerce.number().int().positive().default(4),

  // Keys
  signingSecret: z.string().min(1).optional(),
  encryptionKey: base64UrlKey.optional(),

  // Limits
  maxVconSizeMb: z.coerce.number().positive().default(200),
  maxContentSizeMb: z.coerce.number().positive().default(100),
  contentFetchTimeoutMs: z.coerce.number().int().positive().default(30000),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Treat empty variables (as left by .env.example) as unset */
function optionalEnv(value: string | undefined): string | undefined {
  return value === "" ? undefined : value;
}

function loadConfig(): Config {
  const env = process.env;

  const rawConfig = {
    port: optionalEnv(env["PORT"]),
    host: optionalEnv(env["HOST"]),
    logLevel: optionalEnv(env["LOG_LEVEL"]),
    vconVersion: optionalEnv(env["VCON_VERSION"]),
    scanConcurrency: optionalEnv(env["SCAN_CONCURRENCY"]),
    signingSecret: optionalEnv(env["VCON_SIGNING_SECRET"]),
    encryptionKey: optionalEnv(env["VCON_ENCRYPTION_KEY"]),
    maxVconSizeMb: optionalEnv(env["MAX_VCON_SIZE_MB"]),
    maxContentSizeMb: optionalEnv(env["MAX_CONTENT_SIZE_MB"]),
    contentFetchTimeoutMs: optionalEnv(env["CONTENT_FETCH_TIMEOUT_MS"]),
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}

export const config = loadConfig();
