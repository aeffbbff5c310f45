import { z } from "zod";
import { InvalidParameterError } from "./errors.js";

const blankAsMissing = (value: unknown) => (value === "" ? undefined : value);

const envSchema = z.object({
  CRATE_DEFAULT_FINGERPRINTS: z.preprocess(blankAsMissing, z.string().optional()),
  CRATE_ALLOW_MISSING: z.preprocess(
    blankAsMissing,
    z.enum(["true", "false"]).optional(),
  ),
  CRATE_KEYSERVER: z.preprocess(blankAsMissing, z.string().url().optional()),
  CRATE_LOG_LEVEL: z.preprocess(
    blankAsMissing,
    z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .optional(),
  ),
});

export type CrateEncryptionConfig = {
  defaultFingerprints: string[];
  allowMissing: boolean;
  keyserver?: string;
  logLevel: "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
};

/**
 * Reads crate encryption settings from environment variables.
 */
export function loadCrateEncryptionConfig(
  env: Record<string, string | undefined> = process.env,
): CrateEncryptionConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const parameter = issue ? String(issue.path[0]) : "env";
    throw new InvalidParameterError(
      `Invalid crate encryption configuration: ${result.error.message}`,
      parameter,
      env[parameter],
    );
  }
  const parsed = result.data;
  return {
    defaultFingerprints: (parsed.CRATE_DEFAULT_FINGERPRINTS ?? "")
      .split(",")
      .map((fingerprint) => fingerprint.trim())
      .filter((fingerprint) => fingerprint !== ""),
    allowMissing: parsed.CRATE_ALLOW_MISSING === "true",
    keyserver: parsed.CRATE_KEYSERVER,
    logLevel: parsed.CRATE_LOG_LEVEL ?? "info",
  };
}
