import { z } from "zod";
import { ConfigError } from "./errors.js";

export interface FleetConfig {
  pollIntervalMs: number;
  maxAttempts: number;
  concurrency: number;
  region?: string;
  documentName: string;
  secretDocumentName?: string;
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

// blank values fall back to the default instead of coercing to 0
function intFromEnv(min: number, max: number, fallback: number) {
  return z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z.coerce.number().int().min(min).max(max).default(fallback)
  );
}

const schema = z.object({
  FLEETCMD_POLL_MS: intFromEnv(0, Number.MAX_SAFE_INTEGER, 10_000),
  FLEETCMD_MAX_ATTEMPTS: intFromEnv(1, Number.MAX_SAFE_INTEGER, 30),
  FLEETCMD_CONCURRENCY: intFromEnv(1, 256, 8),
  AWS_REGION: optionalText,
  FLEETCMD_SSM_DOCUMENT: z.string().trim().min(1).default("AWS-RunShellScript"),
  FLEETCMD_SSM_SECRET_DOCUMENT: optionalText
});

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): FleetConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join(".")))];
    throw new ConfigError(`invalid configuration: ${keys.join(", ")}`);
  }
  const value = parsed.data;
  return {
    pollIntervalMs: value.FLEETCMD_POLL_MS,
    maxAttempts: value.FLEETCMD_MAX_ATTEMPTS,
    concurrency: value.FLEETCMD_CONCURRENCY,
    region: value.AWS_REGION,
    documentName: value.FLEETCMD_SSM_DOCUMENT,
    secretDocumentName: value.FLEETCMD_SSM_SECRET_DOCUMENT
  };
}
