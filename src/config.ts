/**
 * Configuration loaded from environment variables.
 * Credentials and environment-specific values live here, never in workflow logic.
 */

import { z } from "zod";
import type { CarrierResult } from "./carriers/types.js";
import { fail, ok } from "./carriers/types.js";
import { configurationError } from "./domain/errors.js";
import { formatIssues } from "./domain/validation.js";
import { SHIPX_SANDBOX_URL } from "./inpost/shipx-client.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .default("false")
  .transform((v) => v === "true" || v === "1" || v === "yes");

const statusList = z
  .string()
  .default("")
  .transform((v) =>
    v
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
  );

const configSchema = z.object({
  // ShipX account (required before any API call)
  INPOST_API_TOKEN: z.string().min(1, "INPOST_API_TOKEN is required"),
  INPOST_ORGANIZATION_ID: z.string().min(1, "INPOST_ORGANIZATION_ID is required"),
  INPOST_BASE_URL: z.string().url().default(SHIPX_SANDBOX_URL),

  // Optional
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LOG_FILE: z.string().min(1).default("log.txt"),
  LABEL_DIR: z.string().min(1).default("tmp"),
  LABEL_TYPE: z.enum(["normal", "A6"]).default("A6"),
  CONFIRMATION_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1_000),
  CONFIRMATION_MAX_ATTEMPTS: z.coerce.number().int().nonnegative().default(60),
  CONFIRMATION_FAILURE_STATUSES: statusList,
  DEBUG: booleanFlag,
});

export type Config = z.infer<typeof configSchema>;

const KEYS = configSchema.keyof().options;

/** Empty variables count as unset so defaults and "required" checks apply */
function readEnv(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const raw: Record<string, string | undefined> = {};
  for (const key of KEYS) {
    const value = env[key]?.trim();
    raw[key] = value === "" ? undefined : value;
  }
  return raw;
}

/**
 * Validate config from process.env. A missing credential is a configuration error,
 * reported before anything touches the network.
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): CarrierResult<Config> {
  const parsed = configSchema.safeParse(readEnv(env));
  if (!parsed.success) {
    return fail(configurationError(formatIssues(parsed.error), parsed.error));
  }
  return ok(parsed.data);
}

/** Like parseConfig, throwing the configuration error */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = parseConfig(env);
  if (!result.ok) throw result.error;
  return result.value;
}
