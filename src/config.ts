/**
 * Environment-driven configuration.
 *
 * Every setting has a default, so `loadConfig({})` always succeeds; values that
 * are present must parse.
 */

import { z } from "zod";
import { logger } from "./logger.js";

export const ConfigSchema = z.object({
  PAPER_ID_PDFTOTEXT: z.string().min(1).default("pdftotext"),
  PAPER_ID_DJVUTXT: z.string().min(1).default("djvutxt"),
  PAPER_ID_DETEX: z.string().min(1).default("detex"),
  PAPER_ID_TAR: z.string().min(1).default("tar"),
  /** How .bbl blocks are turned into plain text */
  PAPER_ID_BBL_PLAINTEXT: z.enum(["detex", "builtin"]).default("detex"),
  /** Subprocess timeout in ms; unset means none */
  PAPER_ID_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  /** Contact address sent to CrossRef (polite pool) */
  PAPER_ID_MAILTO: z.string().email().optional(),
  PAPER_ID_USER_AGENT: z.string().min(1).default("paper-identifiers/0.1.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse configuration from an environment map (defaults to `process.env`).
 * A LOG_LEVEL present in `env` is applied to the shared logger; without one the
 * logger keeps its current level.
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const result = ConfigSchema.safeParse(present);
  if (!result.success) {
    const message = `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`;
    logger.error(message);
    throw new Error(message);
  }
  if ("LOG_LEVEL" in present) logger.level = result.data.LOG_LEVEL;
  return result.data;
}

/** Options for registry HTTP clients derived from a config. */
export interface RegistryOptions {
  userAgent?: string;
  mailto?: string;
  /** Cancels the request */
  signal?: AbortSignal;
}

export function registryOptionsFrom(config: Config): RegistryOptions {
  const options: RegistryOptions = { userAgent: config.PAPER_ID_USER_AGENT };
  if (config.PAPER_ID_MAILTO) options.mailto = config.PAPER_ID_MAILTO;
  return options;
}
