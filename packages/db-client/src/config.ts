// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/config`
 * Purpose: Environment configuration with Zod validation.
 * Scope: Parses and validates env vars for createSqlClient. Does not construct clients.
 * Invariants:
 * - DATABASE_URL required (treat as secret - never log)
 * - Fails fast with one line per invalid variable
 * Side-effects: Reads process.env when no env object is passed
 * Links: client.ts
 * @public
 */

import { z } from "zod";

const ClientEnvSchema = z.object({
  /** PostgreSQL connection string (required) */
  DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),

  /** application_name reported to the server (default: pgscope) */
  PG_APPLICATION_NAME: z.string().min(1).default("pgscope"),

  /** Pool size (default: 10) */
  PG_POOL_MAX: z.coerce.number().int().min(1).default(10),

  /** Seconds before an idle pooled connection closes (default: 20) */
  PG_IDLE_TIMEOUT_S: z.coerce.number().int().min(0).default(20),

  /** Seconds to wait for a new connection (default: 10) */
  PG_CONNECT_TIMEOUT_S: z.coerce.number().int().min(1).default(10),

  /** Log level (default: info) */
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type ClientConfig = z.infer<typeof ClientEnvSchema>;

/**
 * Loads and validates configuration from environment.
 * Throws on invalid config with clear error messages.
 */
export function loadClientConfig(
  env: Record<string, string | undefined> = process.env
): ClientConfig {
  const result = ClientEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}
