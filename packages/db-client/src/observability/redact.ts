// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/observability/redact`
 * Purpose: Redaction paths for pino and password scrubbing for logged SQL text.
 * Scope: Define paths to redact from log output and scrub PASSWORD literals. Does not emit logs.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * Links: Imported by logger.ts and logging-connection.ts.
 * @public
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "secret",
  "token",
  // Connection config
  "connectionString",
  "config.connectionString",
  "DATABASE_URL",
  "config.DATABASE_URL",
];

const PASSWORD_LITERAL_RE = /PASSWORD\s+'(?:[^']|'')*'/gi;

/** Replace `PASSWORD '...'` literals so role DDL can be logged. */
export function redactSql(text: string): string {
  return text.replace(PASSWORD_LITERAL_RE, "PASSWORD '[REDACTED]'");
}
