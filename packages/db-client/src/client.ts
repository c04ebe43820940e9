// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/client`
 * Purpose: postgres.js client factory and pinned-session helpers.
 * Scope: Builds the pooled client and reserves single sessions for scoped helpers. Does not read from environment (see config.ts).
 * Invariants:
 * - Configuration injected, never from process.env
 * - withSession releases the reserved connection on every exit path; a failed release never hides the callback error
 * Side-effects: IO (database connections)
 * Links: postgres-connection.ts, config.ts
 * @public
 */

import postgres from "postgres";

import type { ClientConfig } from "./config";
import type { LoggerLike, SessionConnection } from "./connection";
import { RestorationFailedError } from "./errors";
import { LoggingConnection } from "./logging-connection";
import {
  type PostgresSessionOptions,
  PostgresSessionConnection,
  type ReservedConnection,
} from "./postgres-connection";

export type SqlClientConfig = Pick<
  ClientConfig,
  | "DATABASE_URL"
  | "PG_APPLICATION_NAME"
  | "PG_POOL_MAX"
  | "PG_IDLE_TIMEOUT_S"
  | "PG_CONNECT_TIMEOUT_S"
>;

export function createSqlClient(config: SqlClientConfig): postgres.Sql {
  return postgres(config.DATABASE_URL, {
    max: config.PG_POOL_MAX,
    idle_timeout: config.PG_IDLE_TIMEOUT_S,
    connect_timeout: config.PG_CONNECT_TIMEOUT_S,
    connection: {
      application_name: config.PG_APPLICATION_NAME,
    },
  });
}

/** Anything that can pin a connection; postgres.js `Sql` qualifies. */
export interface ReservingClient {
  reserve(): Promise<ReservedConnection>;
}

export interface SessionOptions extends PostgresSessionOptions {
  /** When set, statements are logged through LoggingConnection. */
  logger?: LoggerLike;
}

export interface Session {
  /** The connection to hand to scoped helpers (logging-wrapped when a logger was given). */
  conn: SessionConnection;
  release(): Promise<void>;
}

export async function openSession(
  sql: ReservingClient,
  options: SessionOptions = {}
): Promise<Session> {
  const { logger, ...connOptions } = options;
  const base = new PostgresSessionConnection(await sql.reserve(), connOptions);
  return {
    conn: logger ? new LoggingConnection(base, logger) : base,
    release: () => base.release(),
  };
}

/**
 * Run `fn` on a freshly reserved session and release it afterwards.
 * An open transaction left by `fn` is rolled back on release.
 *
 * @throws {RestorationFailedError} If release fails; `bodyError` holds the callback failure, if any
 */
export async function withSession<T>(
  sql: ReservingClient,
  fn: (conn: SessionConnection) => Promise<T>,
  options: SessionOptions = {}
): Promise<T> {
  const session = await openSession(sql, options);
  let outcome: { ok: true; value: T } | { ok: false; error: unknown };
  try {
    outcome = { ok: true, value: await fn(session.conn) };
  } catch (error) {
    outcome = { ok: false, error };
  }

  try {
    await session.release();
  } catch (releaseError) {
    throw new RestorationFailedError(
      "session",
      releaseError,
      outcome.ok ? undefined : { error: outcome.error }
    );
  }

  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}
