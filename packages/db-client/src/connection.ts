// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/connection`
 * Purpose: Connection port consumed by every scoped helper, plus the LoggerLike seam.
 * Scope: Type definitions only. Does not open, pool or close connections.
 * Invariants:
 * - The caller owns the connection; helpers only mutate session state for the length of a scope
 * - One logical caller per connection at a time (not enforced; concurrent scopes on one session race)
 * - In non-autocommit mode the first statement opens a transaction that lasts until commit()/rollback()
 * Side-effects: none
 * Links: postgres-connection.ts, logging-connection.ts
 * @public
 */

// int8 values travel as decimal strings (see lock-key.ts).
export type QueryParam = string | number | boolean | Date | null;

export type Row = Record<string, unknown>;

export interface SessionConnection {
  readonly autocommit: boolean;
  /** True while a transaction block is open on the session. */
  readonly inTransaction: boolean;
  /**
   * Switch autocommit mode.
   * @throws {TransactionInProgressError} If a transaction block is open
   */
  setAutocommit(value: boolean): Promise<void>;
  query(text: string, params?: readonly QueryParam[]): Promise<Row[]>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

/**
 * Simple logger interface for optional logging in helpers.
 * Consumers can inject their own logger (e.g., pino).
 */
export interface LoggerLike {
  info: (obj: Record<string, unknown>, msg: string) => void;
  warn: (obj: Record<string, unknown>, msg: string) => void;
  error: (obj: Record<string, unknown>, msg: string) => void;
  debug: (obj: Record<string, unknown>, msg: string) => void;
}
