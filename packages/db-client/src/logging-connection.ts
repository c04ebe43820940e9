// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/logging-connection`
 * Purpose: SessionConnection decorator that logs every statement and session-state change.
 * Scope: Logging only; delegates all behavior to the wrapped connection. Does not log parameter values.
 * Invariants:
 * - Same keys everywhere (sql, paramCount, durationMs)
 * - Failures are logged at warn and rethrown unchanged
 * - PASSWORD literals never reach the log (redactSql)
 * Side-effects: IO (emits structured log entries via provided logger)
 * Links: observability/redact.ts
 * @public
 */

import type {
  LoggerLike,
  QueryParam,
  Row,
  SessionConnection,
} from "./connection";
import { redactSql } from "./observability/redact";

export class LoggingConnection implements SessionConnection {
  constructor(
    private readonly inner: SessionConnection,
    private readonly log: LoggerLike
  ) {}

  get autocommit(): boolean {
    return this.inner.autocommit;
  }

  get inTransaction(): boolean {
    return this.inner.inTransaction;
  }

  async setAutocommit(value: boolean): Promise<void> {
    await this.inner.setAutocommit(value);
    this.log.debug({ autocommit: value }, "autocommit changed");
  }

  async query(text: string, params: readonly QueryParam[] = []): Promise<Row[]> {
    const sql = redactSql(text);
    const started = performance.now();
    try {
      const rows = await this.inner.query(text, params);
      this.log.debug(
        {
          sql,
          paramCount: params.length,
          rowCount: rows.length,
          durationMs: elapsed(started),
        },
        "query complete"
      );
      return rows;
    } catch (err) {
      this.log.warn(
        { err, sql, paramCount: params.length, durationMs: elapsed(started) },
        "query failed"
      );
      throw err;
    }
  }

  async commit(): Promise<void> {
    await this.inner.commit();
    this.log.debug({}, "transaction committed");
  }

  async rollback(): Promise<void> {
    await this.inner.rollback();
    this.log.debug({}, "transaction rolled back");
  }
}

function elapsed(started: number): number {
  return Math.round(performance.now() - started);
}
