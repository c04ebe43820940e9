// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/postgres-connection`
 * Purpose: SessionConnection over a postgres.js reserved (pinned) connection.
 * Scope: Autocommit bookkeeping, implicit BEGIN, commit/rollback and release. Does not pool or reconnect.
 * Invariants:
 * - Every statement runs on the reserved session, so SET ROLE and advisory locks stay on one backend
 * - Autocommit off: the first statement opens a transaction that lasts until commit()/rollback()
 * - setAutocommit inside an open transaction throws TransactionInProgressError without a round trip
 * - release() rolls back an open transaction before returning the connection; later use throws ConnectionReleasedError
 * Side-effects: IO (database statements)
 * Notes: Issue transaction control through commit()/rollback(), not raw BEGIN/COMMIT text,
 *        or the inTransaction flag drifts from the server's view.
 * Links: client.ts, connection.ts
 * @public
 */

import type { QueryParam, Row, SessionConnection } from "./connection";
import { ConnectionReleasedError, TransactionInProgressError } from "./errors";

/**
 * The part of postgres.js `ReservedSql` this adapter uses.
 * `sql.reserve()` resolves to a value of this shape.
 */
export interface ReservedConnection {
  unsafe(query: string, parameters?: QueryParam[]): PromiseLike<readonly Row[]>;
  release(): void;
}

export interface PostgresSessionOptions {
  /** Initial autocommit mode (default true, matching postgres.js' own behavior). */
  autocommit?: boolean;
}

export class PostgresSessionConnection implements SessionConnection {
  private autocommitMode: boolean;
  private transactionOpen = false;
  private released = false;

  constructor(
    private readonly reserved: ReservedConnection,
    options: PostgresSessionOptions = {}
  ) {
    this.autocommitMode = options.autocommit ?? true;
  }

  get autocommit(): boolean {
    return this.autocommitMode;
  }

  get inTransaction(): boolean {
    return this.transactionOpen;
  }

  async setAutocommit(value: boolean): Promise<void> {
    this.assertUsable();
    if (this.transactionOpen) {
      throw new TransactionInProgressError("change autocommit");
    }
    this.autocommitMode = value;
  }

  async query(text: string, params: readonly QueryParam[] = []): Promise<Row[]> {
    this.assertUsable();
    if (!this.autocommitMode && !this.transactionOpen) {
      await this.run("BEGIN");
      this.transactionOpen = true;
    }
    return this.run(text, params);
  }

  async commit(): Promise<void> {
    await this.endTransaction("COMMIT");
  }

  async rollback(): Promise<void> {
    await this.endTransaction("ROLLBACK");
  }

  /** Roll back any open transaction and hand the connection back to the pool. Idempotent. */
  async release(): Promise<void> {
    if (this.released) return;
    try {
      if (this.transactionOpen) {
        await this.endTransaction("ROLLBACK");
      }
    } finally {
      this.released = true;
      this.reserved.release();
    }
  }

  private async endTransaction(statement: "COMMIT" | "ROLLBACK"): Promise<void> {
    this.assertUsable();
    if (!this.transactionOpen) return;
    try {
      await this.run(statement);
    } finally {
      this.transactionOpen = false;
    }
  }

  private async run(
    text: string,
    params: readonly QueryParam[] = []
  ): Promise<Row[]> {
    const rows = await this.reserved.unsafe(text, [...params]);
    return Array.from(rows);
  }

  private assertUsable(): void {
    if (this.released) {
      throw new ConnectionReleasedError();
    }
  }
}
