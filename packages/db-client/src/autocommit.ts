// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/autocommit`
 * Purpose: Scoped autocommit mode.
 * Scope: Autocommit specialization of runScoped. Does not commit or roll back on the caller's behalf.
 * Invariants:
 * - After the scope, conn.autocommit equals the value read on entry, on every exit path
 * - Entering or restoring while a transaction block is open fails (TransactionInProgressError from the connection)
 * Side-effects: IO (connection mode change)
 * Links: scope.ts
 * @public
 */

import type { SessionConnection } from "./connection";
import { runScoped, type ScopeBody, type ScopeOptions } from "./scope";

/**
 * Run `fn` with autocommit set to `enabled`, then restore the previous mode.
 *
 * A body that leaves a transaction open when `enabled` is false makes the
 * restore step fail with RestorationFailedError; commit or roll back first.
 */
export function withAutocommit<TConn extends SessionConnection, T>(
  conn: TConn,
  enabled: boolean,
  fn: ScopeBody<TConn, T>,
  options?: ScopeOptions
): Promise<T> {
  return runScoped(
    conn,
    {
      kind: "autocommit",
      describe: { autocommit: enabled },
      async enter(c) {
        const previous = c.autocommit;
        await c.setAutocommit(enabled);
        return previous;
      },
      async restore(c, previous) {
        await c.setAutocommit(previous);
      },
    },
    fn,
    options
  );
}
