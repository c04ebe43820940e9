// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/role`
 * Purpose: Scoped SET ROLE with restoration of the role observed on entry.
 * Scope: Role specialization of runScoped and a current-role reader. Does not create or grant roles (see admin.ts).
 * Invariants:
 * - Role names are double-quoted before interpolation (SET ROLE takes no $1 placeholder)
 * - Unknown or forbidden roles raise RoleError, never StateChangeFailedError
 * - Restore uses SET ROLE NONE (exactly session_user, whatever the role setting's default) when the entry role
 *   was the session user, otherwise SET ROLE <entry role>
 * Side-effects: IO (SET ROLE)
 * Notes: In non-autocommit mode SET ROLE runs inside the open transaction; rolling that
 *        transaction back inside the body also undoes the switch.
 * Links: scope.ts, errors.ts
 * @public
 */

import { z } from "zod";

import type { SessionConnection } from "./connection";
import { RoleError, SqlState, sqlStateOf } from "./errors";
import { runScoped, type ScopeBody, type ScopeOptions } from "./scope";
import { queryOne, quoteIdent } from "./sql";

const CurrentRoleRow = z.object({
  current_role: z.string(),
  session_role: z.string(),
});

export interface CurrentRole {
  /** Effective role (`current_user`). */
  current: string;
  /** Authenticated role (`session_user`). */
  session: string;
}

const ROLE_ERROR_STATES: ReadonlySet<string> = new Set([
  SqlState.INVALID_PARAMETER_VALUE,
  SqlState.UNDEFINED_OBJECT,
  SqlState.INSUFFICIENT_PRIVILEGE,
]);

export async function getCurrentRole(
  conn: SessionConnection
): Promise<CurrentRole> {
  const row = await queryOne(
    conn,
    "SELECT current_user AS current_role, session_user AS session_role",
    [],
    CurrentRoleRow
  );
  return { current: row.current_role, session: row.session_role };
}

/**
 * Run `fn` as `role`, then switch back to the role that was active on entry.
 *
 * @throws {RoleError} If the role does not exist or the session may not assume it
 */
export function withRole<TConn extends SessionConnection, T>(
  conn: TConn,
  role: string,
  fn: ScopeBody<TConn, T>,
  options?: ScopeOptions
): Promise<T> {
  return runScoped(
    conn,
    {
      kind: "role",
      describe: { role },
      async enter(c) {
        const previous = await getCurrentRole(c);
        try {
          await c.query(`SET ROLE ${quoteIdent(role)}`);
        } catch (error) {
          const state = sqlStateOf(error);
          if (state !== undefined && ROLE_ERROR_STATES.has(state)) {
            throw new RoleError(role, error);
          }
          throw error;
        }
        return previous;
      },
      async restore(c, previous) {
        await c.query(
          previous.current === previous.session
            ? "SET ROLE NONE"
            : `SET ROLE ${quoteIdent(previous.current)}`
        );
      },
    },
    fn,
    options
  );
}
