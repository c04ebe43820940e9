// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/packages/db-client/session-flow`
 * Purpose: Cross-module flow through the public `@pgscope/db-client` entrypoint.
 * Scope: Nests role, lock and autocommit scopes on one fake session. Does not require database or network.
 * Invariants: Every scope restores its own state in reverse order of entry.
 * Side-effects: none
 * Links: packages/db-client/src/index.ts
 * @public
 */

import {
  isLockUnavailableError,
  isRoleError,
  LoggingConnection,
  makeNoopLogger,
  withAdvisoryLock,
  withAutocommit,
  withRole,
} from "@pgscope/db-client";
import { describe, expect, it } from "vitest";

import { FakeServer } from "../../../packages/db-client/tests/fakes";

describe("nested session scopes", () => {
  it("unwinds role, lock and autocommit in reverse order", async () => {
    const server = new FakeServer().addRole("migrator");
    const inner = server.connect({ autocommit: false });
    const conn = new LoggingConnection(inner, makeNoopLogger());

    const seen = await withAutocommit(conn, true, (c1) =>
      withAdvisoryLock(c1, "migrations", (c2) =>
        withRole(c2, "migrator", async () => ({
          autocommit: inner.autocommit,
          role: inner.currentRole,
        }))
      )
    );

    expect(seen).toEqual({ autocommit: true, role: "migrator" });
    expect(inner.autocommit).toBe(false);
    expect(inner.currentRole).toBe("postgres");
    expect(inner.inTransaction).toBe(false);
    expect(inner.calls).toEqual([
      "setAutocommit(true)",
      "SELECT pg_advisory_lock($1::bigint)",
      "granted -3058229681751119483",
      "SELECT current_user AS current_role, session_user AS session_role",
      'SET ROLE "migrator"',
      "SET ROLE NONE",
      "SELECT pg_advisory_unlock($1::bigint) AS released",
      "setAutocommit(false)",
    ]);
  });

  it("lets callers branch on error kinds from the public guards", async () => {
    const server = new FakeServer();
    const holder = server.connect({ autocommit: true });
    const other = server.connect({ autocommit: true });

    const roleFailure = await withRole(other, "ghost", async () => 0).catch(
      (error: unknown) => error
    );
    const lockFailure = await withAdvisoryLock(holder, 1, () =>
      withAdvisoryLock(other, 1, async () => 0, { wait: false })
    ).catch((error: unknown) => error);

    expect(isRoleError(roleFailure)).toBe(true);
    expect(isLockUnavailableError(lockFailure)).toBe(true);
    expect(server.holderOf("1")).toBeUndefined();
  });
});
