// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/advisory-lock`
 * Purpose: Session-level PostgreSQL advisory locks, scoped or manual.
 * Scope: Acquire/release via pg_advisory_* functions and the withAdvisoryLock scope. Does not provide cross-connection mutual exclusion of its own.
 * Invariants:
 * - wait=true blocks in pg_advisory_lock until granted; wait=false fails fast with LockUnavailableError
 * - Lock and unlock run on the same session (session-scoped locks only release on the connection that acquired them)
 * - An unlock that reports false (lock not held) is a restoration failure, not a silent no-op
 * Side-effects: IO (database advisory lock)
 * Links: lock-key.ts, scope.ts
 * @public
 */

import { z } from "zod";

import type { SessionConnection } from "./connection";
import { LockUnavailableError } from "./errors";
import {
  type AdvisoryLockKey,
  type ResolvedLockKey,
  resolveLockKey,
} from "./lock-key";
import { runScoped, type ScopeBody, type ScopeOptions } from "./scope";
import { queryOne } from "./sql";

export interface AdvisoryLockOptions {
  /** Block until the lock is granted (default true). */
  wait?: boolean;
  /** Take the shared variant instead of the exclusive one (default false). */
  shared?: boolean;
}

const AcquiredRow = z.object({ acquired: z.boolean() });
const ReleasedRow = z.object({ released: z.boolean() });

function lockFn(base: string, shared: boolean | undefined): string {
  return shared ? `${base}_shared` : base;
}

async function acquire(
  conn: SessionConnection,
  key: ResolvedLockKey,
  options: AdvisoryLockOptions
): Promise<void> {
  if (options.wait ?? true) {
    await conn.query(
      `SELECT ${lockFn("pg_advisory_lock", options.shared)}(${key.placeholders})`,
      key.params
    );
    return;
  }
  const acquired = await tryAcquire(conn, key, options.shared);
  if (!acquired) {
    throw new LockUnavailableError(key.label);
  }
}

async function tryAcquire(
  conn: SessionConnection,
  key: ResolvedLockKey,
  shared: boolean | undefined
): Promise<boolean> {
  const row = await queryOne(
    conn,
    `SELECT ${lockFn("pg_try_advisory_lock", shared)}(${key.placeholders}) AS acquired`,
    key.params,
    AcquiredRow
  );
  return row.acquired;
}

async function release(
  conn: SessionConnection,
  key: ResolvedLockKey,
  shared: boolean | undefined
): Promise<boolean> {
  const row = await queryOne(
    conn,
    `SELECT ${lockFn("pg_advisory_unlock", shared)}(${key.placeholders}) AS released`,
    key.params,
    ReleasedRow
  );
  return row.released;
}

/** Try once to take the lock; resolves false when another session holds it. */
export async function tryAcquireAdvisoryLock(
  conn: SessionConnection,
  key: AdvisoryLockKey,
  options: Pick<AdvisoryLockOptions, "shared"> = {}
): Promise<boolean> {
  return tryAcquire(conn, resolveLockKey(key), options.shared);
}

/** Release a lock taken on this session; resolves false when it was not held. */
export async function releaseAdvisoryLock(
  conn: SessionConnection,
  key: AdvisoryLockKey,
  options: Pick<AdvisoryLockOptions, "shared"> = {}
): Promise<boolean> {
  return release(conn, resolveLockKey(key), options.shared);
}

/**
 * Run `fn` while holding the advisory lock for `key`, releasing it afterwards.
 *
 * @throws {LockUnavailableError} If `wait` is false and the lock is held elsewhere
 */
export function withAdvisoryLock<TConn extends SessionConnection, T>(
  conn: TConn,
  key: AdvisoryLockKey,
  fn: ScopeBody<TConn, T>,
  options: AdvisoryLockOptions & ScopeOptions = {}
): Promise<T> {
  const { wait, shared, ...scopeOptions } = options;

  return runScoped(
    conn,
    {
      kind: "advisory-lock",
      describe: { lockKey: typeof key === "string" ? key : String(key) },
      async enter(c) {
        const resolved = resolveLockKey(key);
        await acquire(c, resolved, { wait, shared });
        return resolved;
      },
      async restore(c, resolved) {
        const released = await release(c, resolved, shared);
        if (!released) {
          throw new Error(
            `Advisory lock ${resolved.label} was not held at release`
          );
        }
      },
    },
    fn,
    scopeOptions
  );
}
