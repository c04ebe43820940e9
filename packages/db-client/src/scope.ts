// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/scope`
 * Purpose: Generic scoped session-state change with guaranteed restoration.
 * Scope: Runs enter → body → restore for one StateChange. Does not know what the state is; specializations live in autocommit.ts, role.ts and advisory-lock.ts.
 * Invariants:
 * - If enter() fails the body never runs and restore() is never called
 * - enter() failures surface as StateChangeFailedError unless they are RoleError or LockUnavailableError
 * - Once enter() succeeds, restore() runs exactly once on every exit path, abort included
 * - A body error is never dropped: it is rethrown as-is, or carried as `bodyError` when restore also fails
 * - On abort, restore() completes before the returned promise rejects
 * Side-effects: IO (whatever the StateChange issues)
 * Notes: Cancellation is an AbortSignal. The body receives the scope signal and should stop using the
 *        connection once it aborts; the scope stops waiting for it and restores immediately.
 * Links: errors.ts
 * @public
 */

import type { LoggerLike } from "./connection";
import {
  LockUnavailableError,
  RestorationFailedError,
  RoleError,
  type ScopeKind,
  StateChangeFailedError,
} from "./errors";
import { makeNoopLogger } from "./observability/logger";

export type ScopeState =
  | "unentered"
  | "active"
  | "restored"
  | "restored-with-error"
  | "failed-to-enter";

/**
 * One kind of transient session state.
 * `enter` applies the target value and returns whatever `restore` needs to undo it.
 */
export interface StateChange<TConn, TSaved> {
  readonly kind: ScopeKind;
  /** Bound into every log line of the scope. */
  readonly describe?: Record<string, unknown>;
  enter(conn: TConn): Promise<TSaved>;
  restore(conn: TConn, saved: TSaved): Promise<void>;
}

export type ScopeBody<TConn, TResult> = (
  conn: TConn,
  signal: AbortSignal
) => Promise<TResult>;

export interface ScopeOptions {
  /** Aborting rejects the scope with `signal.reason`, after restoration. */
  signal?: AbortSignal;
  logger?: LoggerLike;
  onStateChange?: (state: ScopeState) => void;
}

type BodyOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

let defaultLogger: LoggerLike | undefined;

function resolveLogger(logger: LoggerLike | undefined): LoggerLike {
  if (logger) return logger;
  defaultLogger ??= makeNoopLogger();
  return defaultLogger;
}

/**
 * Apply `change`, run `body` with the connection, then restore the prior state.
 *
 * @throws {StateChangeFailedError} If entering failed (or the specialization's own SessionError)
 * @throws {RestorationFailedError} If restoring failed; `bodyError` holds the body failure, if any
 */
export async function runScoped<TConn, TSaved, TResult>(
  conn: TConn,
  change: StateChange<TConn, TSaved>,
  body: ScopeBody<TConn, TResult>,
  options: ScopeOptions = {}
): Promise<TResult> {
  const { signal, onStateChange } = options;
  const log = resolveLogger(options.logger);
  const fields = { scope: change.kind, ...change.describe };

  signal?.throwIfAborted();

  let saved: TSaved;
  try {
    saved = await change.enter(conn);
  } catch (error) {
    onStateChange?.("failed-to-enter");
    log.warn({ ...fields, err: error }, "scope enter failed");
    throw isEnterError(error)
      ? error
      : new StateChangeFailedError(change.kind, error);
  }
  onStateChange?.("active");
  log.debug(fields, "scope entered");

  const outcome = await runBody(conn, body, signal, log, fields);

  try {
    await change.restore(conn, saved);
  } catch (restoreError) {
    onStateChange?.("restored-with-error");
    log.error(
      {
        ...fields,
        err: restoreError,
        bodyError: outcome.ok ? undefined : outcome.error,
      },
      "scope restore failed"
    );
    throw new RestorationFailedError(
      change.kind,
      restoreError,
      outcome.ok ? undefined : { error: outcome.error }
    );
  }
  onStateChange?.("restored");
  log.debug(fields, "scope restored");

  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}

/** Errors a specialization raises on purpose from enter(); anything else is wrapped. */
function isEnterError(error: unknown): boolean {
  return (
    error instanceof StateChangeFailedError ||
    error instanceof RoleError ||
    error instanceof LockUnavailableError
  );
}

async function runBody<TConn, TResult>(
  conn: TConn,
  body: ScopeBody<TConn, TResult>,
  signal: AbortSignal | undefined,
  log: LoggerLike,
  fields: Record<string, unknown>
): Promise<BodyOutcome<TResult>> {
  // Aborted while enter() was in flight: skip the body, restore right away.
  if (signal?.aborted) {
    return { ok: false, error: signal.reason };
  }
  try {
    const pending = body(conn, signal ?? new AbortController().signal);
    const value = signal
      ? await untilAborted(pending, signal, log, fields)
      : await pending;
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error };
  }
}

function untilAborted<T>(
  pending: Promise<T>,
  signal: AbortSignal,
  log: LoggerLike,
  fields: Record<string, unknown>
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      // The body keeps running on its own; record how it ends.
      void pending.then(
        () => log.debug(fields, "scope body settled after abort"),
        (error: unknown) =>
          log.debug({ ...fields, err: error }, "scope body failed after abort")
      );
      reject(signal.reason);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    void pending.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}
