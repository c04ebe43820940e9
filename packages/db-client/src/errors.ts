// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/errors`
 * Purpose: Closed error hierarchy for scoped session state and admin helpers, plus driver error translation.
 * Scope: Error definitions, type guards and SQLSTATE mapping. Does not perform I/O or retry anything.
 * Invariants:
 * - Every error extends SessionError and carries a readonly `code` discriminant
 * - translateError never wraps an error it does not recognise
 * - RestorationFailedError keeps both the restore failure (cause) and any body error
 * Side-effects: none
 * Links: scope.ts, admin.ts
 * @public
 */

/** What a scope changed; "session" is the reserved connection held by withSession. */
export type ScopeKind = "autocommit" | "role" | "advisory-lock" | "session";

export type SessionErrorCode =
  | "STATE_CHANGE_FAILED"
  | "RESTORATION_FAILED"
  | "ROLE_ERROR"
  | "ALREADY_EXISTS"
  | "DOES_NOT_EXIST"
  | "LOCK_UNAVAILABLE"
  | "TRANSACTION_IN_PROGRESS"
  | "CONNECTION_RELEASED";

export abstract class SessionError extends Error {
  abstract readonly code: SessionErrorCode;
}

export class StateChangeFailedError extends SessionError {
  public readonly code = "STATE_CHANGE_FAILED" as const;
  constructor(
    public readonly kind: ScopeKind,
    cause: unknown
  ) {
    super(`Failed to apply ${kind} state: ${describe(cause)}`, { cause });
    this.name = "StateChangeFailedError";
  }
}

export class RestorationFailedError extends SessionError {
  public readonly code = "RESTORATION_FAILED" as const;
  /** True when the scope body also failed; the body error is in `bodyError`. */
  public readonly bodyFailed: boolean;
  public readonly bodyError: unknown;

  constructor(
    public readonly kind: ScopeKind,
    cause: unknown,
    body?: { error: unknown }
  ) {
    super(
      body
        ? `Failed to restore ${kind} state (${describe(cause)}) after scope body failed: ${describe(body.error)}`
        : `Failed to restore ${kind} state: ${describe(cause)}`,
      { cause }
    );
    this.name = "RestorationFailedError";
    this.bodyFailed = body !== undefined;
    this.bodyError = body?.error;
  }
}

export class RoleError extends SessionError {
  public readonly code = "ROLE_ERROR" as const;
  constructor(
    public readonly role: string,
    cause: unknown
  ) {
    super(`Cannot switch to role "${role}": ${describe(cause)}`, { cause });
    this.name = "RoleError";
  }
}

export type ObjectType = "database" | "role" | "object";

export interface ObjectRef {
  type: ObjectType;
  name: string;
}

export class AlreadyExistsError extends SessionError {
  public readonly code = "ALREADY_EXISTS" as const;
  constructor(
    public readonly objectType: ObjectType,
    public readonly objectName: string,
    cause?: unknown
  ) {
    super(`${capitalize(objectType)} "${objectName}" already exists`, {
      cause,
    });
    this.name = "AlreadyExistsError";
  }
}

export class DoesNotExistError extends SessionError {
  public readonly code = "DOES_NOT_EXIST" as const;
  constructor(
    public readonly objectType: ObjectType,
    public readonly objectName: string,
    cause?: unknown
  ) {
    super(`${capitalize(objectType)} "${objectName}" does not exist`, {
      cause,
    });
    this.name = "DoesNotExistError";
  }
}

export class LockUnavailableError extends SessionError {
  public readonly code = "LOCK_UNAVAILABLE" as const;
  constructor(public readonly lockKey: string) {
    super(`Advisory lock ${lockKey} is held by another session`);
    this.name = "LockUnavailableError";
  }
}

export class TransactionInProgressError extends SessionError {
  public readonly code = "TRANSACTION_IN_PROGRESS" as const;
  constructor(action: string) {
    super(`Cannot ${action} while a transaction is in progress`);
    this.name = "TransactionInProgressError";
  }
}

export class ConnectionReleasedError extends SessionError {
  public readonly code = "CONNECTION_RELEASED" as const;
  constructor() {
    super("Connection has already been released");
    this.name = "ConnectionReleasedError";
  }
}

// Type guards

export function isSessionError(error: unknown): error is SessionError {
  return error instanceof SessionError;
}

export function isStateChangeFailedError(
  error: unknown
): error is StateChangeFailedError {
  return error instanceof StateChangeFailedError;
}

export function isRestorationFailedError(
  error: unknown
): error is RestorationFailedError {
  return error instanceof RestorationFailedError;
}

export function isRoleError(error: unknown): error is RoleError {
  return error instanceof RoleError;
}

export function isAlreadyExistsError(
  error: unknown
): error is AlreadyExistsError {
  return error instanceof AlreadyExistsError;
}

export function isDoesNotExistError(
  error: unknown
): error is DoesNotExistError {
  return error instanceof DoesNotExistError;
}

export function isLockUnavailableError(
  error: unknown
): error is LockUnavailableError {
  return error instanceof LockUnavailableError;
}

// SQLSTATE translation

const SQLSTATE_RE = /^[0-9A-Z]{5}$/;

export const SqlState = {
  INVALID_PARAMETER_VALUE: "22023",
  INSUFFICIENT_PRIVILEGE: "42501",
  UNDEFINED_OBJECT: "42704",
  DUPLICATE_OBJECT: "42710",
  DUPLICATE_DATABASE: "42P04",
  INVALID_CATALOG_NAME: "3D000",
} as const;

/**
 * SQLSTATE of a server error, if `error` carries one.
 * postgres.js puts it on `PostgresError#code`; its own connection failures
 * use longer codes (`CONNECTION_CLOSED`, ...) and yield undefined here.
 */
export function sqlStateOf(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === "string" && SQLSTATE_RE.test(code) ? code : undefined;
}

/**
 * Map a driver error to AlreadyExistsError / DoesNotExistError.
 * Unrecognised errors are returned as-is so callers can rethrow them.
 */
export function translateError(
  error: unknown,
  target: ObjectRef = { type: "object", name: "unknown" }
): unknown {
  switch (sqlStateOf(error)) {
    case SqlState.DUPLICATE_DATABASE:
    case SqlState.DUPLICATE_OBJECT:
      return new AlreadyExistsError(target.type, target.name, error);
    case SqlState.INVALID_CATALOG_NAME:
    case SqlState.UNDEFINED_OBJECT:
      return new DoesNotExistError(target.type, target.name, error);
    default:
      return error;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
