// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client`
 * Purpose: Public surface: scoped session-state helpers, admin helpers, cloud detection, errors, client factories.
 * Scope: Re-exports only. Does not contain implementation logic.
 * Invariants:
 * - FORBIDDEN: process.env reads outside config.ts and observability/logger.ts
 * - sql.ts quoting helpers stay internal
 * Side-effects: none (re-exports only)
 * @public
 */

export {
  createDatabase,
  createRole,
  databaseExists,
  dropDatabase,
  dropRole,
  roleExists,
} from "./admin";
export type { CreateDatabaseOptions, CreateRoleOptions, DropOptions } from "./admin";
export {
  releaseAdvisoryLock,
  tryAcquireAdvisoryLock,
  withAdvisoryLock,
} from "./advisory-lock";
export type { AdvisoryLockOptions } from "./advisory-lock";
export { withAutocommit } from "./autocommit";
export { createSqlClient, openSession, withSession } from "./client";
export type {
  ReservingClient,
  Session,
  SessionOptions,
  SqlClientConfig,
} from "./client";
export { detectCloudPlatform, isAurora, isAwsRds, isCloudSql } from "./cloud";
export type { CloudPlatform } from "./cloud";
export { loadClientConfig } from "./config";
export type { ClientConfig } from "./config";
export type {
  LoggerLike,
  QueryParam,
  Row,
  SessionConnection,
} from "./connection";
export {
  AlreadyExistsError,
  ConnectionReleasedError,
  DoesNotExistError,
  isAlreadyExistsError,
  isDoesNotExistError,
  isLockUnavailableError,
  isRestorationFailedError,
  isRoleError,
  isSessionError,
  isStateChangeFailedError,
  LockUnavailableError,
  RestorationFailedError,
  RoleError,
  SessionError,
  SqlState,
  sqlStateOf,
  StateChangeFailedError,
  TransactionInProgressError,
  translateError,
} from "./errors";
export type {
  ObjectRef,
  ObjectType,
  ScopeKind,
  SessionErrorCode,
} from "./errors";
export { lockKeyFromName, resolveLockKey } from "./lock-key";
export type { AdvisoryLockKey, ResolvedLockKey } from "./lock-key";
export { LoggingConnection } from "./logging-connection";
export { makeLogger, makeNoopLogger } from "./observability/logger";
export type { Logger } from "./observability/logger";
export { REDACT_PATHS, redactSql } from "./observability/redact";
export { PostgresSessionConnection } from "./postgres-connection";
export type {
  PostgresSessionOptions,
  ReservedConnection,
} from "./postgres-connection";
export { getCurrentRole, withRole } from "./role";
export type { CurrentRole } from "./role";
export { runScoped } from "./scope";
export type { ScopeBody, ScopeOptions, ScopeState, StateChange } from "./scope";
