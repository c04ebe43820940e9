// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/admin`
 * Purpose: Idempotent database and role administration helpers.
 * Scope: CREATE/DROP DATABASE, CREATE/DROP ROLE and existence checks. Does not grant privileges on objects.
 * Invariants:
 * - DDL runs inside withAutocommit(conn, true): CREATE/DROP DATABASE cannot run in a transaction block
 * - CREATE translates only "already exists" and DROP only "does not exist" into typed errors naming the target;
 *   every other driver error (a missing owner, template or member role included) is rethrown unchanged
 * - ifNotExists/ifExists turn the matching error into `false`
 * - Names are quoted with quoteIdent, passwords with quoteLiteral
 * Side-effects: IO (cluster-level DDL)
 * Links: errors.ts, autocommit.ts
 * @public
 */

import { z } from "zod";

import { withAutocommit } from "./autocommit";
import type { LoggerLike, SessionConnection } from "./connection";
import {
  isAlreadyExistsError,
  isDoesNotExistError,
  type ObjectRef,
  translateError,
} from "./errors";
import { queryOne, quoteIdent, quoteLiteral } from "./sql";

interface AdminOptions {
  logger?: LoggerLike;
}

export interface CreateDatabaseOptions extends AdminOptions {
  owner?: string;
  template?: string;
  /** Resolve false instead of throwing AlreadyExistsError. */
  ifNotExists?: boolean;
}

export interface DropOptions extends AdminOptions {
  /** Resolve false instead of throwing DoesNotExistError. */
  ifExists?: boolean;
}

export interface CreateRoleOptions extends AdminOptions {
  login?: boolean;
  password?: string;
  /** Existing roles the new role becomes a member of. */
  inRoles?: readonly string[];
  ifNotExists?: boolean;
}

const PresentRow = z.object({ present: z.boolean() });

type Outcome = "already-exists" | "does-not-exist";

const isOutcome: Record<Outcome, (error: unknown) => boolean> = {
  "already-exists": isAlreadyExistsError,
  "does-not-exist": isDoesNotExistError,
};

/**
 * Run one DDL statement under autocommit.
 * Only the `expected` failure is attributed to `target`: a CREATE that fails on a
 * missing owner, template or member role rethrows the driver error unchanged.
 * Resolves false when `tolerate` swallowed the expected failure.
 */
function runDdl(
  conn: SessionConnection,
  statement: string,
  target: ObjectRef,
  expected: Outcome,
  tolerate: boolean,
  options: AdminOptions
): Promise<boolean> {
  return withAutocommit(
    conn,
    true,
    async (c) => {
      try {
        await c.query(statement);
        return true;
      } catch (error) {
        const translated = translateError(error, target);
        if (!isOutcome[expected](translated)) {
          throw error;
        }
        if (tolerate) {
          options.logger?.info(
            { [target.type]: target.name, reason: expected },
            "DDL skipped"
          );
          return false;
        }
        throw translated;
      }
    },
    { logger: options.logger }
  );
}

/**
 * @throws {AlreadyExistsError} If the database exists and `ifNotExists` is not set
 */
export async function createDatabase(
  conn: SessionConnection,
  name: string,
  options: CreateDatabaseOptions = {}
): Promise<boolean> {
  let statement = `CREATE DATABASE ${quoteIdent(name)}`;
  if (options.owner !== undefined) {
    statement += ` OWNER ${quoteIdent(options.owner)}`;
  }
  if (options.template !== undefined) {
    statement += ` TEMPLATE ${quoteIdent(options.template)}`;
  }
  return runDdl(
    conn,
    statement,
    { type: "database", name },
    "already-exists",
    options.ifNotExists ?? false,
    options
  );
}

/**
 * @throws {DoesNotExistError} If the database is missing and `ifExists` is not set
 */
export async function dropDatabase(
  conn: SessionConnection,
  name: string,
  options: DropOptions = {}
): Promise<boolean> {
  return runDdl(
    conn,
    `DROP DATABASE ${quoteIdent(name)}`,
    { type: "database", name },
    "does-not-exist",
    options.ifExists ?? false,
    options
  );
}

export async function databaseExists(
  conn: SessionConnection,
  name: string
): Promise<boolean> {
  const row = await queryOne(
    conn,
    "SELECT EXISTS (SELECT 1 FROM pg_database WHERE datname = $1) AS present",
    [name],
    PresentRow
  );
  return row.present;
}

/**
 * @throws {AlreadyExistsError} If the role exists and `ifNotExists` is not set
 */
export async function createRole(
  conn: SessionConnection,
  name: string,
  options: CreateRoleOptions = {}
): Promise<boolean> {
  const clauses: string[] = [];
  if (options.login !== undefined) {
    clauses.push(options.login ? "LOGIN" : "NOLOGIN");
  }
  if (options.password !== undefined) {
    clauses.push(`PASSWORD ${quoteLiteral(options.password)}`);
  }
  if (options.inRoles && options.inRoles.length > 0) {
    clauses.push(`IN ROLE ${options.inRoles.map(quoteIdent).join(", ")}`);
  }
  const statement =
    clauses.length > 0
      ? `CREATE ROLE ${quoteIdent(name)} WITH ${clauses.join(" ")}`
      : `CREATE ROLE ${quoteIdent(name)}`;
  return runDdl(
    conn,
    statement,
    { type: "role", name },
    "already-exists",
    options.ifNotExists ?? false,
    options
  );
}

/**
 * @throws {DoesNotExistError} If the role is missing and `ifExists` is not set
 */
export async function dropRole(
  conn: SessionConnection,
  name: string,
  options: DropOptions = {}
): Promise<boolean> {
  return runDdl(
    conn,
    `DROP ROLE ${quoteIdent(name)}`,
    { type: "role", name },
    "does-not-exist",
    options.ifExists ?? false,
    options
  );
}

export async function roleExists(
  conn: SessionConnection,
  name: string
): Promise<boolean> {
  const row = await queryOne(
    conn,
    "SELECT EXISTS (SELECT 1 FROM pg_roles WHERE rolname = $1) AS present",
    [name],
    PresentRow
  );
  return row.present;
}
