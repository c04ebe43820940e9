// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/sql`
 * Purpose: Identifier/literal quoting and validated single-row reads.
 * Scope: Pure helpers plus one query wrapper. Does not build whole statements.
 * Invariants:
 * - Names are rejected when empty or containing NUL before they reach SQL
 * - Result rows are parsed with zod; a shape mismatch throws instead of returning a guess
 * Side-effects: IO (queryOne only)
 * Notes: SET ROLE, CREATE ROLE ... PASSWORD and CREATE DATABASE do not accept $1
 *        placeholders, so names and passwords are quoted client-side.
 * @internal
 */

import type { z } from "zod";

import type { QueryParam, SessionConnection } from "./connection";

function assertName(name: string, what: string): void {
  if (name.length === 0) {
    throw new Error(`${what} must not be empty`);
  }
  if (name.includes("\0")) {
    throw new Error(`${what} must not contain NUL characters`);
  }
}

/** Double-quote an identifier, doubling embedded quotes. */
export function quoteIdent(name: string): string {
  assertName(name, "Identifier");
  return `"${name.replaceAll('"', '""')}"`;
}

/** Single-quote a string literal, doubling embedded quotes. */
export function quoteLiteral(value: string): string {
  if (value.includes("\0")) {
    throw new Error("Literal must not contain NUL characters");
  }
  return `'${value.replaceAll("'", "''")}'`;
}

/**
 * Run `text` and parse its first row with `schema`.
 * @throws {Error} If the statement returns no rows
 */
export async function queryOne<TSchema extends z.ZodTypeAny>(
  conn: SessionConnection,
  text: string,
  params: readonly QueryParam[],
  schema: TSchema
): Promise<z.infer<TSchema>> {
  const rows = await conn.query(text, params);
  const [first] = rows;
  if (first === undefined) {
    throw new Error(`Expected one row from: ${text}`);
  }
  return schema.parse(first);
}
