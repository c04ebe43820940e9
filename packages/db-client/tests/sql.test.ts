// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/tests/sql`
 * Purpose: Unit tests for quoting and validated single-row reads.
 * Side-effects: none
 * Links: src/sql.ts
 * @internal
 */

import { describe, expect, it } from "vitest";
import { z } from "zod";

import { queryOne, quoteIdent, quoteLiteral } from "../src/sql";
import { FakeServer } from "./fakes";

describe("quoteIdent", () => {
  it("wraps and doubles embedded quotes", () => {
    expect(quoteIdent("app_user")).toBe('"app_user"');
    expect(quoteIdent('we"ird')).toBe('"we""ird"');
  });

  it("rejects empty names and NUL characters", () => {
    expect(() => quoteIdent("")).toThrow("Identifier must not be empty");
    expect(() => quoteIdent("a\0b")).toThrow(
      "Identifier must not contain NUL characters"
    );
  });
});

describe("quoteLiteral", () => {
  it("wraps and doubles single quotes", () => {
    expect(quoteLiteral("it's")).toBe("'it''s'");
    expect(quoteLiteral("")).toBe("''");
  });
});

describe("queryOne", () => {
  it("parses the first row", async () => {
    const conn = new FakeServer().connect({ autocommit: true });

    const row = await queryOne(
      conn,
      "SELECT current_user AS current_role, session_user AS session_role",
      [],
      z.object({ current_role: z.string() })
    );

    expect(row).toEqual({ current_role: "postgres" });
  });

  it("throws when no row comes back", async () => {
    const conn = new FakeServer().connect({ autocommit: true });

    await expect(
      queryOne(conn, "SELECT 1 WHERE false", [], z.object({}))
    ).rejects.toThrow("Expected one row from: SELECT 1 WHERE false");
  });
});
