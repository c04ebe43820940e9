// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/tests/admin`
 * Purpose: Unit tests for database and role administration helpers.
 * Scope: Runs against the in-process fake server. Does not require database or network.
 * Invariants: DDL runs in autocommit mode; duplicate/missing objects map to AlreadyExistsError/DoesNotExistError.
 * Side-effects: none
 * Links: src/admin.ts
 * @internal
 */

import { describe, expect, it, vi } from "vitest";

import {
  createDatabase,
  createRole,
  databaseExists,
  dropDatabase,
  dropRole,
  roleExists,
} from "../src/admin";
import { AlreadyExistsError, DoesNotExistError } from "../src/errors";
import { FakeServer, pgError } from "./fakes";

describe("database helpers", () => {
  it("creates a database in autocommit mode and restores the connection mode", async () => {
    const server = new FakeServer();
    const conn = server.connect({ autocommit: false });

    const created = await createDatabase(conn, "reports", {
      owner: "postgres",
      template: "template1",
    });

    expect(created).toBe(true);
    expect(server.databases.has("reports")).toBe(true);
    expect(conn.autocommit).toBe(false);
    expect(conn.calls).toEqual([
      "setAutocommit(true)",
      'CREATE DATABASE "reports" OWNER "postgres" TEMPLATE "template1"',
      "setAutocommit(false)",
    ]);
  });

  it("raises AlreadyExistsError for a duplicate database", async () => {
    const conn = new FakeServer().connect();

    const attempt = createDatabase(conn, "postgres");

    await expect(attempt).rejects.toBeInstanceOf(AlreadyExistsError);
    await expect(attempt).rejects.toMatchObject({
      code: "ALREADY_EXISTS",
      objectType: "database",
      objectName: "postgres",
      message: 'Database "postgres" already exists',
      cause: expect.objectContaining({ code: "42P04" }),
    });
  });

  it("returns false for a duplicate database with ifNotExists", async () => {
    const conn = new FakeServer().connect();
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

    await expect(
      createDatabase(conn, "postgres", { ifNotExists: true, logger })
    ).resolves.toBe(false);
    expect(logger.info).toHaveBeenCalledWith(
      { database: "postgres", reason: "already-exists" },
      "DDL skipped"
    );
  });

  it("drops a database and reports a missing one", async () => {
    const server = new FakeServer();
    server.databases.add("scratch");
    const conn = server.connect({ autocommit: true });

    expect(await dropDatabase(conn, "scratch")).toBe(true);
    expect(await databaseExists(conn, "scratch")).toBe(false);
    await expect(dropDatabase(conn, "scratch")).rejects.toBeInstanceOf(
      DoesNotExistError
    );
    await expect(dropDatabase(conn, "scratch", { ifExists: true })).resolves.toBe(
      false
    );
  });

  it("does not blame the new database for a missing template", async () => {
    const missingTemplate = pgError("3D000", 'template database "tpl" does not exist');
    const conn = new FakeServer()
      .connect()
      .failOn(/^CREATE DATABASE "newdb"/, missingTemplate);

    await expect(
      createDatabase(conn, "newdb", { template: "tpl", ifNotExists: true })
    ).rejects.toBe(missingTemplate);
    expect(conn.autocommit).toBe(false);
  });

  it("checks database existence with a bound parameter", async () => {
    const conn = new FakeServer().connect({ autocommit: true });

    expect(await databaseExists(conn, "template1")).toBe(true);
    expect(conn.calls).toEqual([
      "SELECT EXISTS (SELECT 1 FROM pg_database WHERE datname = $1) AS present",
    ]);
  });
});

describe("role helpers", () => {
  it("builds CREATE ROLE with login, password and memberships", async () => {
    const server = new FakeServer().addRole("readers");
    const conn = server.connect({ autocommit: true });

    await createRole(conn, "report_bot", {
      login: true,
      password: "test-secret's",
      inRoles: ["readers"],
    });

    expect(conn.calls).toEqual([
      "setAutocommit(true)",
      `CREATE ROLE "report_bot" WITH LOGIN PASSWORD 'test-secret''s' IN ROLE "readers"`,
      "setAutocommit(true)",
    ]);
    expect(await roleExists(conn, "report_bot")).toBe(true);
  });

  it("creates a bare role without a WITH clause", async () => {
    const conn = new FakeServer().connect({ autocommit: true });

    await createRole(conn, "nologin_group", { login: false });
    await createRole(conn, "plain");

    expect(conn.calls).toContain('CREATE ROLE "nologin_group" WITH NOLOGIN');
    expect(conn.calls).toContain('CREATE ROLE "plain"');
  });

  it("maps duplicate and missing roles to typed errors", async () => {
    const conn = new FakeServer().addRole("app").connect();

    await expect(createRole(conn, "app")).rejects.toMatchObject({
      name: "AlreadyExistsError",
      message: 'Role "app" already exists',
    });
    await expect(createRole(conn, "app", { ifNotExists: true })).resolves.toBe(false);

    expect(await dropRole(conn, "app")).toBe(true);
    await expect(dropRole(conn, "app")).rejects.toMatchObject({
      name: "DoesNotExistError",
      objectType: "role",
      cause: expect.objectContaining({ code: "42704" }),
    });
    await expect(dropRole(conn, "app", { ifExists: true })).resolves.toBe(false);
  });

  it("does not blame the new role for a missing member role", async () => {
    const missingMember = pgError("42704", 'role "ghost" does not exist');
    const server = new FakeServer();
    const conn = server.connect().failOn(/^CREATE ROLE "app"/, missingMember);

    await expect(createRole(conn, "app", { inRoles: ["ghost"] })).rejects.toBe(
      missingMember
    );
    expect(server.roles.has("app")).toBe(false);
  });

  it("passes unrelated driver errors through unchanged", async () => {
    const failure = Object.assign(new Error("disk full"), { code: "53100" });
    const conn = new FakeServer().connect().failOn(/^CREATE ROLE/, failure);

    await expect(createRole(conn, "app")).rejects.toBe(failure);
    expect(conn.autocommit).toBe(false);
  });
});
