// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/tests/lock-key`
 * Purpose: Unit tests for advisory-lock key derivation.
 * Scope: Pure functions only.
 * Invariants: name → key mapping is SHA-256 based and fixed across processes.
 * Side-effects: none
 * Links: src/lock-key.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { lockKeyFromName, resolveLockKey } from "../src/lock-key";

describe("lockKeyFromName", () => {
  it("maps names to fixed signed int8 keys", () => {
    expect(lockKeyFromName("jobs:nightly-report")).toBe(-1066409248671000457n);
    expect(lockKeyFromName("migrations")).toBe(-3058229681751119483n);
  });

  it("hashes the UTF-8 encoding of the name", () => {
    expect(lockKeyFromName("ü-lock")).toBe(-5995438875028727196n);
  });

  it("rejects an empty name", () => {
    expect(() => lockKeyFromName("")).toThrow(RangeError);
  });
});

describe("resolveLockKey", () => {
  it("sends string-derived keys as bigint text", () => {
    expect(resolveLockKey("migrations")).toEqual({
      placeholders: "$1::bigint",
      params: ["-3058229681751119483"],
      label: "migrations (-3058229681751119483)",
    });
  });

  it("accepts safe integers and bigints", () => {
    expect(resolveLockKey(42)).toEqual({
      placeholders: "$1::bigint",
      params: ["42"],
      label: "42",
    });
    expect(resolveLockKey(9223372036854775807n).params).toEqual([
      "9223372036854775807",
    ]);
  });

  it("accepts an int4 pair", () => {
    expect(resolveLockKey([7, -3])).toEqual({
      placeholders: "$1::integer, $2::integer",
      params: [7, -3],
      label: "7,-3",
    });
  });

  it.each<[string, number | bigint]>([
    ["an unsafe number", 2 ** 60],
    ["a fraction", 1.5],
    ["a bigint above int8", 9223372036854775808n],
  ])("rejects %s", (_label, key) => {
    expect(() => resolveLockKey(key)).toThrow(RangeError);
  });

  it("rejects pair parts outside int4", () => {
    expect(() => resolveLockKey([2 ** 31, 0])).toThrow(
      "Advisory lock key part out of int4 range: 2147483648"
    );
  });
});
