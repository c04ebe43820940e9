// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/lock-key`
 * Purpose: Deterministic advisory-lock keys from names, integers and int4 pairs.
 * Scope: Pure key derivation and validation. Does not talk to the server.
 * Invariants:
 * - lockKeyFromName(name) = first 8 bytes of SHA-256(UTF-8 name), big-endian, signed int8
 * - The mapping never depends on the server (unlike hashtext()), so it is stable across restarts and major versions
 * - Single keys fit int8; pair keys are two int4 values (the server's two-key lock space is disjoint from int8 keys)
 * Side-effects: none
 * @public
 */

import { createHash } from "node:crypto";

import type { QueryParam } from "./connection";

export type AdvisoryLockKey = string | number | bigint | readonly [number, number];

export interface ResolvedLockKey {
  /** Argument list for pg_advisory_* functions, e.g. `$1::bigint`. */
  placeholders: string;
  params: QueryParam[];
  /** Stable display form used in logs and LockUnavailableError. */
  label: string;
}

const INT8_MIN = -(2n ** 63n);
const INT8_MAX = 2n ** 63n - 1n;
const INT4_MIN = -(2 ** 31);
const INT4_MAX = 2 ** 31 - 1;

export function lockKeyFromName(name: string): bigint {
  if (name.length === 0) {
    throw new RangeError("Advisory lock name must not be empty");
  }
  return createHash("sha256").update(name, "utf8").digest().readBigInt64BE(0);
}

export function resolveLockKey(key: AdvisoryLockKey): ResolvedLockKey {
  if (typeof key === "string") {
    return single(lockKeyFromName(key), `${key} (${lockKeyFromName(key)})`);
  }
  if (typeof key === "number") {
    if (!Number.isSafeInteger(key)) {
      throw new RangeError(`Advisory lock key must be a safe integer: ${key}`);
    }
    return single(BigInt(key), String(key));
  }
  if (typeof key === "bigint") {
    if (key < INT8_MIN || key > INT8_MAX) {
      throw new RangeError(`Advisory lock key out of int8 range: ${key}`);
    }
    return single(key, String(key));
  }
  const [first, second] = key;
  for (const part of key) {
    if (!Number.isInteger(part) || part < INT4_MIN || part > INT4_MAX) {
      throw new RangeError(`Advisory lock key part out of int4 range: ${part}`);
    }
  }
  return {
    placeholders: "$1::integer, $2::integer",
    params: [first, second],
    label: `${first},${second}`,
  };
}

function single(key: bigint, label: string): ResolvedLockKey {
  // Sent as text so the driver never rounds it through a JS number.
  return { placeholders: "$1::bigint", params: [key.toString()], label };
}
