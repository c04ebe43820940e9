// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/cloud`
 * Purpose: Detect managed PostgreSQL platforms from server catalogs.
 * Scope: One catalog query plus predicates. Does not inspect hostnames or environment variables.
 * Invariants: Precedence is aurora > rds > cloudsql > azure > self-hosted (Aurora also exposes rds.* settings).
 * Side-effects: IO (read-only catalog query)
 * @public
 */

import { z } from "zod";

import type { SessionConnection } from "./connection";
import { queryOne } from "./sql";

export type CloudPlatform =
  | "aws-aurora"
  | "aws-rds"
  | "gcp-cloud-sql"
  | "azure"
  | "self-hosted";

const DETECT_SQL = `SELECT
  EXISTS (SELECT 1 FROM pg_proc WHERE proname = 'aurora_version') AS aurora,
  EXISTS (SELECT 1 FROM pg_settings WHERE name LIKE 'rds.%') AS rds,
  EXISTS (SELECT 1 FROM pg_settings WHERE name LIKE 'cloudsql.%') AS cloudsql,
  EXISTS (SELECT 1 FROM pg_settings WHERE name LIKE 'azure.%') AS azure`;

const MarkersRow = z.object({
  aurora: z.boolean(),
  rds: z.boolean(),
  cloudsql: z.boolean(),
  azure: z.boolean(),
});

export async function detectCloudPlatform(
  conn: SessionConnection
): Promise<CloudPlatform> {
  const markers = await queryOne(conn, DETECT_SQL, [], MarkersRow);
  if (markers.aurora) return "aws-aurora";
  if (markers.rds) return "aws-rds";
  if (markers.cloudsql) return "gcp-cloud-sql";
  if (markers.azure) return "azure";
  return "self-hosted";
}

/** Amazon RDS, Aurora included. */
export async function isAwsRds(conn: SessionConnection): Promise<boolean> {
  const platform = await detectCloudPlatform(conn);
  return platform === "aws-rds" || platform === "aws-aurora";
}

export async function isAurora(conn: SessionConnection): Promise<boolean> {
  return (await detectCloudPlatform(conn)) === "aws-aurora";
}

export async function isCloudSql(conn: SessionConnection): Promise<boolean> {
  return (await detectCloudPlatform(conn)) === "gcp-cloud-sql";
}
