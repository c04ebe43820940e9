// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pgscope/db-client/observability/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers. Does not decide what the helpers log.
 * Invariants: Always emits JSON to stdout; silenced under Vitest or NODE_ENV=test. Safe to call at module scope.
 * Side-effects: none
 * Notes: Use makeLogger in applications; helpers default to makeNoopLogger when no logger is injected.
 * Notes: Reads logging-specific env vars directly (NODE_ENV, SERVICE_NAME, and LOG_LEVEL when no config is passed)
 *        without calling loadClientConfig(), so that building a logger never triggers DATABASE_URL validation.
 * Links: redact.ts
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import type { ClientConfig } from "../config";
import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

/** `config.LOG_LEVEL` wins over the LOG_LEVEL variable, so a validated env object sets the level. */
export function makeLogger(
  bindings?: Record<string, unknown>,
  config?: Pick<ClientConfig, "LOG_LEVEL">
): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const logLevel = config?.LOG_LEVEL ?? process.env.LOG_LEVEL ?? "info";
  const serviceName = process.env.SERVICE_NAME ?? "pgscope";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";

  return pino(
    {
      level: logLevel,
      enabled: !isTestTooling,
      // Stable base: bindings first, then reserved keys (prevents overwrite)
      base: { ...bindings, service: serviceName },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    pino.destination({
      dest: 1,
      sync: nodeEnv !== "production",
      minLength: 4096,
    })
  );
}

/**
 * For tests and as the helpers' default - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
