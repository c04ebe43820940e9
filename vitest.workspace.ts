// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.workspace`
 * Purpose: Vitest workspace for `npm test`: one run over every package and the root project.
 * Scope: Lists the root config and package-local configs. Does not configure tests itself.
 * Invariants:
 *   - Package tests in packages/<pkg>/tests/** only import that package
 *   - Root tests in tests/packages/** import packages through their public entrypoint
 * Side-effects: none
 * Links: vitest.config.mts, packages/db-client/vitest.config.ts
 * @public
 */

import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  "./vitest.config.mts",
  "./packages/*/vitest.config.ts",
]);
