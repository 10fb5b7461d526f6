#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * brewblox-ctl: Brewblox host installation and firmware tooling.
 *
 * Main entry point. This is the "imperative shell": the only place where
 * the Effect runtime is executed.
 */

import { NodeContext } from "@effect/platform-node";
import { Effect } from "effect";
import { exitCodeFromExit, logExitError } from "./cli/exit.js";
import { cli } from "./cli/index.js";

const program = (argv: readonly string[]): Effect.Effect<void, unknown> =>
  cli(argv).pipe(Effect.provide(NodeContext.layer));

async function main(): Promise<void> {
  const exit = await Effect.runPromiseExit(program(process.argv));
  logExitError(exit);
  process.exit(exitCodeFromExit(exit));
}

void main();
