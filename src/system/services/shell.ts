// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Shell service using Context.Tag pattern.
 * Wraps src/system/exec.ts so provisioning code can be driven by a
 * recording fake in tests. Dry-run is not handled here; see context.ts.
 */

import { CommandExecutor } from "@effect/platform";
import { Context, Effect, Layer } from "effect";
import type { SystemError } from "../../lib/errors.js";
import {
  type ExecResult,
  type ShellRunOptions,
  commandExists,
  shellCapture,
  shellInteractive,
  shellRun,
} from "../exec.js";

export interface ShellService {
  /** Runs a line with output on the terminal and returns its exit code. */
  readonly run: (line: string, options?: ShellRunOptions) => Effect.Effect<number, SystemError>;
  readonly capture: (line: string) => Effect.Effect<ExecResult, SystemError>;
  /** Hands the terminal to the command until it exits. */
  readonly interactive: (line: string) => Effect.Effect<number, SystemError>;
  readonly commandExists: (name: string) => Effect.Effect<boolean, SystemError>;
}

/**
 * Shell service identifier for Effect dependency injection.
 */
export interface Shell {
  readonly _tag: "Shell";
}

export const Shell: Context.Tag<Shell, ShellService> = Context.GenericTag<Shell, ShellService>(
  "brewblox/Shell"
);

export const ShellLive: Layer.Layer<Shell, never, CommandExecutor.CommandExecutor> = Layer.effect(
  Shell,
  Effect.map(CommandExecutor.CommandExecutor, (executor): ShellService => {
    const provide = Effect.provideService(CommandExecutor.CommandExecutor, executor);
    return {
      run: (line, options) => provide(shellRun(line, options)),
      capture: (line) => provide(shellCapture(line)),
      interactive: (line) => provide(shellInteractive(line)),
      commandExists: (name) => provide(commandExists(name)),
    };
  })
);
