// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Per-invocation execution mode and the helpers that honor it.
 * Every host mutation goes through `sh` or `mutate`, so dry-run and
 * verbose behave the same for shell lines and file writes.
 */

import { Context, Effect, Match, pipe } from "effect";
import { CommandFailedError, type SystemError, UserAbort } from "../lib/errors.js";
import { Prompter } from "../system/services/prompter.js";
import { Shell } from "../system/services/shell.js";

export interface ExecutionContextValue {
  readonly dryRun: boolean;
  readonly verbose: boolean;
  /** `--yes` or BREWBLOX_SKIP_CONFIRM: the confirm gate passes silently. */
  readonly skipConfirm: boolean;
}

/**
 * ExecutionContext tag identifier type.
 */
export interface ExecutionContext {
  readonly _tag: "ExecutionContext";
}

export const ExecutionContext: Context.Tag<ExecutionContext, ExecutionContextValue> =
  Context.GenericTag<ExecutionContext, ExecutionContextValue>("brewblox/ExecutionContext");

type GateAnswer = "yes" | "no" | "verbose" | "dry-run";

/**
 * Asks once, before a command touches the host, whether to go ahead.
 * Returns the (possibly adjusted) context the command should run under.
 */
export const confirmMode = (
  ctx: ExecutionContextValue
): Effect.Effect<ExecutionContextValue, UserAbort, Prompter> =>
  ctx.skipConfirm || ctx.dryRun || ctx.verbose
    ? Effect.succeed(ctx)
    : Effect.gen(function* () {
        const prompter = yield* Prompter;
        const answer = yield* prompter.select<GateAnswer>("Do you want to continue?", [
          { title: "yes", value: "yes" },
          { title: "no", value: "no" },
          { title: "verbose", value: "verbose", description: "Show every command before it runs" },
          { title: "dry-run", value: "dry-run", description: "Show commands without running them" },
        ]);
        return yield* pipe(
          Match.value(answer),
          Match.when(
            "yes",
            (): Effect.Effect<ExecutionContextValue, UserAbort> => Effect.succeed(ctx)
          ),
          Match.when(
            "no",
            (): Effect.Effect<ExecutionContextValue, UserAbort> =>
              Effect.fail(new UserAbort({ reason: "Aborted." }))
          ),
          Match.when(
            "verbose",
            (): Effect.Effect<ExecutionContextValue, UserAbort> =>
              Effect.succeed({ ...ctx, verbose: true })
          ),
          Match.when(
            "dry-run",
            (): Effect.Effect<ExecutionContextValue, UserAbort> =>
              Effect.succeed({ ...ctx, dryRun: true })
          ),
          Match.exhaustive
        );
      });

export interface ShOptions {
  /** Fail with CommandFailedError on a non-zero exit. Defaults to true. */
  readonly check?: boolean;
  readonly stdin?: string;
}

const announce = (ctx: ExecutionContextValue, text: string): Effect.Effect<void> =>
  pipe(
    Match.value(ctx),
    Match.when({ dryRun: true }, () => Effect.logInfo(`DRY RUN: ${text}`)),
    Match.when({ verbose: true }, () => Effect.logInfo(`$ ${text}`)),
    Match.orElse(() => Effect.logDebug(`$ ${text}`))
  );

/**
 * Runs a host-mutating shell line. Under dry-run the line is only logged
 * and reported as exit code 0.
 */
export const sh = (
  line: string,
  options: ShOptions = {}
): Effect.Effect<number, CommandFailedError | SystemError, Shell | ExecutionContext> =>
  Effect.gen(function* () {
    const ctx = yield* ExecutionContext;
    yield* announce(ctx, line);
    if (ctx.dryRun) {
      return 0;
    }

    const shell = yield* Shell;
    const exitCode = yield* shell.run(line, options.stdin !== undefined ? { stdin: options.stdin } : {});
    if ((options.check ?? true) && exitCode !== 0) {
      return yield* Effect.fail(new CommandFailedError({ command: line, exitCode }));
    }
    return exitCode;
  });

/** Like `sh` with `check: false`, but the command also owns stdin. */
export const shInteractive = (
  line: string
): Effect.Effect<number, SystemError, Shell | ExecutionContext> =>
  Effect.gen(function* () {
    const ctx = yield* ExecutionContext;
    yield* announce(ctx, line);
    if (ctx.dryRun) {
      return 0;
    }
    const shell = yield* Shell;
    return yield* shell.interactive(line);
  });

/** Guards a file-system write the same way `sh` guards a shell line. */
export const mutate = <E, R>(
  description: string,
  effect: Effect.Effect<void, E, R>
): Effect.Effect<void, E, R | ExecutionContext> =>
  Effect.gen(function* () {
    const ctx = yield* ExecutionContext;
    yield* announce(ctx, description);
    if (!ctx.dryRun) {
      yield* effect;
    }
  });
