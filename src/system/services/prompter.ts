// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Interactive questions for the operator, backed by @effect/cli Prompt.
 * Ctrl-C inside any prompt surfaces as UserAbort, same as answering "no"
 * to a blocking question.
 */

import { Prompt } from "@effect/cli";
import { Terminal } from "@effect/platform";
import { Context, Effect, Layer } from "effect";
import { UserAbort } from "../../lib/errors.js";

export interface Choice<A> {
  readonly title: string;
  readonly value: A;
  readonly description?: string;
}

export interface PrompterService {
  readonly confirm: (message: string, initial?: boolean) => Effect.Effect<boolean, UserAbort>;
  readonly select: <A>(
    message: string,
    choices: readonly [Choice<A>, ...Choice<A>[]]
  ) => Effect.Effect<A, UserAbort>;
  /** Blocks until the operator presses ENTER. */
  readonly acknowledge: (message: string) => Effect.Effect<void, UserAbort>;
}

export interface Prompter {
  readonly _tag: "Prompter";
}

export const Prompter: Context.Tag<Prompter, PrompterService> = Context.GenericTag<
  Prompter,
  PrompterService
>("brewblox/Prompter");

const interrupted = (): UserAbort => new UserAbort({ reason: "Interrupted." });

export const PrompterLive: Layer.Layer<Prompter, never, Terminal.Terminal> = Layer.effect(
  Prompter,
  Effect.map(Terminal.Terminal, (terminal): PrompterService => {
    const ask = <A>(prompt: Prompt.Prompt<A>): Effect.Effect<A, UserAbort> =>
      Prompt.run(prompt).pipe(
        Effect.provideService(Terminal.Terminal, terminal),
        Effect.mapError(interrupted)
      );

    return {
      confirm: (message, initial = true) => ask(Prompt.confirm({ message, initial })),
      select: (message, choices) => ask(Prompt.select({ message, choices })),
      acknowledge: (message) => Effect.asVoid(ask(Prompt.text({ message }))),
    };
  })
);
