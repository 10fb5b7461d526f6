// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Installation decision engine.
 *
 * Precedence per capability: already satisfied > explicit flag >
 * use-defaults > operator prompt. `decide` is the pure half; the
 * `resolve*` functions add logging and prompting. Nothing in this module
 * mutates the host.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Match, Option, pipe } from "effect";
import { DirectoryConflictError, type SystemError, UserAbort } from "../lib/errors.js";
import type { AbsolutePath } from "../lib/types.js";
import { probeDirectory } from "../system/probe.js";
import { Prompter } from "../system/services/prompter.js";
import { type CapabilityRequest, Decision, RebootMode } from "./types.js";

export const decide = (request: CapabilityRequest, useDefaults: boolean): Decision => {
  if (request.alreadySatisfied) {
    return Decision.AlreadySatisfied();
  }
  return Option.match(request.override, {
    onSome: (value): Decision => Decision.Explicit({ value }),
    onNone: (): Decision =>
      useDefaults ? Decision.Defaulted() : Decision.Ask({ prompt: request.prompt }),
  });
};

export const resolveCapability = (
  request: CapabilityRequest,
  useDefaults: boolean
): Effect.Effect<boolean, UserAbort, Prompter> =>
  pipe(
    Match.value(decide(request, useDefaults)),
    Match.tag("AlreadySatisfied", () =>
      Effect.as(
        Effect.forEach(request.satisfiedNotice, (line) => Effect.logInfo(line), { discard: true }),
        false
      )
    ),
    Match.tag("Explicit", ({ value }) => Effect.succeed(value)),
    Match.tag("Defaulted", () => Effect.succeed(true)),
    Match.tag("Ask", ({ prompt }) => Effect.flatMap(Prompter, (p) => p.confirm(prompt))),
    Match.exhaustive
  );

export const resolveUseDefaults = (
  override: Option.Option<boolean>
): Effect.Effect<boolean, UserAbort, Prompter> =>
  Option.match(override, {
    onSome: (value): Effect.Effect<boolean, UserAbort, Prompter> => Effect.succeed(value),
    onNone: (): Effect.Effect<boolean, UserAbort, Prompter> =>
      Effect.flatMap(Prompter, (p) => p.confirm("Do you want to install with default settings?")),
  });

export interface DirectorySelection {
  /** `--dir`, already resolved to an absolute path. */
  readonly explicit: Option.Option<AbsolutePath>;
  readonly defaultDir: AbsolutePath;
  readonly useDefaults: boolean;
}

const requireYes =
  (reason: string) =>
  (accepted: boolean): Effect.Effect<void, UserAbort> =>
    accepted ? Effect.void : Effect.fail(new UserAbort({ reason }));

/**
 * Picks the target directory and settles, before any mutation, whether
 * it may be used: unmanaged content is refused outright, existing
 * content needs the operator's consent to be erased.
 */
export const resolveDirectory = (
  selection: DirectorySelection
): Effect.Effect<
  AbsolutePath,
  UserAbort | DirectoryConflictError | SystemError,
  Prompter | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const prompter = yield* Prompter;

    const dir = yield* Option.match(selection.explicit, {
      onSome: (explicit): Effect.Effect<AbsolutePath, UserAbort> => Effect.succeed(explicit),
      onNone: (): Effect.Effect<AbsolutePath, UserAbort> =>
        selection.useDefaults
          ? Effect.succeed(selection.defaultDir)
          : pipe(
              prompter.confirm(
                `The default directory is '${selection.defaultDir}'. Do you want to continue?`
              ),
              Effect.flatMap(requireYes("Aborted: no directory selected.")),
              Effect.as(selection.defaultDir)
            ),
    });

    const state = yield* probeDirectory(dir);
    yield* pipe(
      Match.value(state),
      Match.tag(
        "Unmanaged",
        (): Effect.Effect<void, UserAbort | DirectoryConflictError> =>
          Effect.fail(new DirectoryConflictError({ path: dir }))
      ),
      Match.tag("Absent", (): Effect.Effect<void, UserAbort | DirectoryConflictError> => Effect.void),
      Match.orElse(
        (): Effect.Effect<void, UserAbort | DirectoryConflictError> =>
          pipe(
            prompter.confirm(
              `The \`${dir}\` directory already exists. ` +
                "Do you want to continue and erase the current contents?",
              false
            ),
            Effect.flatMap(requireYes("Aborted: existing directory kept."))
          )
      )
    );

    return dir;
  });

export const resolveRebootMode = (
  noReboot: boolean,
  useDefaults: boolean
): Effect.Effect<RebootMode, UserAbort, Prompter> => {
  if (noReboot) {
    return Effect.succeed(RebootMode.Suppressed());
  }
  if (useDefaults) {
    return Effect.succeed(RebootMode.Countdown());
  }
  return Effect.map(
    Effect.flatMap(Prompter, (p) =>
      p.confirm(
        "A reboot is required after installation. " +
          "Do you want to be prompted before that happens?"
      )
    ),
    (prompted): RebootMode => (prompted ? RebootMode.Prompted() : RebootMode.Countdown())
  );
};
