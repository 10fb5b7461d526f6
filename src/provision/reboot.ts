// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Duration, Effect, Match, pipe } from "effect";
import type { SystemError, UserAbort } from "../lib/errors.js";
import { logSkip } from "../lib/log.js";
import { Prompter } from "../system/services/prompter.js";
import type { Shell } from "../system/services/shell.js";
import { type ExecutionContext, sh } from "./context.js";
import type { RebootMode } from "./types.js";

export const REBOOT_DELAY: Duration.Duration = Duration.seconds(10);

type RebootEnv = Shell | Prompter | ExecutionContext;

/** The reboot takes the process down with it; its exit code means nothing. */
const reboot: Effect.Effect<void, SystemError, Shell | ExecutionContext> = pipe(
  sh("sudo reboot", { check: false }),
  Effect.catchTag("CommandFailedError", () => Effect.void),
  Effect.asVoid
);

export const finalizeReboot = (
  mode: RebootMode,
  delay: Duration.DurationInput = REBOOT_DELAY
): Effect.Effect<void, UserAbort | SystemError, RebootEnv> =>
  pipe(
    Match.value(mode),
    Match.tag(
      "Suppressed",
      (): Effect.Effect<void, UserAbort | SystemError, RebootEnv> => logSkip("Skipped: reboot.")
    ),
    Match.tag(
      "Prompted",
      (): Effect.Effect<void, UserAbort | SystemError, RebootEnv> =>
        Effect.gen(function* () {
          const prompter = yield* Prompter;
          yield* prompter.acknowledge("Press ENTER to reboot.");
          yield* reboot;
        })
    ),
    Match.tag(
      "Countdown",
      (): Effect.Effect<void, UserAbort | SystemError, RebootEnv> =>
        Effect.gen(function* () {
          const seconds = Math.round(Duration.toSeconds(Duration.decode(delay)));
          yield* Effect.logInfo(`Rebooting in ${seconds} seconds...`);
          yield* Effect.sleep(delay);
          yield* reboot;
        })
    ),
    Match.exhaustive
  );
