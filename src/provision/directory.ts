// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Brewblox directory initialization: guard, wipe, create, write `.env`.
 * Unmanaged content is never removed; the guard runs before any mutation.
 */

import { join } from "node:path";
import { FileSystem } from "@effect/platform";
import { Effect, Match, pipe } from "effect";
import { CFG_VERSION_INITIAL } from "../config/field-values.js";
import {
  type CommandFailedError,
  DirectoryConflictError,
  ErrorCode,
  SystemError,
  UserAbort,
} from "../lib/errors.js";
import { envFilePath } from "../lib/paths.js";
import type { AbsolutePath, ReleaseTrack } from "../lib/types.js";
import { setEnvKeys } from "../system/dotenv.js";
import { shellEscape } from "../system/exec.js";
import { CFG_VERSION_KEY, RELEASE_KEY, SKIP_CONFIRM_KEY, probeDirectory } from "../system/probe.js";
import { Prompter } from "../system/services/prompter.js";
import type { Shell } from "../system/services/shell.js";
import { type ExecutionContext, mutate, sh } from "./context.js";

export interface InitDirectoryOptions {
  readonly dir: AbsolutePath;
  readonly release: ReleaseTrack;
  /** Wipe a managed directory without asking. */
  readonly force: boolean;
  /** Value persisted as BREWBLOX_SKIP_CONFIRM. */
  readonly skipConfirm: boolean;
}

export type InitDirectoryError =
  | DirectoryConflictError
  | UserAbort
  | CommandFailedError
  | SystemError;

type InitDirectoryEnv = Shell | Prompter | ExecutionContext | FileSystem.FileSystem;

/** `.env` spelling of a boolean, matching what the Brewblox stack reads. */
export const formatFlag = (value: boolean): string => (value ? "True" : "False");

export const persistedConfigEntries = (
  release: ReleaseTrack,
  skipConfirm: boolean
): readonly (readonly [string, string])[] => [
  [RELEASE_KEY, release],
  [CFG_VERSION_KEY, CFG_VERSION_INITIAL],
  [SKIP_CONFIRM_KEY, formatFlag(skipConfirm)],
];

/** Removes every entry, dotfiles included, but keeps the directory itself. */
export const wipeDirectory = (
  dir: AbsolutePath
): Effect.Effect<void, CommandFailedError | SystemError, InitDirectoryEnv> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const entries = yield* fs.readDirectory(dir).pipe(
      Effect.mapError(
        (e) =>
          new SystemError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to list ${dir}: ${e.message}`,
            cause: e,
          })
      )
    );
    if (entries.length > 0) {
      const targets = [...entries]
        .sort()
        .map((entry) => shellEscape(join(dir, entry)))
        .join(" ");
      yield* sh(`sudo rm -rf -- ${targets}`);
    }
  });

export const initDirectory = (
  options: InitDirectoryOptions
): Effect.Effect<void, InitDirectoryError, InitDirectoryEnv> =>
  Effect.gen(function* () {
    const { dir } = options;
    const state = yield* probeDirectory(dir);

    yield* pipe(
      Match.value(state),
      Match.tag(
        "Unmanaged",
        (): Effect.Effect<void, InitDirectoryError, InitDirectoryEnv> =>
          Effect.fail(new DirectoryConflictError({ path: dir }))
      ),
      Match.tag(
        "Managed",
        (): Effect.Effect<void, InitDirectoryError, InitDirectoryEnv> =>
          Effect.gen(function* () {
            const authorized =
              options.force ||
              (yield* Effect.flatMap(Prompter, (p) =>
                p.confirm(
                  `\`${dir}\` already exists. Do you want to continue and erase its content?`,
                  false
                )
              ));
            if (!authorized) {
              return yield* Effect.fail(new UserAbort({ reason: "Aborted: existing directory kept." }));
            }
            yield* wipeDirectory(dir);
          })
      ),
      Match.orElse((): Effect.Effect<void, InitDirectoryError, InitDirectoryEnv> => Effect.void)
    );

    const fs = yield* FileSystem.FileSystem;
    yield* Effect.logInfo(`Creating Brewblox directory \`${dir}\`...`);
    yield* mutate(
      `mkdir -p ${dir}`,
      fs.makeDirectory(dir, { recursive: true }).pipe(
        Effect.mapError(
          (e) =>
            new SystemError({
              code: ErrorCode.DIRECTORY_CREATE_FAILED,
              message: `Failed to create ${dir}: ${e.message}`,
              cause: e,
            })
        )
      )
    );

    const envFile = envFilePath(dir);
    yield* Effect.logInfo("Setting variables in .env file...");
    yield* mutate(
      `update ${envFile}`,
      setEnvKeys(envFile, persistedConfigEntries(options.release, options.skipConfirm))
    );
  });
