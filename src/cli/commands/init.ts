// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `init`: create (or re-create) a Brewblox directory. Also reached from
 * `install`, which calls initDirectory directly.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import type { GlobalConfig } from "../../config/schema.js";
import type { ConfigError, GeneralError } from "../../lib/errors.js";
import type { ExecutionContext } from "../../provision/context.js";
import {
  type InitDirectoryError,
  type InitDirectoryOptions,
  initDirectory,
} from "../../provision/directory.js";
import type { Prompter } from "../../system/services/prompter.js";
import type { Shell } from "../../system/services/shell.js";
import { type FlagPair, resolveFlagPair } from "../options.js";
import { resolveRelease, toUserPath } from "./utils.js";

export interface InitArgs {
  readonly dir: Option.Option<string>;
  readonly release: Option.Option<string>;
  readonly force: boolean;
  readonly skipConfirm: FlagPair;
}

export const toInitOptions = (
  args: InitArgs,
  globalConfig: GlobalConfig,
  home: string
): Effect.Effect<InitDirectoryOptions, GeneralError | ConfigError> =>
  Effect.gen(function* () {
    const skipConfirm = yield* resolveFlagPair(args.skipConfirm);
    return {
      dir: yield* toUserPath(
        Option.getOrElse(args.dir, () => globalConfig.install.directory),
        home
      ),
      release: yield* resolveRelease(args.release, globalConfig.install.release),
      force: args.force,
      skipConfirm: Option.getOrElse(skipConfirm, () => false),
    };
  });

export const executeInit = (
  args: InitArgs,
  globalConfig: GlobalConfig,
  home: string
): Effect.Effect<
  void,
  InitDirectoryError | GeneralError | ConfigError,
  Shell | Prompter | ExecutionContext | FileSystem.FileSystem
> => Effect.flatMap(toInitOptions(args, globalConfig, home), initDirectory);
