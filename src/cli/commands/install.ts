// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `install`: host dependencies, Brewblox directory, reboot.
 */

import { Effect, Option } from "effect";
import type { GlobalConfig } from "../../config/schema.js";
import type { ConfigError, GeneralError } from "../../lib/errors.js";
import type { StepEnv, StepError } from "../../provision/executor.js";
import { type InstallOptions, runInstall } from "../../provision/install.js";
import { type FlagPair, resolveFlagPair } from "../options.js";
import { resolveRelease, toOptionalUserPath, toUserPath } from "./utils.js";

export interface InstallArgs {
  readonly useDefaults: FlagPair;
  readonly aptInstall: FlagPair;
  readonly dockerInstall: FlagPair;
  readonly dockerUser: FlagPair;
  readonly dir: Option.Option<string>;
  readonly noReboot: boolean;
  readonly release: Option.Option<string>;
  readonly snapshot: Option.Option<string>;
}

export const toInstallOptions = (
  args: InstallArgs,
  globalConfig: GlobalConfig,
  home: string
): Effect.Effect<InstallOptions, GeneralError | ConfigError> =>
  Effect.gen(function* () {
    return {
      useDefaults: yield* resolveFlagPair(args.useDefaults),
      aptInstall: yield* resolveFlagPair(args.aptInstall),
      dockerInstall: yield* resolveFlagPair(args.dockerInstall),
      dockerUser: yield* resolveFlagPair(args.dockerUser),
      dir: yield* toOptionalUserPath(args.dir, home),
      noReboot: args.noReboot,
      release: yield* resolveRelease(args.release, globalConfig.install.release),
      snapshot: yield* toOptionalUserPath(args.snapshot, home),
    };
  });

export const executeInstall = (
  args: InstallArgs,
  globalConfig: GlobalConfig,
  home: string
): Effect.Effect<void, StepError | GeneralError, StepEnv> =>
  Effect.gen(function* () {
    const options = yield* toInstallOptions(args, globalConfig, home);
    const defaultDir = yield* toUserPath(globalConfig.install.directory, home);
    yield* runInstall(options, {
      defaultDir,
      aptDependencies: globalConfig.install.aptDependencies,
    });
  });
