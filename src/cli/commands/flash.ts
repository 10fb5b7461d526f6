// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `flash`, `wifi` and `particle`: the flasher container in its three modes.
 */

import { Effect, Option } from "effect";
import type { GlobalConfig } from "../../config/schema.js";
import {
  type FlasherEnv,
  type FlasherError,
  type FlasherOptions,
  runFlasher,
} from "../../firmware/flasher.js";
import type { FlasherMode } from "../../firmware/modes.js";
import type { GeneralError } from "../../lib/errors.js";
import { type FlagPair, resolveFlagPair } from "../options.js";

export interface FlasherArgs {
  readonly release: Option.Option<string>;
  readonly pull: FlagPair;
}

export const toFlasherOptions = (
  mode: FlasherMode,
  args: FlasherArgs,
  globalConfig: GlobalConfig
): Effect.Effect<FlasherOptions, GeneralError> =>
  Effect.map(resolveFlagPair(args.pull), (pull) => ({
    mode,
    release: args.release,
    pull: Option.getOrElse(pull, () => true),
    image: globalConfig.flasher.image,
  }));

export const executeFlasher = (
  mode: FlasherMode,
  args: FlasherArgs,
  globalConfig: GlobalConfig
): Effect.Effect<void, FlasherError | GeneralError, FlasherEnv> =>
  Effect.flatMap(toFlasherOptions(mode, args, globalConfig), runFlasher);
