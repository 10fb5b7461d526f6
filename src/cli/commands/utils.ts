// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Argument conversions shared by command handlers.
 */

import { Effect, Option, pipe } from "effect";
import type { ConfigError, GeneralError } from "../../lib/errors.js";
import { expandHome, toAbsolutePathEffect } from "../../lib/paths.js";
import { type AbsolutePath, type ReleaseTrack, decodeReleaseTrack } from "../../lib/types.js";

/** Expands `~` and resolves against the working directory. */
export const toUserPath = (p: string, home: string): Effect.Effect<AbsolutePath, ConfigError> =>
  toAbsolutePathEffect(expandHome(p, home));

export const toOptionalUserPath = (
  p: Option.Option<string>,
  home: string
): Effect.Effect<Option.Option<AbsolutePath>, ConfigError> =>
  Option.match(p, {
    onNone: (): Effect.Effect<Option.Option<AbsolutePath>, ConfigError> =>
      Effect.succeed(Option.none()),
    onSome: (value): Effect.Effect<Option.Option<AbsolutePath>, ConfigError> =>
      Effect.map(toUserPath(value, home), Option.some),
  });

/** `--release`, else the configured default track. */
export const resolveRelease = (
  cli: Option.Option<string>,
  fallback: ReleaseTrack
): Effect.Effect<ReleaseTrack, GeneralError> =>
  pipe(
    cli,
    Option.match({
      onNone: (): Effect.Effect<ReleaseTrack, GeneralError> => Effect.succeed(fallback),
      onSome: decodeReleaseTrack,
    })
  );
