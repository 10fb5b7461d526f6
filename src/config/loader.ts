// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * TOML configuration loading with fail-fast validation. Files are
 * parsed and validated in a single pass; syntax errors and schema
 * violations are reported with the file path. The global config is
 * searched in several places (/etc, ~/.config, ./), but an explicit
 * path fails on any error to catch typos and permission issues.
 */

import { FileSystem } from "@effect/platform";
import { Config, Effect, Option, type Schema, pipe } from "effect";
import { parse as parseToml } from "smol-toml";
import { ConfigError, ErrorCode, SystemError, errorMessage } from "../lib/errors.js";
import { SYSTEM_PATHS, toAbsolutePathEffect, userConfigPath } from "../lib/paths.js";
import { decodeToEffect, decodeUnsafe } from "../lib/schema-utils.js";
import type { AbsolutePath } from "../lib/types.js";
import { type GlobalConfig, globalConfigSchema } from "./schema.js";

export const loadTomlFile = <A, I = A>(
  filePath: AbsolutePath,
  schema: Schema.Schema<A, I, never>
): Effect.Effect<A, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    yield* pipe(
      fs.exists(filePath),
      Effect.orElseSucceed(() => false),
      Effect.filterOrFail(
        (exists): exists is true => exists,
        () =>
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Configuration file not found: ${filePath}`,
            path: filePath,
          })
      )
    );

    const content = yield* fs.readFileString(filePath).pipe(
      Effect.mapError(
        (e) =>
          new SystemError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to read ${filePath}: ${e.message}`,
            cause: e,
          })
      )
    );

    const parsed = yield* Effect.try({
      try: (): unknown => parseToml(content),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Failed to parse TOML in ${filePath}: ${errorMessage(e)}`,
          path: filePath,
          ...(e instanceof Error ? { cause: e } : {}),
        }),
    });

    return yield* decodeToEffect(schema, parsed, filePath);
  });

export const defaultGlobalConfig = (): GlobalConfig => decodeUnsafe(globalConfigSchema, {});

export const globalConfigSearchPaths = (home: string): readonly string[] => [
  SYSTEM_PATHS.globalConfig,
  userConfigPath(home),
  "./brewblox-ctl.toml",
];

export const loadGlobalConfigWithHome = (
  configPath: AbsolutePath | undefined,
  home: string
): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem> => {
  const tryLoadPath = (
    p: string
  ): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
    Effect.flatMap(toAbsolutePathEffect(p), (absPath) => loadTomlFile(absPath, globalConfigSchema));

  // Explicit path: fail on any error; otherwise first readable default wins
  return pipe(
    Option.fromNullable(configPath),
    Option.match({
      onNone: (): Effect.Effect<GlobalConfig, never, FileSystem.FileSystem> =>
        pipe(
          Effect.firstSuccessOf(globalConfigSearchPaths(home).map(tryLoadPath)),
          Effect.orElseSucceed(defaultGlobalConfig)
        ),
      onSome: (
        path
      ): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
        tryLoadPath(path),
    })
  );
};

/** Returns default values if no config file is found. */
export const loadGlobalConfig = (
  configPath?: AbsolutePath
): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    // Config.withDefault ensures this never fails, so orDie is safe
    const home = yield* Config.string("HOME").pipe(Config.withDefault("/root"), Effect.orDie);
    return yield* loadGlobalConfigWithHome(configPath, home);
  });
