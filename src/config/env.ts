// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * All exports are pure Config<A> values; nothing is read from the
 * environment until they are yielded at the CLI boundary.
 */

import { Config, ConfigProvider, Option } from "effect";
import {
  LOG_FORMAT_VALUES,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
} from "./field-values.js";

// ============================================================================
// Primitive Configs
// ============================================================================

/**
 * HOME directory from environment.
 * Falls back to /root if not set (common in containerized environments).
 */
export const HomeConfig: Config.Config<string> = Config.string("HOME").pipe(
  Config.withDefault("/root")
);

/** Login name used for docker group membership. */
export const UserConfig: Config.Config<Option.Option<string>> = Config.option(
  Config.string("USER")
);

/**
 * Log level with BREWBLOX_ namespace. None when unset so the CLI can tell
 * "not given" apart from "given as the default".
 */
export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = Config.nested(
  Config.option(Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL")),
  "BREWBLOX"
);

export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = Config.nested(
  Config.option(Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT")),
  "BREWBLOX"
);

/**
 * Debug mode flag with BREWBLOX_ namespace.
 * When true, forces log level to debug.
 */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  "BREWBLOX"
);

const TRUTHY_VALUES: ReadonlySet<string> = new Set(["true", "yes", "on", "1", "y"]);

/** Case-insensitive, since `.env` files store the flag as `True`/`False`. */
export const isTruthy = (value: string): boolean => TRUTHY_VALUES.has(value.trim().toLowerCase());

/** Same meaning as `--yes`: every confirm gate passes without asking. */
export const SkipConfirmConfig: Config.Config<boolean> = Config.nested(
  Config.string("SKIP_CONFIRM").pipe(Config.map(isTruthy), Config.withDefault(false)),
  "BREWBLOX"
);

/** Release track exported by a running Brewblox shell environment. */
export const ReleaseOptionConfig: Config.Config<Option.Option<string>> = Config.nested(
  Config.option(Config.nonEmptyString("RELEASE")),
  "BREWBLOX"
);

// ============================================================================
// Test Utilities
// ============================================================================

const envVarNames = {
  home: "HOME",
  user: "USER",
  logLevel: "BREWBLOX_LOG_LEVEL",
  logFormat: "BREWBLOX_LOG_FORMAT",
  debug: "BREWBLOX_DEBUG",
  skipConfirm: "BREWBLOX_SKIP_CONFIRM",
  release: "BREWBLOX_RELEASE",
} as const;

const OVERRIDE_KEYS: readonly (keyof typeof envVarNames)[] = [
  "home",
  "user",
  "logLevel",
  "logFormat",
  "debug",
  "skipConfirm",
  "release",
];

export type TestConfigOverrides = {
  readonly [K in keyof typeof envVarNames]?: string;
};

/**
 * Create a ConfigProvider for testing. Only HOME and USER get defaults;
 * the BREWBLOX_ variables stay unset unless overridden.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ release: "edge" });
 * const release = await Effect.runPromise(
 *   Effect.withConfigProvider(ReleaseOptionConfig, provider)
 * );
 * ```
 */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {}
): ConfigProvider.ConfigProvider => {
  const values = new Map<string, string>([
    [envVarNames.home, "/home/testuser"],
    [envVarNames.user, "testuser"],
  ]);
  for (const key of OVERRIDE_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      values.set(envVarNames[key], value);
    }
  }
  return ConfigProvider.fromMap(values, { pathDelim: "_" });
};
