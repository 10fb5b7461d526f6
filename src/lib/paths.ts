// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized path constants prevent typos and enable global refactoring.
 * All system paths are branded AbsolutePath types for compile-time safety.
 */

import { normalize, resolve } from "node:path";
import { Effect } from "effect";
import { ConfigError, ErrorCode } from "./errors.js";
import { type AbsolutePath, path, pathJoin, resolvedPath } from "./types.js";

export const SYSTEM_PATHS: {
  readonly dockerDaemonConfig: AbsolutePath;
  readonly globalConfig: AbsolutePath;
} = {
  dockerDaemonConfig: path("/etc/docker/daemon.json"),
  globalConfig: path("/etc/brewblox-ctl/config.toml"),
};

/** Name of the persisted key-value file inside a Brewblox directory. */
export const ENV_FILE_NAME = ".env";

/** Compose file whose presence means a stack may be running in the cwd. */
export const COMPOSE_FILE_NAME = "docker-compose.yml";

export const envFilePath = (dir: AbsolutePath): AbsolutePath => pathJoin(dir, ENV_FILE_NAME);

export const userConfigPath = (home: string): string =>
  pathJoin(home, ".config", "brewblox-ctl", "config.toml");

const hasNullByte = (p: string): boolean => p.includes("\0");

const resolveToAbsolute = (p: string): AbsolutePath => resolvedPath(normalize(resolve(p)));

/** Expands a leading `~` the way a shell would before resolving against cwd. */
export const expandHome = (p: string, home: string): string =>
  p === "~" || p.startsWith("~/") ? `${home}${p.slice(1)}` : p;

export const toAbsolutePathEffect = (p: string): Effect.Effect<AbsolutePath, ConfigError> =>
  hasNullByte(p)
    ? Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Invalid path contains null byte: ${p}`,
        })
      )
    : Effect.succeed(resolveToAbsolute(p));
