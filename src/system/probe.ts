// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Read-only host probes. Nothing here mutates the host, so probes also
 * run under dry-run. Results are never cached: every invocation re-probes.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import { UserConfig } from "../config/env.js";
import { ErrorCode, SystemError } from "../lib/errors.js";
import { parseGroupList } from "../lib/file-parsers.js";
import { envFilePath } from "../lib/paths.js";
import type { AbsolutePath } from "../lib/types.js";
import { DirectoryState, type HostCapabilityState } from "../provision/types.js";
import { getEnvKey } from "./dotenv.js";
import { shellEscape } from "./exec.js";
import { Shell } from "./services/shell.js";

/** Key whose presence in `<dir>/.env` marks a directory as ours. */
export const CFG_VERSION_KEY = "BREWBLOX_CFG_VERSION";
export const RELEASE_KEY = "BREWBLOX_RELEASE";
export const SKIP_CONFIRM_KEY = "BREWBLOX_SKIP_CONFIRM";

const DOCKER_GROUP = "docker";

/** `$USER`, falling back to `id -un` when the environment does not say. */
export const currentUser: Effect.Effect<string, SystemError, Shell> = Effect.gen(function* () {
  const fromEnv = yield* UserConfig.pipe(Effect.orElseSucceed(() => Option.none<string>()));
  if (Option.isSome(fromEnv)) {
    return fromEnv.value;
  }
  const shell = yield* Shell;
  const result = yield* shell.capture("id -un");
  const name = result.stdout.trim();
  if (result.exitCode !== 0 || name.length === 0) {
    return yield* Effect.fail(
      new SystemError({
        code: ErrorCode.DEPENDENCY_MISSING,
        message: "Unable to determine the current user. Set $USER and try again.",
      })
    );
  }
  return name;
});

export const isDockerUser = (user: string): Effect.Effect<boolean, SystemError, Shell> =>
  Effect.gen(function* () {
    const shell = yield* Shell;
    const result = yield* shell.capture(`id -nG ${shellEscape(user)}`);
    return result.exitCode === 0 && parseGroupList(result.stdout).includes(DOCKER_GROUP);
  });

/** Prefix for docker commands: empty for members of the docker group. */
export const optsudo = (user: string): Effect.Effect<string, SystemError, Shell> =>
  Effect.map(isDockerUser(user), (member) => (member ? "" : "sudo "));

export const probeHost = (user: string): Effect.Effect<HostCapabilityState, SystemError, Shell> =>
  Effect.gen(function* () {
    const shell = yield* Shell;
    const aptAvailable = yield* shell.commandExists("apt");
    const dockerInstalled = yield* shell.commandExists("docker");
    const inDockerGroup = yield* isDockerUser(user);
    return { aptAvailable, dockerInstalled, inDockerGroup };
  });

const probeError = (dir: string, e: { readonly message: string }): SystemError =>
  new SystemError({
    code: ErrorCode.FILE_READ_FAILED,
    message: `Failed to inspect ${dir}: ${e.message}`,
  });

export const isManagedDirectory = (
  dir: AbsolutePath
): Effect.Effect<boolean, SystemError, FileSystem.FileSystem> =>
  Effect.map(getEnvKey(envFilePath(dir), CFG_VERSION_KEY), Option.isSome);

export const probeDirectory = (
  dir: AbsolutePath
): Effect.Effect<DirectoryState, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const exists = yield* fs.exists(dir).pipe(Effect.mapError((e) => probeError(dir, e)));
    if (!exists) {
      return DirectoryState.Absent();
    }

    const info = yield* fs.stat(dir).pipe(Effect.mapError((e) => probeError(dir, e)));
    if (info.type !== "Directory") {
      return DirectoryState.Unmanaged();
    }

    const entries = yield* fs.readDirectory(dir).pipe(Effect.mapError((e) => probeError(dir, e)));
    if (entries.length === 0) {
      return DirectoryState.Empty();
    }

    return yield* pipe(
      isManagedDirectory(dir),
      Effect.map((managed) => (managed ? DirectoryState.Managed() : DirectoryState.Unmanaged()))
    );
  });
