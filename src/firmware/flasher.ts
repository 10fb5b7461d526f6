// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Firmware flash orchestration: check for a Spark on USB, resolve the
 * release track, pull the flasher image, stop a running stack, then hand
 * the terminal to the flasher container.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import { ReleaseOptionConfig } from "../config/env.js";
import { resolveOptional } from "../config/resolve.js";
import {
  type CommandFailedError,
  ConfigError,
  ErrorCode,
  type GeneralError,
  type PreconditionError,
  SystemError,
} from "../lib/errors.js";
import { writeOutput } from "../lib/log.js";
import { COMPOSE_FILE_NAME, ENV_FILE_NAME } from "../lib/paths.js";
import { type ReleaseTrack, decodeReleaseTrack } from "../lib/types.js";
import { type ExecutionContext, sh, shInteractive } from "../provision/context.js";
import { getEnvKey } from "../system/dotenv.js";
import { RELEASE_KEY, currentUser, optsudo } from "../system/probe.js";
import type { Shell } from "../system/services/shell.js";
import { requireSparkDevice } from "../system/usb.js";
import { type FlasherMode, describeMode } from "./modes.js";

export const FLASHER_RUN_OPTIONS = "-it --rm --privileged -v /dev:/dev";

export interface FlasherOptions {
  readonly mode: FlasherMode;
  readonly release: Option.Option<string>;
  readonly pull: boolean;
  /** Image name without tag. */
  readonly image: string;
}

export type FlasherError =
  | PreconditionError
  | ConfigError
  | GeneralError
  | CommandFailedError
  | SystemError;

export type FlasherEnv = Shell | ExecutionContext | FileSystem.FileSystem;

const missingRelease = (): ConfigError =>
  new ConfigError({
    code: ErrorCode.CONFIG_NOT_FOUND,
    message:
      "No Brewblox release track found. " +
      `Run this command in a Brewblox directory, or pass --release.`,
  });

/** `--release`, else $BREWBLOX_RELEASE, else the `.env` in the working directory. */
export const resolveFlasherTag = (
  release: Option.Option<string>
): Effect.Effect<ReleaseTrack, ConfigError | GeneralError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fromEnv = yield* ReleaseOptionConfig.pipe(
      Effect.orElseSucceed(() => Option.none<string>())
    );
    const fromFile = yield* getEnvKey(ENV_FILE_NAME, RELEASE_KEY);
    return yield* pipe(
      resolveOptional(release, fromEnv, Option.filter(fromFile, (v) => v.length > 0)),
      Option.match({
        onNone: (): Effect.Effect<ReleaseTrack, ConfigError | GeneralError> =>
          Effect.fail(missingRelease()),
        onSome: decodeReleaseTrack,
      })
    );
  });

export const flasherCommand = (sudo: string, image: string, tag: string, args: string): string =>
  `${sudo}docker run ${FLASHER_RUN_OPTIONS} ${image}:${tag}${args.length > 0 ? ` ${args}` : ""}`;

/** Pull (best effort) and stop services that could hold the USB device. */
const prepareFlasher = (
  sudo: string,
  image: string,
  pull: boolean
): Effect.Effect<void, CommandFailedError | SystemError, FlasherEnv> =>
  Effect.gen(function* () {
    if (pull) {
      yield* Effect.logInfo("Pulling flasher image...");
      yield* sh(`${sudo}docker pull ${image}`).pipe(
        Effect.catchTags({
          CommandFailedError: (e) => Effect.logWarning(`Image pull failed: ${e.message}`),
          SystemError: (e) => Effect.logWarning(`Image pull failed: ${e.message}`),
        })
      );
    }

    const fs = yield* FileSystem.FileSystem;
    const composeFile = yield* fs.exists(COMPOSE_FILE_NAME).pipe(
      Effect.orElseSucceed(() => false)
    );
    if (composeFile) {
      yield* Effect.logInfo("Stopping services...");
      yield* sh(`${sudo}docker-compose down`);
    }
  });

export const runFlasher = (options: FlasherOptions): Effect.Effect<void, FlasherError, FlasherEnv> =>
  Effect.gen(function* () {
    const descriptor = describeMode(options.mode);
    if (!descriptor.enabled) {
      for (const line of descriptor.banner) {
        yield* writeOutput(line);
      }
      return;
    }

    yield* requireSparkDevice;
    const tag = yield* resolveFlasherTag(options.release);
    const user = yield* currentUser;
    const sudo = yield* optsudo(user);
    const image = `${options.image}:${tag}`;

    yield* prepareFlasher(sudo, image, options.pull);

    for (const line of descriptor.banner) {
      yield* Effect.logInfo(line);
    }

    const command = flasherCommand(sudo, options.image, tag, descriptor.args);
    const exitCode = yield* shInteractive(command);
    if (exitCode !== 0) {
      return yield* Effect.fail(
        new SystemError({
          code: ErrorCode.FLASHER_FAILED,
          message: `Flasher exited with code ${exitCode}`,
        })
      );
    }
  });
