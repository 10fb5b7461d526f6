// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions. Sharing these keeps naming and
 * descriptions consistent across commands.
 */

import { Options as O } from "@effect/cli";
import type { Options } from "@effect/cli/Options";
import { Effect, Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel } from "../config/field-values.js";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "../config/field-values.js";
import { ErrorCode, GeneralError } from "../lib/errors.js";

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: Options<boolean>;
  readonly dryRun: Options<boolean>;
  readonly yes: Options<boolean>;
  readonly logLevel: Options<Option.Option<LogLevel>>;
  readonly format: Options<Option.Option<LogFormat>>;
  readonly json: Options<boolean>;
  readonly config: Options<Option.Option<string>>;
} = {
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Show every host command before it runs (debug logging)")
  ),
  dryRun: O.boolean("dry-run").pipe(O.withDescription("Show what would be done without doing it")),
  yes: O.boolean("yes").pipe(
    O.withAlias("y"),
    O.withDescription("Skip the initial confirmation prompt")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
  config: O.text("config").pipe(
    O.withDescription("Path to the brewblox-ctl TOML configuration file"),
    O.optional
  ),
};

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly dryRun: boolean;
  readonly yes: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
  readonly config: Option.Option<string>;
}

/** Resolves format: --json takes precedence as shorthand for --format=json. */
export const effectiveFormat = (globals: GlobalOptions): Option.Option<LogFormat> =>
  pipe(
    Match.value(globals.json),
    Match.when(true, (): Option.Option<LogFormat> => Option.some("json")),
    Match.when(false, (): Option.Option<LogFormat> => globals.format),
    Match.exhaustive
  );

// Tri-state flags: `--x`, `--no-x`, or neither

export interface FlagPair {
  readonly name: string;
  readonly on: boolean;
  readonly off: boolean;
}

export const flagPair = (name: string, description: string): Options<FlagPair> =>
  O.all({
    on: O.boolean(name).pipe(O.withDescription(description)),
    off: O.boolean(`no-${name}`).pipe(O.withDescription(`Negates --${name}`)),
  }).pipe(O.map(({ on, off }): FlagPair => ({ name, on, off })));

/** `Some(true)`, `Some(false)`, or `None` when neither half was given. */
export const resolveFlagPair = (pair: FlagPair): Effect.Effect<Option.Option<boolean>, GeneralError> =>
  pair.on && pair.off
    ? Effect.fail(
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: `--${pair.name} and --no-${pair.name} are mutually exclusive`,
        })
      )
    : Effect.succeed(pair.on ? Option.some(true) : pair.off ? Option.some(false) : Option.none());

// Per-command options

export const dirOption: Options<Option.Option<string>> = O.text("dir").pipe(
  O.withDescription("Brewblox directory"),
  O.optional
);

export const releaseOption: Options<Option.Option<string>> = O.text("release").pipe(
  O.withDescription("Brewblox release track"),
  O.optional
);

export const installOptions: {
  readonly useDefaults: Options<FlagPair>;
  readonly aptInstall: Options<FlagPair>;
  readonly dockerInstall: Options<FlagPair>;
  readonly dockerUser: Options<FlagPair>;
  readonly dir: Options<Option.Option<string>>;
  readonly noReboot: Options<boolean>;
  readonly release: Options<Option.Option<string>>;
  readonly snapshot: Options<Option.Option<string>>;
} = {
  useDefaults: flagPair("use-defaults", "Use default settings for installation"),
  aptInstall: flagPair(
    "apt-install",
    "Update and install apt dependencies. Overrides --use-defaults if set"
  ),
  dockerInstall: flagPair("docker-install", "Install docker. Overrides --use-defaults if set"),
  dockerUser: flagPair("docker-user", "Add user to docker group. Overrides --use-defaults if set"),
  dir: dirOption,
  noReboot: O.boolean("no-reboot").pipe(
    O.withDescription("Do not reboot after install is done")
  ),
  release: releaseOption,
  snapshot: O.text("snapshot").pipe(
    O.withDescription("Load a Brewblox directory snapshot (.tar.gz) instead of creating one"),
    O.optional
  ),
};

export const initOptions: {
  readonly dir: Options<Option.Option<string>>;
  readonly release: Options<Option.Option<string>>;
  readonly force: Options<boolean>;
  readonly skipConfirm: Options<FlagPair>;
} = {
  dir: dirOption,
  release: releaseOption,
  force: O.boolean("force").pipe(
    O.withDescription("Do not prompt if directory already exists")
  ),
  skipConfirm: flagPair("skip-confirm", "Set the skip-confirm flag in .env"),
};

export const flasherOptions: {
  readonly release: Options<Option.Option<string>>;
  readonly pull: Options<FlagPair>;
} = {
  release: releaseOption,
  pull: flagPair("pull", "Pull the flasher image first (default)"),
};

export const particleCommand: Options<string> = O.text("command").pipe(
  O.withAlias("c"),
  O.withDescription("Command to run in the Particle container instead of a shell"),
  O.withDefault("")
);

export const daemonConfigFile: Options<Option.Option<string>> = O.text("config-file").pipe(
  O.withDescription("Path to Docker daemon config. Defaults to /etc/docker/daemon.json"),
  O.optional
);
