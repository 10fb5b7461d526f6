// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Docker daemon IPv6 enablement: the daemon config gets `ipv6` and a
 * documentation-range `fixed-cidr-v6`, existing settings always win.
 * The config file is root-owned, so reads and writes go through sudo.
 */

import { dirname } from "node:path";
import { Effect, Either, Option, ParseResult, Schema, pipe } from "effect";
import {
  type CommandFailedError,
  ConfigError,
  ErrorCode,
  type SystemError,
  errorMessage,
} from "../lib/errors.js";
import { parseDockerdConfigFile } from "../lib/file-parsers.js";
import { SYSTEM_PATHS } from "../lib/paths.js";
import { ExecutionContext, sh } from "../provision/context.js";
import { shellEscape } from "./exec.js";
import { Shell, type ShellService } from "./services/shell.js";

export const IPV6_CIDR_KEY = "fixed-cidr-v6";
export const IPV6_CIDR_DEFAULT = "2001:db8:1::/64";

const DaemonConfigSchema = Schema.Record({ key: Schema.String, value: Schema.Unknown });
type DaemonConfig = Schema.Schema.Type<typeof DaemonConfigSchema>;

export interface EnableIpv6Options {
  readonly configFile: Option.Option<string>;
  /** Restart the daemon afterwards. Install skips this; a reboot follows anyway. */
  readonly restart: boolean;
}

export type Ipv6Error = CommandFailedError | SystemError | ConfigError;

/** `--config-file` if given, else the running dockerd's, else the default. */
export const resolveDaemonConfigPath = (
  explicit: Option.Option<string>
): Effect.Effect<string, SystemError, Shell> =>
  Option.match(explicit, {
    onSome: (p): Effect.Effect<string, SystemError, Shell> => Effect.succeed(p),
    onNone: (): Effect.Effect<string, SystemError, Shell> =>
      Effect.gen(function* () {
        const shell = yield* Shell;
        const ps = yield* shell.capture("ps aux");
        return pipe(
          parseDockerdConfigFile(ps.stdout),
          Option.getOrElse((): string => SYSTEM_PATHS.dockerDaemonConfig)
        );
      }),
  });

/**
 * Pure merge. None when the config already mentions fixed-cidr-v6,
 * meaning the file must be left untouched.
 */
export const mergeIpv6Settings = (raw: string, current: DaemonConfig): Option.Option<DaemonConfig> =>
  raw.includes(IPV6_CIDR_KEY)
    ? Option.none()
    : Option.some({
        ...current,
        ipv6: current["ipv6"] ?? true,
        [IPV6_CIDR_KEY]: current[IPV6_CIDR_KEY] ?? IPV6_CIDR_DEFAULT,
      });

export const parseDaemonConfig = (
  raw: string,
  file: string
): Effect.Effect<DaemonConfig, ConfigError> =>
  pipe(
    Effect.try({
      try: (): unknown => JSON.parse(raw.trim().length === 0 ? "{}" : raw),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Failed to parse JSON in ${file}: ${errorMessage(e)}`,
          path: file,
          ...(e instanceof Error ? { cause: e } : {}),
        }),
    }),
    Effect.flatMap((parsed) =>
      Either.match(Schema.decodeUnknownEither(DaemonConfigSchema)(parsed), {
        onLeft: (error): Effect.Effect<DaemonConfig, ConfigError> =>
          Effect.fail(
            new ConfigError({
              code: ErrorCode.CONFIG_VALIDATION_ERROR,
              message: `${file} must contain a JSON object:\n${ParseResult.TreeFormatter.formatErrorSync(error)}`,
              path: file,
            })
          ),
        onRight: (config): Effect.Effect<DaemonConfig, ConfigError> => Effect.succeed(config),
      })
    )
  );

export const restartDocker: Effect.Effect<
  void,
  CommandFailedError | SystemError,
  Shell | ExecutionContext
> = Effect.gen(function* () {
  const shell = yield* Shell;
  if (yield* shell.commandExists("service")) {
    yield* sh("sudo service docker restart");
  } else if (yield* shell.commandExists("systemctl")) {
    yield* sh("sudo systemctl restart docker");
  } else {
    yield* Effect.logWarning("Failed to restart the Docker service");
  }
});

const readDaemonConfig = (
  shell: ShellService,
  quoted: string
): Effect.Effect<string, SystemError> =>
  Effect.map(shell.capture(`sudo cat ${quoted}`), (read) =>
    read.exitCode === 0 ? read.stdout : ""
  );

export const enableIpv6 = (
  options: EnableIpv6Options
): Effect.Effect<void, Ipv6Error, Shell | ExecutionContext> =>
  Effect.gen(function* () {
    const shell = yield* Shell;
    const { dryRun } = yield* ExecutionContext;
    const file = yield* resolveDaemonConfigPath(options.configFile);
    const quoted = shellEscape(file);
    yield* Effect.logInfo(`Using Docker config file ${file}`);

    yield* sh(`sudo mkdir -p ${shellEscape(dirname(file))}`);
    yield* sh(`sudo touch ${quoted}`);

    // Dry-run reads nothing and merges into "{}"
    const raw = dryRun ? "" : yield* readDaemonConfig(shell, quoted);
    const current = yield* parseDaemonConfig(raw, file);

    yield* Option.match(mergeIpv6Settings(raw, current), {
      onNone: (): Effect.Effect<void, Ipv6Error, Shell | ExecutionContext> =>
        Effect.logInfo("IPv6 settings are already present. Making no changes."),
      onSome: (merged): Effect.Effect<void, Ipv6Error, Shell | ExecutionContext> =>
        Effect.gen(function* () {
          yield* Effect.logInfo(`Writing Docker config file ${file}...`);
          yield* sh(`sudo tee ${quoted} > /dev/null`, {
            stdin: `${JSON.stringify(merged, null, 2)}\n`,
          });
          if (options.restart) {
            yield* restartDocker;
          }
        }),
    });
  });
