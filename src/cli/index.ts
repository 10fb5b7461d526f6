// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes context resolution,
 * the confirm gate, service layers and error display so each command stays
 * focused on its logic.
 */

import { Command } from "@effect/cli";
import type { CliApp } from "@effect/cli/CliApp";
import type { CommandExecutor, FileSystem, Terminal } from "@effect/platform";
import { Effect, Match, Option, pipe } from "effect";
import {
  DebugModeConfig,
  HomeConfig,
  LogFormatOptionConfig,
  LogLevelOptionConfig,
  SkipConfirmConfig,
} from "../config/env.js";
import type { LogFormat, LogLevel } from "../config/field-values.js";
import { loadGlobalConfig } from "../config/loader.js";
import { resolve } from "../config/resolve.js";
import type { GlobalConfig } from "../config/schema.js";
import { FlasherMode } from "../firmware/modes.js";
import { ProvisionLoggerLive } from "../lib/effect-logger.js";
import type { AppError, ConfigError, SystemError, UserAbort } from "../lib/errors.js";
import { toAbsolutePathEffect } from "../lib/paths.js";
import type { AbsolutePath } from "../lib/types.js";
import { CTL_VERSION } from "../lib/version.js";
import {
  type ExecutionContext,
  type ExecutionContextValue,
  confirmMode,
} from "../provision/context.js";
import type { Prompter } from "../system/services/prompter.js";
import type { Shell } from "../system/services/shell.js";
import { executeEnableIpv6 } from "./commands/enable-ipv6.js";
import { executeFlasher } from "./commands/flash.js";
import { executeInit } from "./commands/init.js";
import { executeInstall } from "./commands/install.js";
import { displayError } from "./exit.js";
import {
  type GlobalOptions,
  daemonConfigFile,
  effectiveFormat,
  flasherOptions,
  globalOptions,
  initOptions,
  installOptions,
  particleCommand,
} from "./options.js";
import { createExecutionLayer, createServicesLayer } from "./runtime.js";

/** Resolved runtime context for commands. Merges CLI args > env vars > config file (priority order). */
export interface CommandContext {
  readonly globalConfig: GlobalConfig;
  readonly home: string;
  readonly format: LogFormat;
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
  readonly execution: ExecutionContextValue;
}

export type HandlerEnv = Shell | Prompter | ExecutionContext | FileSystem.FileSystem;

export type PlatformEnv =
  | FileSystem.FileSystem
  | CommandExecutor.CommandExecutor
  | Terminal.Terminal;

// Context resolution

const resolveGlobalConfigPath = (
  globals: GlobalOptions
): Effect.Effect<AbsolutePath | undefined, ConfigError> =>
  Option.match(globals.config, {
    onNone: (): Effect.Effect<AbsolutePath | undefined, ConfigError> => Effect.succeed(undefined),
    onSome: (path): Effect.Effect<AbsolutePath | undefined, ConfigError> =>
      toAbsolutePathEffect(path),
  });

/** Resolves configuration from CLI, environment, and config file with CLI taking precedence. */
const resolveContext = (
  globals: GlobalOptions
): Effect.Effect<CommandContext, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const validatedPath = yield* resolveGlobalConfigPath(globals);
    const globalConfig = yield* loadGlobalConfig(validatedPath);

    // Env lookups fall back to defaults rather than failing the run
    const home = yield* HomeConfig.pipe(Effect.orElseSucceed(() => "/root"));
    const envLogLevel = yield* LogLevelOptionConfig.pipe(
      Effect.orElseSucceed(() => Option.none<LogLevel>())
    );
    const envLogFormat = yield* LogFormatOptionConfig.pipe(
      Effect.orElseSucceed(() => Option.none<LogFormat>())
    );
    const envDebug = yield* DebugModeConfig.pipe(Effect.orElseSucceed(() => false));
    const envSkipConfirm = yield* SkipConfirmConfig.pipe(Effect.orElseSucceed(() => false));

    const logLevel: LogLevel = pipe(
      Match.value(globals.verbose || envDebug),
      Match.when(true, (): LogLevel => "debug"),
      Match.when(
        false,
        (): LogLevel =>
          resolve({
            cli: globals.logLevel,
            env: envLogLevel,
            toml: globalConfig.logging.level,
          })
      ),
      Match.exhaustive
    );

    const cliFormat: Option.Option<LogFormat> = effectiveFormat(globals);
    const logFormat: LogFormat = resolve({
      cli: cliFormat,
      env: envLogFormat,
      toml: globalConfig.logging.format,
    });

    const format: LogFormat = pipe(
      cliFormat,
      Option.getOrElse((): LogFormat => logFormat)
    );

    return {
      globalConfig,
      home,
      format,
      logLevel,
      logFormat,
      execution: {
        dryRun: globals.dryRun,
        verbose: globals.verbose,
        skipConfirm: globals.yes || envSkipConfirm,
      },
    };
  });

// Command runner

export interface RunOptions {
  /** Ask the operator once before the handler touches the host. */
  readonly gated: boolean;
}

/** Centralizes context, gate and error handling so each command stays focused on its logic. */
export const runCommand = (
  globals: GlobalOptions,
  commandName: string,
  options: RunOptions,
  handler: (ctx: CommandContext) => Effect.Effect<void, AppError, HandlerEnv>
): Effect.Effect<void, Exclude<AppError, UserAbort>, PlatformEnv> =>
  Effect.gen(function* () {
    const ctx = yield* resolveContext(globals).pipe(
      Effect.tapError((err) =>
        Effect.sync(() =>
          displayError(err, Option.getOrElse(effectiveFormat(globals), (): LogFormat => "pretty"))
        )
      )
    );
    yield* pipe(
      Effect.gen(function* () {
        const execution = options.gated ? yield* confirmMode(ctx.execution) : ctx.execution;
        yield* handler(ctx).pipe(Effect.provide(createExecutionLayer(execution)));
      }),
      Effect.catchTag("UserAbort", (e) => Effect.logInfo(e.reason)),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.annotateLogs("command", commandName),
      Effect.tapError((err) => Effect.sync(() => displayError(err, ctx.format))),
      Effect.provide(createServicesLayer()),
      Effect.provide(
        ProvisionLoggerLive({
          level: ctx.logLevel,
          format: ctx.logFormat,
        })
      )
    );
  });

// Subcommand definitions

const installCmd = Command.make("install", { ...globalOptions, ...installOptions }, (args) =>
  runCommand(args, "install", { gated: true }, (ctx) =>
    executeInstall(args, ctx.globalConfig, ctx.home)
  )
).pipe(Command.withDescription("Create Brewblox directory; install system dependencies; reboot"));

const initCmd = Command.make("init", { ...globalOptions, ...initOptions }, (args) =>
  runCommand(args, "init", { gated: true }, (ctx) => executeInit(args, ctx.globalConfig, ctx.home))
).pipe(Command.withDescription("Create and init Brewblox directory"));

const flashCmd = Command.make("flash", { ...globalOptions, ...flasherOptions }, (args) =>
  runCommand(args, "flash", { gated: true }, (ctx) =>
    executeFlasher(FlasherMode.Flash(), args, ctx.globalConfig)
  )
).pipe(Command.withDescription("Flash firmware on the Spark (connected over USB)"));

const wifiCmd = Command.make("wifi", { ...globalOptions, ...flasherOptions }, (args) =>
  runCommand(args, "wifi", { gated: false }, (ctx) =>
    executeFlasher(FlasherMode.Wifi(), args, ctx.globalConfig)
  )
).pipe(Command.withDescription("DISABLED: Configure Spark Wifi settings"));

const particleCmd = Command.make(
  "particle",
  { ...globalOptions, ...flasherOptions, command: particleCommand },
  (args) =>
    runCommand(args, "particle", { gated: true }, (ctx) =>
      executeFlasher(FlasherMode.Particle({ command: args.command }), args, ctx.globalConfig)
    )
).pipe(Command.withDescription("Start a Docker container with access to the Particle CLI"));

const enableIpv6Cmd = Command.make(
  "enable-ipv6",
  { ...globalOptions, configFile: daemonConfigFile },
  (args) =>
    runCommand(args, "enable-ipv6", { gated: true }, (ctx) => executeEnableIpv6(args, ctx.home))
).pipe(Command.withDescription("Enable IPv6 support in the Docker daemon"));

// Root command

const brewbloxCtl = Command.make("brewblox-ctl").pipe(
  Command.withDescription("Brewblox host installation and firmware tooling"),
  Command.withSubcommands([installCmd, initCmd, flashCmd, wifiCmd, particleCmd, enableIpv6Cmd])
);

export const cli: (
  args: readonly string[]
) => Effect.Effect<void, unknown, CliApp.Environment | PlatformEnv> = Command.run(brewbloxCtl, {
  name: "brewblox-ctl",
  version: CTL_VERSION,
});
