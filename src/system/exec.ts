// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Host command execution through the @effect/platform Command API.
 *
 * Provisioning commands are shell lines (`curl ... | sh`, `$USER`,
 * redirections), so every command runs as `sh -c <line>`. Three modes:
 * - shellRun: output goes straight to the terminal, only the exit code is kept
 * - shellCapture: stdout and stderr are collected for parsing
 * - shellInteractive: stdin, stdout and stderr are all inherited (TTY programs)
 */

import { Command } from "@effect/platform";
import type { CommandExecutor } from "@effect/platform/CommandExecutor";
import { Effect, Stream, pipe } from "effect";
import { ErrorCode, SystemError } from "../lib/errors.js";

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface ShellRunOptions {
  /** Text piped to the command's stdin. */
  readonly stdin?: string;
}

const execError = (command: string, e: { readonly message: string }): SystemError =>
  new SystemError({
    code: ErrorCode.EXEC_FAILED,
    message: `Failed to execute: ${command}: ${e.message}`,
    ...(e instanceof Error ? { cause: e } : {}),
  });

const shellCommand = (line: string): Command.Command => Command.make("sh", "-c", line);

const streamToString = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(
    stream,
    Stream.decodeText("utf-8"),
    Stream.runFold("", (acc, s) => acc + s)
  );

export const shellRun = (
  line: string,
  options: ShellRunOptions = {}
): Effect.Effect<number, SystemError, CommandExecutor> => {
  const base = pipe(shellCommand(line), Command.stdout("inherit"), Command.stderr("inherit"));
  const command = options.stdin !== undefined ? Command.feed(base, options.stdin) : base;
  return pipe(
    Command.exitCode(command),
    Effect.map((code): number => code),
    Effect.mapError((e) => execError(line, e))
  );
};

export const shellCapture = (
  line: string
): Effect.Effect<ExecResult, SystemError, CommandExecutor> =>
  Effect.gen(function* () {
    const process = yield* Command.start(shellCommand(line));

    // Both streams must drain concurrently or a chatty stderr can block stdout
    const [exitCode, stdout, stderr] = yield* Effect.all(
      [process.exitCode, streamToString(process.stdout), streamToString(process.stderr)],
      { concurrency: 3 }
    );

    return { exitCode, stdout, stderr };
  }).pipe(
    Effect.scoped,
    Effect.mapError((e) => execError(line, e))
  );

export const shellInteractive = (
  line: string
): Effect.Effect<number, SystemError, CommandExecutor> =>
  pipe(
    shellCommand(line),
    Command.stdin("inherit"),
    Command.stdout("inherit"),
    Command.stderr("inherit"),
    Command.exitCode,
    Effect.map((code): number => code),
    Effect.mapError((e) => execError(line, e))
  );

/** POSIX `command -v`; absent binaries exit non-zero. */
export const commandExists = (
  name: string
): Effect.Effect<boolean, SystemError, CommandExecutor> =>
  Effect.map(shellCapture(`command -v ${shellEscape(name)}`), (result) => result.exitCode === 0);

const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** Quotes a single argument for `sh -c`; safe words pass through unchanged. */
export const shellEscape = (arg: string): string =>
  arg.length > 0 && SHELL_SAFE.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
