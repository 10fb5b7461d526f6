// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * How a finished run is reported: the error line a command prints and the
 * process exit code its outcome maps to.
 */

import { Cause, Exit, Match, Option, pipe } from "effect";
import type { LogFormat } from "../config/field-values.js";
import { colorize, detectColor } from "../lib/effect-logger.js";
import { type AppError, isAppError, toExitCode } from "../lib/errors.js";

export const formatError = (err: AppError, format: LogFormat, useColor: boolean): string =>
  format === "json"
    ? JSON.stringify({ error: err.message, code: err.code })
    : `${colorize("red", "✗", useColor)} ${err.message}`;

/** JSON errors go to stdout beside the JSON log lines; pretty ones to stderr. */
export const displayError = (err: unknown, format: LogFormat): void => {
  if (!isAppError(err)) {
    return;
  }
  const stream = format === "json" ? process.stdout : process.stderr;
  stream.write(`${formatError(err, format, detectColor())}\n`);
};

const hasCode = (v: unknown): v is { code: number } =>
  typeof v === "object" && v !== null && "code" in v && typeof v.code === "number";

export const exitCodeFromExit = (exit: Exit.Exit<void, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => 0,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => 1,
        onSome: (value: unknown): number => (hasCode(value) ? toExitCode(value.code) : 1),
      }),
  });

/** Errors displayed by the command runner carry a code; anything else is reported here. */
export const logExitError = (exit: Exit.Exit<void, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => {
          if (!Cause.isInterruptedOnly(cause)) {
            console.error("Unexpected error:", Cause.pretty(cause));
          }
        },
        onSome: (err: unknown): void =>
          pipe(
            Match.value(err),
            Match.when(
              (v: unknown): v is { message: string } =>
                typeof v === "object" &&
                v !== null &&
                "message" in v &&
                typeof v.message === "string" &&
                !("code" in v),
              (v: { message: string }) => console.error(`Error: ${v.message}`)
            ),
            Match.orElse(() => undefined)
          ),
      }),
  });
