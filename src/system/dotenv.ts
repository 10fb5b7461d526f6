// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Reader and upserting writer for `.env` files (`KEY=value` per line).
 * Writes keep every unrelated line, comments included, in place.
 */

import { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, Option, pipe } from "effect";
import { ErrorCode, SystemError } from "../lib/errors.js";
import { parseEnvLine, parseKeyValue } from "../lib/file-parsers.js";

export type EnvEntry = readonly [key: string, value: string];

const lineKey = (line: string): Option.Option<string> =>
  Option.map(parseEnvLine(line), ([key]) => key);

/**
 * Pure upsert: the first line assigning a key is replaced in place, later
 * duplicates of that key are dropped, and unknown keys are appended.
 */
export const upsertEnvContent = (content: string, entries: readonly EnvEntry[]): string => {
  const updates = new Map<string, string>(entries);
  const written = new Set<string>();
  const lines = content.length === 0 ? [] : content.replace(/\n$/, "").split("\n");

  const kept = pipe(
    lines,
    Arr.filterMap((line) =>
      pipe(
        lineKey(line),
        Option.filter((key) => updates.has(key)),
        Option.match({
          onNone: (): Option.Option<string> => Option.some(line),
          onSome: (key): Option.Option<string> => {
            if (written.has(key)) {
              return Option.none();
            }
            written.add(key);
            return Option.some(`${key}=${updates.get(key) ?? ""}`);
          },
        })
      )
    )
  );

  const appended = pipe(
    Array.from(updates.entries()),
    Arr.filter(([key]) => !written.has(key)),
    Arr.map(([key, value]) => `${key}=${value}`)
  );

  return `${[...kept, ...appended].join("\n")}\n`;
};

const readError = (file: string, e: { readonly message: string }): SystemError =>
  new SystemError({
    code: ErrorCode.FILE_READ_FAILED,
    message: `Failed to read ${file}: ${e.message}`,
  });

/** Missing files read as empty. */
export const readEnvFile = (
  file: string
): Effect.Effect<Readonly<Record<string, string>>, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const exists = yield* fs.exists(file).pipe(Effect.mapError((e) => readError(file, e)));
    if (!exists) {
      return {};
    }
    const content = yield* fs.readFileString(file).pipe(Effect.mapError((e) => readError(file, e)));
    return parseKeyValue(content);
  });

export const getEnvKey = (
  file: string,
  key: string
): Effect.Effect<Option.Option<string>, SystemError, FileSystem.FileSystem> =>
  Effect.map(readEnvFile(file), (values) => Option.fromNullable(values[key]));

/** Creates the file when absent. */
export const setEnvKeys = (
  file: string,
  entries: readonly EnvEntry[]
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const exists = yield* fs.exists(file).pipe(Effect.mapError((e) => readError(file, e)));
    const current = exists
      ? yield* fs.readFileString(file).pipe(Effect.mapError((e) => readError(file, e)))
      : "";
    yield* fs.writeFileString(file, upsertEnvContent(current, entries)).pipe(
      Effect.mapError(
        (e) =>
          new SystemError({
            code: ErrorCode.FILE_WRITE_FAILED,
            message: `Failed to write ${file}: ${e.message}`,
            cause: e,
          })
      )
    );
  });
