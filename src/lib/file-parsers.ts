// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Parsers for the text the provisioner reads back from the host:
 * `.env` files, `id -nG`, `lsusb` and `ps aux` output.
 * Pure functions with no IO - callers handle reading.
 */

import { Array as Arr, Option, pipe } from "effect";

const isContentLine = (line: string): boolean => {
  const trimmed = line.trim();
  return trimmed.length > 0 && !trimmed.startsWith("#");
};

export const toContentLines = (content: string): readonly string[] =>
  pipe(content.split("\n"), Arr.map((line) => line.trim()), Arr.filter(isContentLine));

const QUOTE_CHARS: ReadonlySet<string> = new Set(['"', "'"]);

/** `"value"` and `'value'` lose their quotes; anything else is kept verbatim. */
export const unquote = (value: string): string => {
  const first = value.charAt(0);
  return value.length >= 2 && QUOTE_CHARS.has(first) && value.endsWith(first)
    ? value.slice(1, -1)
    : value;
};

/** Splits `KEY=value`, tolerating `export ` prefixes and whitespace around `=`. */
export const parseEnvLine = (line: string): Option.Option<readonly [string, string]> => {
  const trimmed = line.trim();
  if (!isContentLine(trimmed)) {
    return Option.none();
  }
  const body = trimmed.startsWith("export ") ? trimmed.slice("export ".length).trimStart() : trimmed;
  const eqIndex = body.indexOf("=");
  return eqIndex > 0
    ? Option.some([body.slice(0, eqIndex).trim(), unquote(body.slice(eqIndex + 1).trim())] as const)
    : Option.none();
};

/** Later assignments win, as in a shell. */
export const parseKeyValue = (content: string): Readonly<Record<string, string>> =>
  pipe(content.split("\n"), Arr.filterMap(parseEnvLine), Object.fromEntries);

/** `id -nG` prints space-separated group names on one line. */
export const parseGroupList = (output: string): readonly string[] =>
  output.split(/\s+/).filter((g) => g.length > 0);

export interface UsbDeviceId {
  readonly vendor: string;
  readonly product: string;
}

const LSUSB_ID_PATTERN = /\bID ([0-9a-fA-F]{4}):([0-9a-fA-F]{4})\b/;

/** Extracts `vendor:product` pairs from `lsusb` lines, lowercased. */
export const parseLsusb = (output: string): readonly UsbDeviceId[] =>
  pipe(
    output.split("\n"),
    Arr.filterMap((line) =>
      pipe(
        Option.fromNullable(LSUSB_ID_PATTERN.exec(line)),
        Option.flatMap((match) =>
          Option.all({ vendor: Arr.get(match, 1), product: Arr.get(match, 2) })
        ),
        Option.map(({ vendor, product }) => ({
          vendor: vendor.toLowerCase(),
          product: product.toLowerCase(),
        }))
      )
    )
  );

const CONFIG_FILE_FLAG = "--config-file";

/**
 * Finds the value of `--config-file` on a running `dockerd` command line.
 * Accepts both `--config-file PATH` and `--config-file=PATH`.
 */
export const parseDockerdConfigFile = (psOutput: string): Option.Option<string> =>
  pipe(
    psOutput.split("\n"),
    Arr.filter((line) => line.includes("dockerd") && !line.includes("grep")),
    Arr.findFirst((line) => line.includes(CONFIG_FILE_FLAG)),
    Option.flatMap((line) => {
      const words = line.trim().split(/\s+/);
      return pipe(
        Arr.findFirstIndex(words, (w) => w === CONFIG_FILE_FLAG || w.startsWith(`${CONFIG_FILE_FLAG}=`)),
        Option.flatMap((index) =>
          pipe(
            Arr.get(words, index),
            Option.flatMap((word) =>
              word.includes("=")
                ? Option.some(word.slice(word.indexOf("=") + 1))
                : Arr.get(words, index + 1)
            )
          )
        )
      );
    }),
    Option.filter((p) => p.length > 0)
  );
