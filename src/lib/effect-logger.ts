// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Renders provisioning logs. Lines annotated by log.ts get their step,
 * success or skip marker; everything else is a levelled line tagged with
 * the running command. Warnings and errors are written to stderr.
 */

import { Cause, HashMap, Layer, LogLevel, Logger, Option, pipe } from "effect";
import type { LogFormat, LogLevel as AppLogLevel } from "../config/field-values.js";

export type Ink = "red" | "green" | "yellow" | "blue" | "cyan" | "gray" | "bold";

const SGR: Readonly<Record<Ink, number>> = {
  bold: 1,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  cyan: 36,
  gray: 90,
};

export const colorize = (ink: Ink, text: string, useColor: boolean): string =>
  useColor ? `\x1b[${SGR[ink]}m${text}\x1b[0m` : text;

const MINIMUM_LEVEL: Readonly<Record<AppLogLevel, LogLevel.LogLevel>> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  error: LogLevel.Error,
};

const LEVEL_INK: ReadonlyMap<string, Ink> = new Map<string, Ink>([
  ["DEBUG", "gray"],
  ["INFO", "blue"],
  ["WARN", "yellow"],
  ["ERROR", "red"],
]);

type Style = "step" | "success" | "skip";

const isStyle = (value: string): value is Style =>
  value === "step" || value === "success" || value === "skip";

/** Annotations that only steer rendering; JSON output leaves them out. */
const RENDER_KEYS: ReadonlySet<string> = new Set(["logStyle", "stepNumber", "stepTotal"]);

type Annotations = HashMap.HashMap<string, unknown>;

const text = (annotations: Annotations, key: string): Option.Option<string> =>
  Option.filter(HashMap.get(annotations, key), (v): v is string => typeof v === "string");

const styleOf = (annotations: Annotations): Option.Option<Style> =>
  pipe(text(annotations, "logStyle"), Option.filter(isStyle));

export interface LogLine {
  readonly logLevel: LogLevel.LogLevel;
  readonly message: string;
  readonly annotations: Annotations;
  readonly cause: Cause.Cause<unknown>;
  readonly date: Date;
}

const styledLine = (style: Style, line: LogLine, useColor: boolean): string => {
  switch (style) {
    case "step": {
      const n = Option.getOrElse(text(line.annotations, "stepNumber"), () => "?");
      const total = Option.getOrElse(text(line.annotations, "stepTotal"), () => "?");
      return `${colorize("bold", `[${n}/${total}]`, useColor)} ${colorize("cyan", "→", useColor)} ${line.message}`;
    }
    case "success":
      return `${colorize("green", "✓", useColor)} ${line.message}`;
    case "skip":
      return `${colorize("gray", "-", useColor)} ${line.message}`;
  }
};

const levelledLine = (line: LogLine, useColor: boolean): string => {
  const label = line.logLevel.label;
  const level = colorize(LEVEL_INK.get(label) ?? "gray", label.padEnd(5), useColor);
  const command = Option.match(text(line.annotations, "command"), {
    onNone: () => "",
    onSome: (name) => `${colorize("cyan", `[${name}]`, useColor)} `,
  });
  const detail = Cause.isEmpty(line.cause) ? "" : `\n${Cause.pretty(line.cause)}`;
  return `${level} ${command}${line.message}${detail}`;
};

const jsonLine = (line: LogLine): string => {
  const extra = Object.fromEntries(
    Array.from(HashMap.toEntries(line.annotations)).filter(([key]) => !RENDER_KEYS.has(key))
  );
  const style = Option.match(styleOf(line.annotations), {
    onNone: () => ({}),
    onSome: (s) => ({ style: s }),
  });
  return JSON.stringify({
    timestamp: line.date.toISOString(),
    level: line.logLevel.label.toLowerCase(),
    message: line.message,
    ...style,
    ...extra,
  });
};

/** One rendered line, without the trailing newline. */
export const formatLogLine = (format: LogFormat, line: LogLine, useColor: boolean): string =>
  format === "json"
    ? jsonLine(line)
    : Option.match(styleOf(line.annotations), {
        onNone: () => levelledLine(line, useColor),
        onSome: (style) => styledLine(style, line, useColor),
      });

const provisionLogger = (format: LogFormat, useColor: boolean): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, cause, annotations, date }) => {
    const rendered = formatLogLine(
      format,
      { logLevel, message: String(message), annotations, cause, date },
      useColor
    );
    const stream = LogLevel.greaterThanEqual(logLevel, LogLevel.Warning)
      ? process.stderr
      : process.stdout;
    stream.write(`${rendered}\n`);
  });

/** Color only on an interactive terminal, and never when NO_COLOR is set. */
export const detectColor = (): boolean =>
  process.stdout.isTTY === true && (process.env["NO_COLOR"] ?? "") === "";

export const ProvisionLoggerLive = (options: {
  readonly level: AppLogLevel;
  readonly format: LogFormat;
  readonly color?: boolean;
}): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(
      Logger.defaultLogger,
      provisionLogger(options.format, options.color ?? detectColor())
    ),
    Logger.minimumLogLevel(MINIMUM_LEVEL[options.level])
  );
