// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Cause, HashMap, LogLevel } from "effect";
import { describe, expect, test } from "vitest";
import { type LogLine, colorize, formatLogLine } from "../../src/lib/effect-logger.js";

const line = (
  message: string,
  annotations: ReadonlyArray<readonly [string, unknown]> = [],
  logLevel: LogLevel.LogLevel = LogLevel.Info
): LogLine => ({
  logLevel,
  message,
  annotations: HashMap.fromIterable<string, unknown>(annotations),
  cause: Cause.empty,
  date: new Date(0),
});

describe("formatLogLine", () => {
  test("numbers step lines", () => {
    const step = line("Installing docker...", [
      ["logStyle", "step"],
      ["stepNumber", "2"],
      ["stepTotal", "5"],
    ]);
    expect(formatLogLine("pretty", step, false)).toBe("[2/5] → Installing docker...");
  });

  test("marks success and skip lines", () => {
    expect(formatLogLine("pretty", line("Done", [["logStyle", "success"]]), false)).toBe("✓ Done");
    expect(formatLogLine("pretty", line("Skipped", [["logStyle", "skip"]]), false)).toBe(
      "- Skipped"
    );
  });

  test("tags plain lines with level and command", () => {
    const warn = line("Reboot required", [["command", "install"]], LogLevel.Warning);
    expect(formatLogLine("pretty", warn, false)).toBe("WARN  [install] Reboot required");
    expect(formatLogLine("pretty", line("Hello"), false)).toBe("INFO  Hello");
  });

  test("colors only when asked", () => {
    expect(formatLogLine("pretty", line("Done", [["logStyle", "success"]]), true)).toBe(
      `${colorize("green", "✓", true)} Done`
    );
    expect(colorize("red", "x", true)).toBe("\x1b[31mx\x1b[0m");
  });

  test("json keeps the command and style but drops step bookkeeping", () => {
    const step = line("Installing docker...", [
      ["logStyle", "step"],
      ["stepNumber", "2"],
      ["stepTotal", "5"],
      ["command", "install"],
    ]);
    expect(JSON.parse(formatLogLine("json", step, true))).toEqual({
      timestamp: "1970-01-01T00:00:00.000Z",
      level: "info",
      message: "Installing docker...",
      style: "step",
      command: "install",
    });
  });
});
