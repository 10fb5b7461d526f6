// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { NodeContext } from "@effect/platform-node";
import { Effect, Exit, Option } from "effect";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { exitCodeFromExit, formatError } from "../../src/cli/exit.js";
import { runCommand } from "../../src/cli/index.js";
import type { GlobalOptions } from "../../src/cli/options.js";
import {
  DirectoryConflictError,
  ErrorCode,
  GeneralError,
  UserAbort,
} from "../../src/lib/errors.js";
import type { AbsolutePath } from "../../src/lib/types.js";
import { makeTempDir, removeTempDir } from "../helpers/layers.js";

describe("exitCodeFromExit", () => {
  test("success exits 0", () => {
    expect(exitCodeFromExit(Exit.void)).toBe(0);
  });

  test("a coded failure exits with its code", () => {
    expect(exitCodeFromExit(Exit.fail(new DirectoryConflictError({ path: "/srv/brewblox" })))).toBe(
      31
    );
  });

  test("an operator abort exits 0", () => {
    expect(exitCodeFromExit(Exit.fail(new UserAbort({ reason: "Aborted." })))).toBe(0);
  });

  test("codes above 125 are capped", () => {
    expect(exitCodeFromExit(Exit.fail({ code: 200 }))).toBe(125);
  });

  test("an uncoded failure or a defect exits 1", () => {
    expect(exitCodeFromExit(Exit.fail(new Error("boom")))).toBe(1);
    expect(exitCodeFromExit(Exit.die("boom"))).toBe(1);
  });
});

describe("formatError", () => {
  const err = new GeneralError({ code: ErrorCode.INVALID_ARGS, message: "Bad flags" });

  test("pretty output is a single marked line", () => {
    expect(formatError(err, "pretty", false)).toBe("✗ Bad flags");
  });

  test("json output carries the code", () => {
    expect(formatError(err, "json", false)).toBe('{"error":"Bad flags","code":2}');
  });
});

describe("runCommand", () => {
  let root: AbsolutePath;
  let configPath: string;
  let stdout: string[];
  let stderr: string[];

  const globals = (): GlobalOptions => ({
    verbose: false,
    dryRun: false,
    yes: true,
    logLevel: Option.none(),
    format: Option.some("pretty"),
    json: false,
    config: Option.some(configPath),
  });

  beforeEach(async () => {
    root = await makeTempDir();
    configPath = join(root, "config.toml");
    await writeFile(configPath, "");
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  const run = (fail: () => DirectoryConflictError | UserAbort) =>
    Effect.runPromiseExit(
      runCommand(globals(), "install", { gated: true }, () => Effect.fail(fail())).pipe(
        Effect.provide(NodeContext.layer)
      )
    );

  test("an operator abort is logged and exits 0", async () => {
    const exit = await run(() => new UserAbort({ reason: "Aborted." }));

    expect(exitCodeFromExit(exit)).toBe(0);
    expect(stdout).toContain("INFO  [install] Aborted.\n");
    expect(stderr).toEqual([]);
  });

  test("a fatal error is printed once and exits with its code", async () => {
    const exit = await run(() => new DirectoryConflictError({ path: "/srv/brewblox" }));

    expect(exitCodeFromExit(exit)).toBe(31);
    expect(stderr).toEqual(["✗ `/srv/brewblox` is not a Brewblox directory.\n"]);
  });
});
