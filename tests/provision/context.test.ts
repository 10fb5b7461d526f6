// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Option } from "effect";
import { describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors.js";
import {
  type ExecutionContextValue,
  confirmMode,
  mutate,
  sh,
} from "../../src/provision/context.js";
import { failureOf, makeHarness, runHarness, successOf } from "../helpers/layers.js";

const base: ExecutionContextValue = { dryRun: false, verbose: false, skipConfirm: false };

describe("confirmMode", () => {
  test("passes silently when confirmation is skipped", async () => {
    const h = makeHarness();

    const ctx = successOf(await runHarness(h, confirmMode({ ...base, skipConfirm: true })));

    expect(ctx.skipConfirm).toBe(true);
    expect(h.prompter.calls).toEqual([]);
  });

  test("dry-run answer switches the mode", async () => {
    const h = makeHarness({ answers: ["dry-run"] });

    const ctx = successOf(await runHarness(h, confirmMode(base)));

    expect(ctx).toEqual({ ...base, dryRun: true });
    expect(h.prompter.calls).toEqual([{ kind: "select", message: "Do you want to continue?" }]);
  });

  test("no aborts", async () => {
    const h = makeHarness({ answers: ["no"] });

    const error = Option.getOrThrow(failureOf(await runHarness(h, confirmMode(base))));
    expect(error._tag).toBe("UserAbort");
    expect(error.reason).toBe("Aborted.");
  });
});

describe("sh", () => {
  test("fails on a non-zero exit by default", async () => {
    const h = makeHarness({ shell: { responses: [{ prefix: "false", exitCode: 3 }] } });

    const error = Option.getOrThrow(failureOf(await runHarness(h, sh("false"))));
    expect(error.code).toBe(ErrorCode.COMMAND_FAILED);
    expect(error.message).toBe("Command failed with exit code 3: false");
  });

  test("returns the exit code when unchecked", async () => {
    const h = makeHarness({ shell: { responses: [{ prefix: "false", exitCode: 3 }] } });

    expect(successOf(await runHarness(h, sh("false", { check: false })))).toBe(3);
  });

  test("verbose announces each line", async () => {
    const h = makeHarness({ execution: { verbose: true } });

    successOf(await runHarness(h, sh("sudo apt update")));

    expect(h.logs).toEqual(["$ sudo apt update"]);
    expect(h.shell.mutations()).toEqual(["sudo apt update"]);
  });
});

describe("mutate", () => {
  test("dry-run skips the write", async () => {
    const h = makeHarness({ execution: { dryRun: true } });
    let written = false;

    successOf(
      await runHarness(
        h,
        mutate(
          "write .env",
          Effect.sync(() => {
            written = true;
          })
        )
      )
    );

    expect(written).toBe(false);
    expect(h.logs).toEqual(["DRY RUN: write .env"]);
  });
});
