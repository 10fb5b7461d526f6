// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { writeFile } from "node:fs/promises";
import { Option } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FLASHER_IMAGE_DEFAULT } from "../../src/config/field-values.js";
import { type FlasherOptions, flasherCommand, runFlasher } from "../../src/firmware/flasher.js";
import { FlasherMode, describeMode } from "../../src/firmware/modes.js";
import { ErrorCode } from "../../src/lib/errors.js";
import type { AbsolutePath } from "../../src/lib/types.js";
import type { FakeShellOptions, ShellResponse } from "../helpers/fakes.js";
import {
  failureOf,
  makeHarness,
  makeTempDir,
  removeTempDir,
  runHarness,
  successOf,
} from "../helpers/layers.js";

const SPARK_LSUSB = "Bus 001 Device 004: ID 2b04:c006 Particle Photon\n";
const HUB_LSUSB = "Bus 001 Device 001: ID 1d6b:0002 Linux Foundation 2.0 root hub\n";

const flashOptions = (overrides: Partial<FlasherOptions> = {}): FlasherOptions => ({
  mode: FlasherMode.Flash(),
  release: Option.some("edge"),
  pull: true,
  image: FLASHER_IMAGE_DEFAULT,
  ...overrides,
});

const withSpark = (...responses: ShellResponse[]): FakeShellOptions => ({
  available: ["lsusb"],
  responses: [{ prefix: "lsusb", stdout: SPARK_LSUSB }, ...responses],
});

describe("describeMode", () => {
  test("wifi is disabled and carries guidance", () => {
    const wifi = describeMode(FlasherMode.Wifi());
    expect(wifi.enabled).toBe(false);
    expect(wifi.banner).toEqual([
      "This command is temporarily disabled",
      "To set up Wifi, connect to the Spark over USB",
      "On the Spark service page (actions, top right), you can configure Wifi settings",
    ]);
  });

  test("particle passes its command through", () => {
    expect(describeMode(FlasherMode.Particle({ command: "particle serial list" })).args).toBe(
      "particle serial list"
    );
  });
});

describe("flasherCommand", () => {
  test("omits empty arguments", () => {
    expect(flasherCommand("", "brewblox/firmware-flasher", "edge", "")).toBe(
      "docker run -it --rm --privileged -v /dev:/dev brewblox/firmware-flasher:edge"
    );
  });
});

describe("runFlasher", () => {
  let workdir: AbsolutePath;
  let previousCwd: string;

  beforeEach(async () => {
    workdir = await makeTempDir();
    previousCwd = process.cwd();
    process.chdir(workdir);
  });

  afterEach(async () => {
    process.chdir(previousCwd);
    await removeTempDir(workdir);
  });

  test("no attached Spark fails before any pull or stop", async () => {
    await writeFile("docker-compose.yml", "services: {}\n");
    const harness = makeHarness({
      shell: { available: ["lsusb"], responses: [{ prefix: "lsusb", stdout: HUB_LSUSB }] },
    });
    const exit = await runHarness(harness, runFlasher(flashOptions()));

    const failure = Option.getOrThrow(failureOf(exit));
    expect(failure._tag).toBe("PreconditionError");
    expect(failure.code).toBe(ErrorCode.DEVICE_NOT_FOUND);
    expect(harness.shell.calls.map((c) => c.line)).toEqual(["lsusb"]);
  });

  test("missing lsusb is reported as a missing dependency", async () => {
    const harness = makeHarness();
    const exit = await runHarness(harness, runFlasher(flashOptions()));

    const failure = Option.getOrThrow(failureOf(exit));
    expect(failure.code).toBe(ErrorCode.DEPENDENCY_MISSING);
    expect(harness.shell.calls).toEqual([]);
  });

  test("pulls the image and runs the flasher with sudo", async () => {
    const harness = makeHarness({ shell: withSpark() });
    successOf(await runHarness(harness, runFlasher(flashOptions())));

    expect(harness.shell.mutations()).toEqual([
      "sudo docker pull brewblox/firmware-flasher:edge",
      "sudo docker run -it --rm --privileged -v /dev:/dev brewblox/firmware-flasher:edge flash",
    ]);
    expect(harness.shell.calls.at(-1)?.kind).toBe("interactive");
    expect(harness.logs).toEqual(["Pulling flasher image...", "Flashing Spark..."]);
  });

  test("stops a running stack and skips sudo for docker group members", async () => {
    await writeFile("docker-compose.yml", "services: {}\n");
    const harness = makeHarness({
      shell: withSpark({ prefix: "id -nG", stdout: "testuser docker\n" }),
    });
    successOf(await runHarness(harness, runFlasher(flashOptions({ pull: false }))));

    expect(harness.shell.mutations()).toEqual([
      "docker-compose down",
      "docker run -it --rm --privileged -v /dev:/dev brewblox/firmware-flasher:edge flash",
    ]);
    expect(harness.logs).toEqual(["Stopping services...", "Flashing Spark..."]);
  });

  test("a failed pull is tolerated", async () => {
    const harness = makeHarness({
      shell: withSpark({ prefix: "sudo docker pull", exitCode: 1 }),
    });
    successOf(await runHarness(harness, runFlasher(flashOptions())));

    expect(harness.logs).toContain(
      "Image pull failed: Command failed with exit code 1: sudo docker pull brewblox/firmware-flasher:edge"
    );
    expect(harness.shell.mutations()).toHaveLength(2);
  });

  test("a failing flasher fails the command with its exit code", async () => {
    const harness = makeHarness({
      shell: withSpark({ prefix: "sudo docker run", exitCode: 2 }),
    });
    const exit = await runHarness(harness, runFlasher(flashOptions({ pull: false })));

    const failure = Option.getOrThrow(failureOf(exit));
    expect(failure.code).toBe(ErrorCode.FLASHER_FAILED);
    expect(failure.message).toBe("Flasher exited with code 2");
  });

  test("release falls back to the environment, then to ./.env", async () => {
    const fromEnv = makeHarness({ shell: withSpark(), env: { release: "beta" } });
    successOf(
      await runHarness(fromEnv, runFlasher(flashOptions({ release: Option.none(), pull: false })))
    );
    expect(fromEnv.shell.mutations()).toEqual([
      "sudo docker run -it --rm --privileged -v /dev:/dev brewblox/firmware-flasher:beta flash",
    ]);

    await writeFile(".env", "BREWBLOX_RELEASE=stable\n");
    const fromFile = makeHarness({ shell: withSpark() });
    successOf(
      await runHarness(fromFile, runFlasher(flashOptions({ release: Option.none(), pull: false })))
    );
    expect(fromFile.shell.mutations()).toEqual([
      "sudo docker run -it --rm --privileged -v /dev:/dev brewblox/firmware-flasher:stable flash",
    ]);
  });

  test("no release anywhere is a configuration error", async () => {
    const harness = makeHarness({ shell: withSpark() });
    const exit = await runHarness(
      harness,
      runFlasher(flashOptions({ release: Option.none() }))
    );

    const failure = Option.getOrThrow(failureOf(exit));
    expect(failure._tag).toBe("ConfigError");
    expect(failure.code).toBe(ErrorCode.CONFIG_NOT_FOUND);
    expect(harness.shell.mutations()).toEqual([]);
  });

  test("a malformed release tag is rejected before anything runs", async () => {
    const harness = makeHarness({ shell: withSpark() });
    const exit = await runHarness(
      harness,
      runFlasher(flashOptions({ release: Option.some("bad tag") }))
    );

    const failure = Option.getOrThrow(failureOf(exit));
    expect(failure._tag).toBe("GeneralError");
    expect(failure.code).toBe(ErrorCode.INVALID_ARGS);
    expect(harness.shell.mutations()).toEqual([]);
  });

  test("particle shell prints exit guidance and runs without arguments", async () => {
    const harness = makeHarness({ shell: withSpark() });
    successOf(
      await runHarness(
        harness,
        runFlasher(flashOptions({ mode: FlasherMode.Particle({ command: "" }), pull: false }))
      )
    );

    expect(harness.logs).toEqual([
      "Starting Particle image...",
      "Type 'exit' and press enter to exit the shell",
    ]);
    expect(harness.shell.mutations()).toEqual([
      "sudo docker run -it --rm --privileged -v /dev:/dev brewblox/firmware-flasher:edge",
    ]);
  });

  test("wifi touches nothing", async () => {
    const harness = makeHarness({ shell: withSpark() });
    successOf(await runHarness(harness, runFlasher(flashOptions({ mode: FlasherMode.Wifi() }))));

    expect(harness.shell.calls).toEqual([]);
    expect(harness.logs).toEqual([]);
  });

  test("dry-run shows the flasher command without running it", async () => {
    const harness = makeHarness({ shell: withSpark(), execution: { dryRun: true } });
    successOf(await runHarness(harness, runFlasher(flashOptions({ pull: false }))));

    expect(harness.shell.mutations()).toEqual([]);
    expect(harness.logs).toEqual([
      "Flashing Spark...",
      "DRY RUN: sudo docker run -it --rm --privileged -v /dev:/dev brewblox/firmware-flasher:edge flash",
    ]);
  });
});
