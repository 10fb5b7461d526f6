// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { join } from "node:path";
import { Effect, Option } from "effect";
import { describe, expect, test } from "vitest";
import { toFlasherOptions } from "../../src/cli/commands/flash.js";
import { toInitOptions } from "../../src/cli/commands/init.js";
import { type InstallArgs, toInstallOptions } from "../../src/cli/commands/install.js";
import type { FlagPair } from "../../src/cli/options.js";
import { FLASHER_IMAGE_DEFAULT } from "../../src/config/field-values.js";
import { defaultGlobalConfig } from "../../src/config/loader.js";
import { FlasherMode } from "../../src/firmware/modes.js";
import { ErrorCode } from "../../src/lib/errors.js";
import { failureOf } from "../helpers/layers.js";

const HOME = "/home/testuser";

const unset = (name: string): FlagPair => ({ name, on: false, off: false });

const installArgs = (overrides: Partial<InstallArgs> = {}): InstallArgs => ({
  useDefaults: unset("use-defaults"),
  aptInstall: unset("apt-install"),
  dockerInstall: unset("docker-install"),
  dockerUser: unset("docker-user"),
  dir: Option.none(),
  noReboot: false,
  release: Option.none(),
  snapshot: Option.none(),
  ...overrides,
});

describe("toInstallOptions", () => {
  test("expands paths and keeps unset flags unset", async () => {
    const options = await Effect.runPromise(
      toInstallOptions(
        installArgs({
          dir: Option.some("~/brewblox"),
          dockerUser: { name: "docker-user", on: false, off: true },
        }),
        defaultGlobalConfig(),
        HOME
      )
    );

    expect(options.dir).toEqual(Option.some("/home/testuser/brewblox"));
    expect(options.dockerUser).toEqual(Option.some(false));
    expect(options.aptInstall).toEqual(Option.none());
    expect(options.release).toBe("edge");
    expect(options.snapshot).toEqual(Option.none());
  });

  test("rejects an invalid release track", async () => {
    const exit = await Effect.runPromiseExit(
      toInstallOptions(
        installArgs({ release: Option.some("not a track") }),
        defaultGlobalConfig(),
        HOME
      )
    );
    expect(Option.map(failureOf(exit), (e) => e.code)).toEqual(Option.some(ErrorCode.INVALID_ARGS));
  });
});

describe("toInitOptions", () => {
  test("defaults to the configured directory and skip-confirm off", async () => {
    const options = await Effect.runPromise(
      toInitOptions(
        {
          dir: Option.none(),
          release: Option.some("beta"),
          force: true,
          skipConfirm: unset("skip-confirm"),
        },
        defaultGlobalConfig(),
        HOME
      )
    );

    expect(options).toEqual({
      dir: join(process.cwd(), "brewblox"),
      release: "beta",
      force: true,
      skipConfirm: false,
    });
  });
});

describe("toFlasherOptions", () => {
  test("pulls unless told not to", async () => {
    const config = defaultGlobalConfig();
    const pulled = await Effect.runPromise(
      toFlasherOptions(FlasherMode.Flash(), { release: Option.none(), pull: unset("pull") }, config)
    );
    const skipped = await Effect.runPromise(
      toFlasherOptions(
        FlasherMode.Flash(),
        { release: Option.none(), pull: { name: "pull", on: false, off: true } },
        config
      )
    );

    expect(pulled.pull).toBe(true);
    expect(pulled.image).toBe(FLASHER_IMAGE_DEFAULT);
    expect(skipped.pull).toBe(false);
  });
});
