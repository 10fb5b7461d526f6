// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Install workflow: probe and ask everything first, then mutate.
 * Questions are asked in a fixed order (defaults, apt, docker, group,
 * directory, reboot) and no host change happens until all are answered.
 */

import type { FileSystem } from "@effect/platform";
import { Duration, Effect, Option } from "effect";
import type { DirectoryConflictError, SystemError, UserAbort } from "../lib/errors.js";
import { logSuccess } from "../lib/log.js";
import type { AbsolutePath, ReleaseTrack } from "../lib/types.js";
import { currentUser, probeHost } from "../system/probe.js";
import type { Prompter } from "../system/services/prompter.js";
import type { Shell } from "../system/services/shell.js";
import { type StepEnv, type StepError, executePlan } from "./executor.js";
import { REBOOT_DELAY, finalizeReboot } from "./reboot.js";
import {
  resolveCapability,
  resolveDirectory,
  resolveRebootMode,
  resolveUseDefaults,
} from "./resolver.js";
import type { InstallPlan } from "./types.js";

export interface InstallOptions {
  readonly useDefaults: Option.Option<boolean>;
  readonly aptInstall: Option.Option<boolean>;
  readonly dockerInstall: Option.Option<boolean>;
  readonly dockerUser: Option.Option<boolean>;
  readonly dir: Option.Option<AbsolutePath>;
  readonly noReboot: boolean;
  readonly release: ReleaseTrack;
  readonly snapshot: Option.Option<AbsolutePath>;
}

export interface InstallSettings {
  readonly defaultDir: AbsolutePath;
  readonly aptDependencies: readonly string[];
  readonly rebootDelay?: Duration.DurationInput;
}

export const resolveInstallPlan = (
  options: InstallOptions,
  settings: InstallSettings
): Effect.Effect<
  InstallPlan,
  UserAbort | DirectoryConflictError | SystemError,
  Shell | Prompter | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const user = yield* currentUser;
    const useDefaults = yield* resolveUseDefaults(options.useDefaults);
    const host = yield* probeHost(user);
    const deps = settings.aptDependencies.join(" ");

    const apt = yield* resolveCapability(
      {
        capability: "apt",
        override: options.aptInstall,
        alreadySatisfied: !host.aptAvailable,
        satisfiedNotice: [
          "Apt is not available. You may need to find another way to install dependencies.",
          `Apt packages: "${deps}"`,
        ],
        prompt: `Do you want to install apt packages "${deps}"?`,
      },
      useDefaults
    );

    const docker = yield* resolveCapability(
      {
        capability: "docker",
        override: options.dockerInstall,
        alreadySatisfied: host.dockerInstalled,
        satisfiedNotice: ["Docker is already installed."],
        prompt: "Do you want to install docker?",
      },
      useDefaults
    );

    const dockerUser = yield* resolveCapability(
      {
        capability: "group",
        override: options.dockerUser,
        alreadySatisfied: host.inDockerGroup,
        satisfiedNotice: [`${user} already belongs to the docker group.`],
        prompt: "Do you want to run docker commands without sudo?",
      },
      useDefaults
    );

    const dir = yield* resolveDirectory({
      explicit: options.dir,
      defaultDir: settings.defaultDir,
      useDefaults,
    });

    const reboot = yield* resolveRebootMode(options.noReboot, useDefaults);

    return {
      user,
      useDefaults,
      apt,
      aptDependencies: settings.aptDependencies,
      docker,
      dockerUser,
      dir,
      release: options.release,
      snapshot: options.snapshot,
      reboot,
    };
  });

export const runInstall = (
  options: InstallOptions,
  settings: InstallSettings
): Effect.Effect<void, StepError, StepEnv> =>
  Effect.gen(function* () {
    const plan = yield* resolveInstallPlan(options, settings);
    yield* Effect.logDebug(
      `Install plan: apt=${plan.apt} docker=${plan.docker} group=${plan.dockerUser} ` +
        `dir=${plan.dir} snapshot=${Option.getOrElse(plan.snapshot, () => "none")}`
    );
    yield* executePlan(plan);
    yield* logSuccess("Done!");
    yield* finalizeReboot(plan.reboot, settings.rebootDelay ?? REBOOT_DELAY);
  });
