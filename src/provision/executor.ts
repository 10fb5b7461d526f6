// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Ordered host mutations for an install run.
 *
 * Each step is a descriptor with a failure policy. A fatal step's error
 * halts the run; a tolerated step's command failure becomes a warning.
 * Disabled steps only log why they were skipped.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import type {
  CommandFailedError,
  ConfigError,
  DirectoryConflictError,
  SystemError,
  UserAbort,
} from "../lib/errors.js";
import { createStepCounter, logSkip } from "../lib/log.js";
import { shellEscape } from "../system/exec.js";
import { enableIpv6 } from "../system/ipv6.js";
import type { Prompter } from "../system/services/prompter.js";
import type { Shell } from "../system/services/shell.js";
import { type ExecutionContext, sh } from "./context.js";
import { initDirectory } from "./directory.js";
import { restoreSnapshot } from "./snapshot.js";
import type { InstallPlan } from "./types.js";

export type FailurePolicy = "fatal" | "tolerated";

export type StepError =
  | CommandFailedError
  | SystemError
  | ConfigError
  | DirectoryConflictError
  | UserAbort;

export type StepEnv = Shell | Prompter | ExecutionContext | FileSystem.FileSystem;

export interface InstallStep {
  readonly title: string;
  readonly enabled: boolean;
  /** Logged instead of running when the step is disabled. */
  readonly skipNotice: string;
  readonly policy: FailurePolicy;
  readonly run: Effect.Effect<void, StepError, StepEnv>;
}

const applyPolicy = (step: InstallStep): Effect.Effect<void, StepError, StepEnv> =>
  step.policy === "fatal"
    ? step.run
    : pipe(
        step.run,
        Effect.catchTags({
          CommandFailedError: (e) => Effect.logWarning(`${step.title} failed: ${e.message}`),
          SystemError: (e) => Effect.logWarning(`${step.title} failed: ${e.message}`),
        })
      );

/** Runs enabled steps in order, numbering them `[n/total]`. */
export const runSteps = (
  steps: readonly InstallStep[]
): Effect.Effect<void, StepError, StepEnv> =>
  Effect.gen(function* () {
    const counter = yield* createStepCounter(steps.filter((s) => s.enabled).length);
    for (const step of steps) {
      if (!step.enabled) {
        yield* logSkip(step.skipNotice);
        continue;
      }
      yield* counter.next(step.title);
      yield* applyPolicy(step);
    }
  });

export const installSteps = (plan: InstallPlan): readonly InstallStep[] => [
  {
    title: "Installing apt packages...",
    enabled: plan.apt,
    skipNotice: "Skipped: apt install.",
    policy: "fatal",
    run: Effect.gen(function* () {
      yield* sh("sudo apt update");
      yield* sh("sudo apt upgrade -y");
      yield* sh(`sudo apt install -y ${plan.aptDependencies.join(" ")}`);
    }),
  },
  {
    title: "Installing docker...",
    enabled: plan.docker,
    skipNotice: "Skipped: docker install.",
    policy: "tolerated",
    run: Effect.asVoid(sh("curl -sL get.docker.com | sh")),
  },
  {
    title: "Enabling IPv6 for Docker...",
    enabled: true,
    skipNotice: "",
    policy: "fatal",
    run: enableIpv6({ configFile: Option.none(), restart: false }),
  },
  {
    title: `Adding ${plan.user} to 'docker' group...`,
    enabled: plan.dockerUser,
    skipNotice: `Skipped: adding ${plan.user} to 'docker' group.`,
    policy: "fatal",
    run: Effect.asVoid(sh(`sudo usermod -aG docker ${shellEscape(plan.user)}`)),
  },
  Option.match(plan.snapshot, {
    onNone: (): InstallStep => ({
      title: "Creating Brewblox directory...",
      enabled: true,
      skipNotice: "",
      policy: "fatal",
      run: initDirectory({
        dir: plan.dir,
        release: plan.release,
        force: true,
        skipConfirm: plan.useDefaults,
      }),
    }),
    onSome: (file): InstallStep => ({
      title: "Loading snapshot...",
      enabled: true,
      skipNotice: "",
      policy: "fatal",
      run: restoreSnapshot({ dir: plan.dir, file }),
    }),
  }),
];

export const executePlan = (plan: InstallPlan): Effect.Effect<void, StepError, StepEnv> =>
  runSteps(installSteps(plan));
