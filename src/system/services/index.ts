// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * System services index - re-exports the Context.Tag service wrappers
 * and composes their live layers.
 */

import type { CommandExecutor, Terminal } from "@effect/platform";
import { Layer } from "effect";
import { type Prompter, PrompterLive } from "./prompter.js";
import { type Shell, ShellLive } from "./shell.js";

export { type Choice, Prompter, type PrompterService, PrompterLive } from "./prompter.js";
export { Shell, type ShellService, ShellLive } from "./shell.js";

/**
 * Composed layer with all system services. Both need the platform layer
 * (NodeContext) underneath: Shell for the command executor, Prompter for
 * the terminal.
 */
export const SystemServicesLive: Layer.Layer<
  Shell | Prompter,
  never,
  CommandExecutor.CommandExecutor | Terminal.Terminal
> = Layer.mergeAll(ShellLive, PrompterLive);
