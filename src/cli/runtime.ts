// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Per-command layer composition. The platform layer (NodeContext) is
 * provided once in the entry point; everything here sits on top of it.
 */

import type { CommandExecutor, Terminal } from "@effect/platform";
import { Layer } from "effect";
import { ExecutionContext, type ExecutionContextValue } from "../provision/context.js";
import type { Prompter } from "../system/services/prompter.js";
import type { Shell } from "../system/services/shell.js";
import { SystemServicesLive } from "../system/services/index.js";

/** Services every command handler may use. */
export const createServicesLayer = (): Layer.Layer<
  Shell | Prompter,
  never,
  CommandExecutor.CommandExecutor | Terminal.Terminal
> => SystemServicesLive;

/**
 * Execution mode for the rest of the run, after the confirm gate has had
 * its say.
 */
export const createExecutionLayer = (
  options: ExecutionContextValue
): Layer.Layer<ExecutionContext> => Layer.succeed(ExecutionContext, options);
