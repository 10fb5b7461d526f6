// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Restores a Brewblox directory from a snapshot archive (`.tar.gz` whose
 * single top-level directory holds the files) instead of initializing
 * an empty one.
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import {
  type CommandFailedError,
  DirectoryConflictError,
  ErrorCode,
  SystemError,
} from "../lib/errors.js";
import type { AbsolutePath } from "../lib/types.js";
import { shellEscape } from "../system/exec.js";
import { probeDirectory } from "../system/probe.js";
import type { Shell } from "../system/services/shell.js";
import { type ExecutionContext, sh } from "./context.js";

export interface RestoreSnapshotOptions {
  readonly dir: AbsolutePath;
  readonly file: AbsolutePath;
}

export const restoreSnapshot = (
  options: RestoreSnapshotOptions
): Effect.Effect<
  void,
  DirectoryConflictError | CommandFailedError | SystemError,
  Shell | ExecutionContext | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const { dir, file } = options;
    const fs = yield* FileSystem.FileSystem;

    const found = yield* fs.exists(file).pipe(Effect.orElseSucceed(() => false));
    if (!found) {
      return yield* Effect.fail(
        new SystemError({
          code: ErrorCode.FILE_READ_FAILED,
          message: `Snapshot file not found: ${file}`,
        })
      );
    }

    const state = yield* probeDirectory(dir);
    if (state._tag === "Unmanaged") {
      return yield* Effect.fail(new DirectoryConflictError({ path: dir }));
    }

    yield* Effect.logInfo(`Loading snapshot ${file} into \`${dir}\`...`);
    if (state._tag !== "Absent") {
      yield* sh(`sudo rm -rf -- ${shellEscape(dir)}`);
    }
    yield* sh(`mkdir -p ${shellEscape(dir)}`);
    yield* sh(`tar -xzf ${shellEscape(file)} -C ${shellEscape(dir)} --strip-components=1`);
  });
