// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Flasher container modes. A disabled mode prints its guidance and
 * touches nothing; flipping `enabled` restores the full pipeline.
 */

import { Data, Match, pipe } from "effect";

export type FlasherMode = Data.TaggedEnum<{
  Flash: {};
  Wifi: {};
  /** Particle CLI shell; `command` runs instead of an interactive shell when non-empty. */
  Particle: { readonly command: string };
}>;

export const FlasherMode = Data.taggedEnum<FlasherMode>();

export interface ModeDescriptor {
  readonly enabled: boolean;
  /** Printed before the container starts, or instead of it when disabled. */
  readonly banner: readonly string[];
  /** Arguments appended to `docker run ... <image>`. */
  readonly args: string;
}

export const describeMode = (mode: FlasherMode): ModeDescriptor =>
  pipe(
    Match.value(mode),
    Match.tag(
      "Flash",
      (): ModeDescriptor => ({ enabled: true, banner: ["Flashing Spark..."], args: "flash" })
    ),
    Match.tag(
      "Wifi",
      (): ModeDescriptor => ({
        enabled: false,
        banner: [
          "This command is temporarily disabled",
          "To set up Wifi, connect to the Spark over USB",
          "On the Spark service page (actions, top right), you can configure Wifi settings",
        ],
        args: "wifi",
      })
    ),
    Match.tag(
      "Particle",
      ({ command }): ModeDescriptor => ({
        enabled: true,
        banner: ["Starting Particle image...", "Type 'exit' and press enter to exit the shell"],
        args: command,
      })
    ),
    Match.exhaustive
  );
