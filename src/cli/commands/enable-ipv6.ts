// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, type Option } from "effect";
import type { ConfigError } from "../../lib/errors.js";
import type { ExecutionContext } from "../../provision/context.js";
import { type Ipv6Error, enableIpv6 } from "../../system/ipv6.js";
import type { Shell } from "../../system/services/shell.js";
import { toOptionalUserPath } from "./utils.js";

export interface EnableIpv6Args {
  readonly configFile: Option.Option<string>;
}

/** Standalone form restarts Docker so the new settings take effect. */
export const executeEnableIpv6 = (
  args: EnableIpv6Args,
  home: string
): Effect.Effect<void, Ipv6Error | ConfigError, Shell | ExecutionContext> =>
  Effect.flatMap(toOptionalUserPath(args.configFile, home), (configFile) =>
    enableIpv6({ configFile, restart: true })
  );
