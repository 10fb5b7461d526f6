// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_VALUES)[number];
export const LOG_LEVEL_DEFAULT: LogLevel = "info";

export const LOG_FORMAT_VALUES = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMAT_VALUES)[number];
export const LOG_FORMAT_DEFAULT: LogFormat = "pretty";

export const RELEASE_DEFAULT = "edge";

export const APT_DEPENDENCIES_DEFAULT: readonly string[] = [
  "curl",
  "net-tools",
  "libssl-dev",
  "libffi-dev",
  "avahi-daemon",
];

export const FLASHER_IMAGE_DEFAULT = "brewblox/firmware-flasher";

/** Schema version written to every freshly initialized directory. */
export const CFG_VERSION_INITIAL = "0.0.0";

export const DEFAULT_DIRECTORY = "./brewblox";
