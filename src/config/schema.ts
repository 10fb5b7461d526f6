// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema for the optional global TOML configuration file.
 * Every field has a default, so an empty document decodes to a full config.
 */

import { Schema } from "effect";
import { type ReleaseTrack, ReleaseTrackSchema } from "../lib/types.js";
import {
  APT_DEPENDENCIES_DEFAULT,
  DEFAULT_DIRECTORY,
  FLASHER_IMAGE_DEFAULT,
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  RELEASE_DEFAULT,
} from "./field-values.js";

export const DEFAULT_RELEASE_TRACK: ReleaseTrack = Schema.decodeSync(ReleaseTrackSchema)(
  RELEASE_DEFAULT
);

const imageNameMsg = (): string => "Image name must not contain a tag";

export const loggingSchema = Schema.Struct({
  level: Schema.optionalWith(Schema.Literal(...LOG_LEVEL_VALUES), {
    default: () => LOG_LEVEL_DEFAULT,
  }),
  format: Schema.optionalWith(Schema.Literal(...LOG_FORMAT_VALUES), {
    default: () => LOG_FORMAT_DEFAULT,
  }),
});

export const installSchema = Schema.Struct({
  release: Schema.optionalWith(ReleaseTrackSchema, {
    default: () => DEFAULT_RELEASE_TRACK,
  }),
  directory: Schema.optionalWith(Schema.NonEmptyString, { default: () => DEFAULT_DIRECTORY }),
  aptDependencies: Schema.optionalWith(Schema.Array(Schema.NonEmptyString), {
    default: () => APT_DEPENDENCIES_DEFAULT,
  }),
});

export const flasherSchema = Schema.Struct({
  image: Schema.optionalWith(
    Schema.NonEmptyString.pipe(
      Schema.filter((s): boolean => !s.includes(":"), { message: imageNameMsg })
    ),
    { default: () => FLASHER_IMAGE_DEFAULT }
  ),
});

export const globalConfigSchema = Schema.Struct({
  logging: Schema.optionalWith(loggingSchema, {
    default: () => ({ level: LOG_LEVEL_DEFAULT, format: LOG_FORMAT_DEFAULT }),
  }),
  install: Schema.optionalWith(installSchema, {
    default: () => ({
      release: DEFAULT_RELEASE_TRACK,
      directory: DEFAULT_DIRECTORY,
      aptDependencies: APT_DEPENDENCIES_DEFAULT,
    }),
  }),
  flasher: Schema.optionalWith(flasherSchema, {
    default: () => ({ image: FLASHER_IMAGE_DEFAULT }),
  }),
});

export type GlobalConfig = Schema.Schema.Type<typeof globalConfigSchema>;
