// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Data model of an install run: per-capability requests, how each one
 * was decided, the observed state of the target directory, and the
 * resolved plan the executor works through.
 */

import { Data, type Option } from "effect";
import type { AbsolutePath, ReleaseTrack } from "../lib/types.js";

export type Capability = "apt" | "docker" | "group";

/**
 * One installable capability, as seen before anything is decided.
 * `override` is the tri-state CLI flag: Some(true), Some(false) or None.
 */
export interface CapabilityRequest {
  readonly capability: Capability;
  readonly override: Option.Option<boolean>;
  /** Nothing to do on this host. */
  readonly alreadySatisfied: boolean;
  /** Logged line by line when the host state short-circuits the decision. */
  readonly satisfiedNotice: readonly string[];
  /** Asked when neither an override nor use-defaults settles it. */
  readonly prompt: string;
}

/** How a capability's on/off value was reached, in precedence order. */
export type Decision = Data.TaggedEnum<{
  AlreadySatisfied: {};
  Explicit: { readonly value: boolean };
  Defaulted: {};
  Ask: { readonly prompt: string };
}>;

export const Decision = Data.taggedEnum<Decision>();

export type DirectoryState = Data.TaggedEnum<{
  Absent: {};
  Empty: {};
  /** Contains a `.env` that defines BREWBLOX_CFG_VERSION. */
  Managed: {};
  /** Non-empty without that marker, or not a directory at all. */
  Unmanaged: {};
}>;

export const DirectoryState = Data.taggedEnum<DirectoryState>();

export type RebootMode = Data.TaggedEnum<{
  Suppressed: {};
  /** Wait for ENTER before rebooting. */
  Prompted: {};
  /** Announce, wait a fixed delay, reboot. */
  Countdown: {};
}>;

export const RebootMode = Data.taggedEnum<RebootMode>();

export interface HostCapabilityState {
  readonly aptAvailable: boolean;
  readonly dockerInstalled: boolean;
  readonly inDockerGroup: boolean;
}

export interface InstallPlan {
  readonly user: string;
  readonly useDefaults: boolean;
  readonly apt: boolean;
  readonly aptDependencies: readonly string[];
  readonly docker: boolean;
  readonly dockerUser: boolean;
  readonly dir: AbsolutePath;
  readonly release: ReleaseTrack;
  readonly snapshot: Option.Option<AbsolutePath>;
  readonly reboot: RebootMode;
}
