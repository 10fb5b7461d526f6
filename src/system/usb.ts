// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Spark controller detection over USB, via `lsusb`.
 */

import { Effect } from "effect";
import { ErrorCode, PreconditionError, SystemError } from "../lib/errors.js";
import { type UsbDeviceId, parseLsusb } from "../lib/file-parsers.js";
import { Shell } from "./services/shell.js";

/** Particle vendor ID with Photon/P1 products, in normal and DFU mode. */
export const SPARK_USB_IDS: readonly UsbDeviceId[] = [
  { vendor: "2b04", product: "c006" },
  { vendor: "2b04", product: "c008" },
  { vendor: "2b04", product: "d006" },
  { vendor: "2b04", product: "d008" },
];

export const isSparkDevice = (device: UsbDeviceId): boolean =>
  SPARK_USB_IDS.some((id) => id.vendor === device.vendor && id.product === device.product);

export const findSparkDevices = (
  lsusbOutput: string
): readonly UsbDeviceId[] => parseLsusb(lsusbOutput).filter(isSparkDevice);

/** Fails before anything else happens when no Spark is attached. */
export const requireSparkDevice: Effect.Effect<void, PreconditionError | SystemError, Shell> =
  Effect.gen(function* () {
    const shell = yield* Shell;
    if (!(yield* shell.commandExists("lsusb"))) {
      return yield* Effect.fail(
        new SystemError({
          code: ErrorCode.DEPENDENCY_MISSING,
          message: "lsusb is not installed. Install usbutils to detect USB devices.",
        })
      );
    }

    const result = yield* shell.capture("lsusb");
    const devices = findSparkDevices(result.stdout);
    if (devices.length === 0) {
      return yield* Effect.fail(
        new PreconditionError({
          message: "No Spark detected. Connect the Spark over USB and try again.",
        })
      );
    }
    yield* Effect.logDebug(`Found ${devices.length} Spark device(s) on USB`);
  });
