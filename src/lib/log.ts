// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Styled log helpers. Call sites attach a LogStyle; effect-logger.ts
 * decides how each style looks in pretty and JSON output.
 */

import { Data, Effect, Match, Ref, pipe } from "effect";

// ============================================================================
// LogStyle ADT
// ============================================================================

type LogStyle = Data.TaggedEnum<{
  step: { readonly current: number; readonly total: number };
  success: object;
  skip: object;
}>;

const { step, success, skip } = Data.taggedEnum<LogStyle>();

const encodeStyle = (style: LogStyle): Record<string, string> =>
  pipe(
    Match.value(style),
    Match.tag("step", ({ current, total }) => ({
      logStyle: "step",
      stepNumber: String(current),
      stepTotal: String(total),
    })),
    Match.tag("success", () => ({ logStyle: "success" })),
    Match.tag("skip", () => ({ logStyle: "skip" })),
    Match.exhaustive
  );

const logStyled = (style: LogStyle, message: string): Effect.Effect<void> =>
  Effect.log(message).pipe(Effect.annotateLogs(encodeStyle(style)));

// ============================================================================
// Public Logging Functions
// ============================================================================

export const logStep = (current: number, total: number, message: string): Effect.Effect<void> =>
  logStyled(step({ current, total }), message);

export const logSuccess = (message: string): Effect.Effect<void> => logStyled(success(), message);

/** A step the operator or the host state turned off. */
export const logSkip = (message: string): Effect.Effect<void> => logStyled(skip(), message);

/** Bypasses the logger for guidance text that must always reach the operator. */
export const writeOutput = (text: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(`${text}\n`);
  });

// ============================================================================
// StepCounter
// ============================================================================

/** Numbers the steps of a sequential run: `[2/5] → Installing Docker`. */
export interface StepCounter {
  readonly next: (message: string) => Effect.Effect<void>;
  readonly current: Effect.Effect<number>;
}

export const createStepCounter = (total: number): Effect.Effect<StepCounter> =>
  Effect.map(Ref.make(0), (ref) => ({
    next: (message: string): Effect.Effect<void> =>
      Ref.updateAndGet(ref, (n) => n + 1).pipe(
        Effect.flatMap((current) => logStep(current, total, message))
      ),
    current: Ref.get(ref),
  }));
