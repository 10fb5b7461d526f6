// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Branded types prevent accidental mixing of same-underlying-type values.
 * A release track and a directory path are both strings, but the compiler
 * rejects passing one where the other is expected.
 */

import { Brand, Effect, ParseResult, Schema } from "effect";
import { ErrorCode, GeneralError } from "./errors.js";

export type AbsolutePath = string & Brand.Brand<"AbsolutePath">;
export type ReleaseTrack = string & Brand.Brand<"ReleaseTrack">;

const absolutePathMsg = (): string => "Path must be absolute (start with /)";
const releaseTrackMsg = (): string => "Release track must match [A-Za-z0-9._-]+";

const RELEASE_TRACK_PATTERN = /^[A-Za-z0-9._-]+$/;

export const AbsolutePathSchema: Schema.BrandSchema<AbsolutePath, string, never> =
  Schema.String.pipe(
    Schema.filter((s): boolean => s.startsWith("/"), { message: absolutePathMsg }),
    Schema.brand("AbsolutePath")
  );

export const ReleaseTrackSchema: Schema.BrandSchema<ReleaseTrack, string, never> =
  Schema.String.pipe(
    Schema.filter((s): boolean => RELEASE_TRACK_PATTERN.test(s), { message: releaseTrackMsg }),
    Schema.brand("ReleaseTrack")
  );

export const isAbsolutePath: (u: unknown) => u is AbsolutePath = Schema.is(AbsolutePathSchema);

const parseErrorToGeneralError = (error: ParseResult.ParseError): GeneralError =>
  new GeneralError({
    code: ErrorCode.INVALID_ARGS,
    message: ParseResult.TreeFormatter.formatErrorSync(error),
  });

export const decodeReleaseTrack = (value: string): Effect.Effect<ReleaseTrack, GeneralError> =>
  Schema.decode(ReleaseTrackSchema)(value).pipe(Effect.mapError(parseErrorToGeneralError));

/** Unchecked constructor for values already known to be absolute. */
const absolutePath = Brand.nominal<AbsolutePath>();

type AbsolutePathLiteral = `/${string}`;

/**
 * Compile-time validated `AbsolutePath` from a string literal.
 * Only accepts literals starting with `/`. For dynamic paths, use
 * `toAbsolutePathEffect` (resolution against cwd) or `pathJoin`.
 */
export const path = <const S extends AbsolutePathLiteral>(literal: S): AbsolutePath =>
  absolutePath(literal);

/** Wraps a value produced by `node:path` resolution, which is always absolute. */
export const resolvedPath = (resolved: string): AbsolutePath => absolutePath(resolved);

/** Join path segments, preserving `AbsolutePath` brand when the base is branded. */
export function pathJoin(base: AbsolutePath, ...segments: string[]): AbsolutePath;
export function pathJoin(base: string, ...segments: string[]): string;
export function pathJoin(base: string, ...segments: string[]): string {
  return segments.length === 0 ? base : [base, ...segments].join("/").replace(/\/{2,}/g, "/");
}
