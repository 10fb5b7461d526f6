// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Tagged errors for every provisioning failure mode.
 * Each error carries an ErrorCode that doubles as the process exit code.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;
  readonly DEPENDENCY_MISSING: 4;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;

  // System (20-29)
  readonly EXEC_FAILED: 20;
  readonly FILE_READ_FAILED: 21;
  readonly FILE_WRITE_FAILED: 22;
  readonly DIRECTORY_CREATE_FAILED: 23;

  // Provisioning (30-39)
  readonly COMMAND_FAILED: 30;
  readonly DIRECTORY_CONFLICT: 31;

  // Device (40-49)
  readonly DEVICE_NOT_FOUND: 40;
  readonly FLASHER_FAILED: 41;
}

/**
 * Error codes for all provisioning operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,
  DEPENDENCY_MISSING: 4,

  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,

  EXEC_FAILED: 20,
  FILE_READ_FAILED: 21,
  FILE_WRITE_FAILED: 22,
  DIRECTORY_CREATE_FAILED: 23,

  COMMAND_FAILED: 30,
  DIRECTORY_CONFLICT: 31,

  DEVICE_NOT_FOUND: 40,
  FLASHER_FAILED: 41,
};

type GeneralCode = typeof ErrorCode.GENERAL_ERROR | typeof ErrorCode.INVALID_ARGS;
type ConfigCode =
  | typeof ErrorCode.CONFIG_NOT_FOUND
  | typeof ErrorCode.CONFIG_PARSE_ERROR
  | typeof ErrorCode.CONFIG_VALIDATION_ERROR;
type SystemCode =
  | typeof ErrorCode.DEPENDENCY_MISSING
  | typeof ErrorCode.EXEC_FAILED
  | typeof ErrorCode.FILE_READ_FAILED
  | typeof ErrorCode.FILE_WRITE_FAILED
  | typeof ErrorCode.DIRECTORY_CREATE_FAILED
  | typeof ErrorCode.FLASHER_FAILED;

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: GeneralCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: ConfigCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: SystemCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

/** A fatal host command exited non-zero. */
export class CommandFailedError extends Data.TaggedError("CommandFailedError")<{
  readonly command: string;
  readonly exitCode: number;
}> {
  readonly code: typeof ErrorCode.COMMAND_FAILED = ErrorCode.COMMAND_FAILED;

  override get message(): string {
    return `Command failed with exit code ${this.exitCode}: ${this.command}`;
  }
}

/** Target exists, is not empty, and was not created by this tool. Never wiped. */
export class DirectoryConflictError extends Data.TaggedError("DirectoryConflictError")<{
  readonly path: string;
}> {
  readonly code: typeof ErrorCode.DIRECTORY_CONFLICT = ErrorCode.DIRECTORY_CONFLICT;

  override get message(): string {
    return `\`${this.path}\` is not a Brewblox directory.`;
  }
}

export class PreconditionError extends Data.TaggedError("PreconditionError")<{
  readonly message: string;
}> {
  readonly code: typeof ErrorCode.DEVICE_NOT_FOUND = ErrorCode.DEVICE_NOT_FOUND;
}

/** Operator declined a confirmation. Ends the command cleanly. */
export class UserAbort extends Data.TaggedError("UserAbort")<{
  readonly reason: string;
}> {
  readonly code: typeof ErrorCode.SUCCESS = ErrorCode.SUCCESS;

  override get message(): string {
    return this.reason;
  }
}

export type AppError =
  | GeneralError
  | ConfigError
  | SystemError
  | CommandFailedError
  | DirectoryConflictError
  | PreconditionError
  | UserAbort;

export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  return String(e);
};

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: number): number => Math.min(code, 125);

export const isAppError = (err: unknown): err is AppError =>
  typeof err === "object" && err !== null && "_tag" in err && "code" in err && "message" in err;
