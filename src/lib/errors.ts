// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error types for version parsing and arithmetic.
 * Everything here is a `Data.TaggedError`, so failures travel as values through
 * `Either` and the Effect error channel and can be matched on `_tag`.
 */

import { Data, Match, pipe } from "effect";

// ─────────────────────────────────────────────────────────────────────────────
// Integer parsing
// ─────────────────────────────────────────────────────────────────────────────

export type IntErrorKind = "empty" | "invalidDigit" | "posOverflow";

const INT_ERROR_MESSAGES: Readonly<Record<IntErrorKind, string>> = {
  empty: "cannot parse integer from empty string",
  invalidDigit: "invalid digit found in string",
  posOverflow: "number too large to fit in target type",
};

/** Failure to read a single decimal segment as an unsigned 16-bit integer. */
export class IntParseError extends Data.TaggedError("IntParseError")<{
  readonly kind: IntErrorKind;
  readonly input: string;
}> {
  override readonly message: string = INT_ERROR_MESSAGES[this.kind];
}

// ─────────────────────────────────────────────────────────────────────────────
// Version parsing (VersionError = ParseIntError | InvalidFormat)
// ─────────────────────────────────────────────────────────────────────────────

/** A segment of "X.Y.Z" could not be read as a component. */
export class ParseIntError extends Data.TaggedError("ParseIntError")<{
  readonly cause: IntParseError;
  readonly segment: "major" | "minor" | "patch";
}> {
  override readonly message: string = `Parse error: ${this.cause.message}`;
}

/** Splitting on "." did not yield exactly three segments. */
export class InvalidFormat extends Data.TaggedError("InvalidFormat")<{
  readonly input: string;
  readonly segments: number;
}> {
  override readonly message: string = "Invalid version format";
}

export type VersionError = ParseIntError | InvalidFormat;

export const isVersionError = (u: unknown): u is VersionError =>
  u instanceof ParseIntError || u instanceof InvalidFormat;

/** Display text for a parse failure. */
export const formatVersionError = (e: VersionError): string =>
  pipe(
    Match.value(e),
    Match.tag("InvalidFormat", (): string => "Invalid version format"),
    Match.tag("ParseIntError", ({ cause }): string => `Parse error: ${cause.message}`),
    Match.exhaustive
  );

// ─────────────────────────────────────────────────────────────────────────────
// Arithmetic and compatibility
// ─────────────────────────────────────────────────────────────────────────────

export type ComponentName = "major" | "minor" | "patch";

/**
 * A component left the u16 domain, either at construction or because an
 * increment would carry it past 65535.
 */
export class ComponentRangeError extends Data.TaggedError("ComponentRangeError")<{
  readonly component: ComponentName;
  readonly value: number;
}> {
  override readonly message: string = `${this.component} component ${String(this.value)} is outside 0..65535`;
}

export class IncompatibleVersionError extends Data.TaggedError("IncompatibleVersionError")<{
  readonly current: string;
  readonly required: string;
}> {
  override readonly message: string = `Version ${this.current} is not compatible with required version ${this.required}`;
}

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};
