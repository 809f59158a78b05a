// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The Version value type: three u16 components, strict "X.Y.Z" parsing and
 * canonical formatting.
 *
 * The three increment methods are the only mutators. They fail instead of
 * wrapping when a component would pass 65535, and leave the receiver untouched
 * in that case. `bump` is the non-mutating counterpart for `pipe` chains.
 *
 * @example
 * const v = new Version(1, 2, 3);
 * v.incrementMinor();
 * v.toString(); // "1.3.0"
 */

import { Either, Equal, Hash, Match, pipe } from "effect";
import {
  type ComponentName,
  ComponentRangeError,
  InvalidFormat,
  ParseIntError,
  type VersionError,
} from "../lib/errors";
import { U16_MAX, isU16, parseU16 } from "../lib/int";

export type VersionTuple = readonly [major: number, minor: number, patch: number];

export type ReleaseType = "major" | "minor" | "patch";

// ─────────────────────────────────────────────────────────────────────────────
// Internal helpers
// ─────────────────────────────────────────────────────────────────────────────

const checkComponent = (component: ComponentName, value: number): number => {
  if (!isU16(value)) {
    throw new ComponentRangeError({ component, value });
  }
  return value;
};

const successor = (
  component: ComponentName,
  value: number
): Either.Either<number, ComponentRangeError> =>
  value < U16_MAX
    ? Either.right(value + 1)
    : Either.left(new ComponentRangeError({ component, value: value + 1 }));

const splitExact3 = (text: string): Either.Either<readonly [string, string, string], InvalidFormat> =>
  pipe(
    text.split("."),
    Either.liftPredicate(
      (parts: string[]): parts is [string, string, string] =>
        parts.length === 3 &&
        parts[0] !== undefined &&
        parts[1] !== undefined &&
        parts[2] !== undefined,
      (parts) => new InvalidFormat({ input: text, segments: parts.length })
    )
  );

const parseSegment = (
  segment: ComponentName,
  text: string
): Either.Either<number, ParseIntError> =>
  Either.mapLeft(parseU16(text), (cause) => new ParseIntError({ cause, segment }));

// ─────────────────────────────────────────────────────────────────────────────
// Version
// ─────────────────────────────────────────────────────────────────────────────

export class Version implements Equal.Equal {
  private _major: number;
  private _minor: number;
  private _patch: number;

  /**
   * Components are taken as-is. A value outside 0..65535 (or a non-integer)
   * throws `ComponentRangeError`; use `parse` or the schemas for untrusted input.
   */
  constructor(major: number, minor: number, patch: number) {
    this._major = checkComponent("major", major);
    this._minor = checkComponent("minor", minor);
    this._patch = checkComponent("patch", patch);
  }

  /** A fresh 0.0.0. */
  static default(): Version {
    return new Version(0, 0, 0);
  }

  static fromTuple([major, minor, patch]: VersionTuple): Version {
    return new Version(major, minor, patch);
  }

  /**
   * Parse "X.Y.Z". Fails with `InvalidFormat` unless there are exactly three
   * dot-separated segments, and with `ParseIntError` for the first segment
   * that is not a plain decimal u16.
   */
  static parse(text: string): Either.Either<Version, VersionError> {
    return pipe(
      splitExact3(text),
      Either.flatMap(
        ([major, minor, patch]): Either.Either<
          { readonly major: number; readonly minor: number; readonly patch: number },
          ParseIntError
        > =>
          Either.all({
            major: parseSegment("major", major),
            minor: parseSegment("minor", minor),
            patch: parseSegment("patch", patch),
          })
      ),
      Either.map(({ major, minor, patch }) => new Version(major, minor, patch))
    );
  }

  major(): number {
    return this._major;
  }

  minor(): number {
    return this._minor;
  }

  patch(): number {
    return this._patch;
  }

  incrementPatch(): Either.Either<this, ComponentRangeError> {
    return pipe(
      successor("patch", this._patch),
      Either.map((patch) => {
        this._patch = patch;
        return this;
      })
    );
  }

  incrementMinor(): Either.Either<this, ComponentRangeError> {
    return pipe(
      successor("minor", this._minor),
      Either.map((minor) => {
        this._minor = minor;
        this._patch = 0;
        return this;
      })
    );
  }

  incrementMajor(): Either.Either<this, ComponentRangeError> {
    return pipe(
      successor("major", this._major),
      Either.map((major) => {
        this._major = major;
        this._minor = 0;
        this._patch = 0;
        return this;
      })
    );
  }

  /** Same major means same API contract; minor and patch are ignored. */
  isCompatible(other: Version): boolean {
    return this._major === other._major;
  }

  equals(other: Version): boolean {
    return (
      this._major === other._major && this._minor === other._minor && this._patch === other._patch
    );
  }

  copy(): Version {
    return new Version(this._major, this._minor, this._patch);
  }

  toTuple(): VersionTuple {
    return [this._major, this._minor, this._patch];
  }

  toString(): string {
    return `${this._major.toString()}.${this._minor.toString()}.${this._patch.toString()}`;
  }

  toJSON(): string {
    return this.toString();
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof Version && this.equals(that);
  }

  [Hash.symbol](): number {
    return Hash.array(this.toTuple());
  }
}

/**
 * Non-mutating increment, data-last for `pipe`.
 *
 * @example
 * pipe(new Version(1, 2, 3), bump("minor")) // Right(1.3.0)
 */
export const bump =
  (level: ReleaseType) =>
  (version: Version): Either.Either<Version, ComponentRangeError> => {
    const next = version.copy();
    return pipe(
      Match.value(level),
      Match.when("major", () => next.incrementMajor()),
      Match.when("minor", () => next.incrementMinor()),
      Match.when("patch", () => next.incrementPatch()),
      Match.exhaustive
    );
  };

/** Free-function form of `Version.parse`. */
export const parseVersion = (text: string): Either.Either<Version, VersionError> =>
  Version.parse(text);
