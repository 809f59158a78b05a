// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Strict unsigned 16-bit integer parsing. Only ASCII digits are accepted:
 * no sign, no whitespace, no radix prefix. Character range comparisons keep
 * `Number.parseInt`'s lenient prefix parsing out of the picture.
 */

import { Either } from "effect";
import { IntParseError } from "./errors";

export const U16_MAX = 65535;

export const isU16 = (n: number): boolean => Number.isInteger(n) && n >= 0 && n <= U16_MAX;

const isDigit = (c: string): boolean => c >= "0" && c <= "9";

/**
 * Parse a decimal string into a u16.
 *
 * @example
 * parseU16("42")    // Right(42)
 * parseU16("")      // Left(IntParseError { kind: "empty" })
 * parseU16("4x")    // Left(IntParseError { kind: "invalidDigit" })
 * parseU16("70000") // Left(IntParseError { kind: "posOverflow" })
 */
export const parseU16 = (input: string): Either.Either<number, IntParseError> => {
  if (input.length === 0) {
    return Either.left(new IntParseError({ kind: "empty", input }));
  }
  let value = 0;
  for (const c of input) {
    if (!isDigit(c)) {
      return Either.left(new IntParseError({ kind: "invalidDigit", input }));
    }
    value = value * 10 + (c.charCodeAt(0) - 48);
    if (value > U16_MAX) {
      return Either.left(new IntParseError({ kind: "posOverflow", input }));
    }
  }
  return Either.right(value);
};
