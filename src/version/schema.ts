// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema integration for Version.
 *
 * Schemas are used at BOUNDARIES (JSON payloads, config files, CLI args).
 * They share the strict parser with `Version.parse`, so a string accepted
 * here is exactly a string accepted there.
 */

import { Either, type Effect, ParseResult, Schema, type SchemaAST } from "effect";
import { U16_MAX } from "../lib/int";
import { Version, type VersionTuple } from "./version";

const componentIntMsg = (): string => "Version component must be an integer";
const componentRangeMsg = (): string => `Version component must be 0-${U16_MAX.toString()}`;

export const VersionComponentSchema: Schema.Schema<number> = Schema.Number.pipe(
  Schema.int({ message: componentIntMsg }),
  Schema.between(0, U16_MAX, { message: componentRangeMsg })
);

const VersionInstance: Schema.Schema<Version> = Schema.instanceOf(Version);

/**
 * "X.Y.Z" <-> Version. Decoding failures carry the parser's message
 * ("Invalid version format", "Parse error: ...").
 */
export const VersionFromString: Schema.Schema<Version, string> = Schema.transformOrFail(
  Schema.String,
  VersionInstance,
  {
    decode: (s, _options, ast) =>
      Either.mapLeft(Version.parse(s), (e) => new ParseResult.Type(ast, s, e.message)),
    encode: (v) => ParseResult.succeed(v.toString()),
  }
);

/** [major, minor, patch] <-> Version, with each component range-checked. */
export const VersionFromTuple: Schema.Schema<Version, VersionTuple> = Schema.transform(
  Schema.Tuple(VersionComponentSchema, VersionComponentSchema, VersionComponentSchema),
  VersionInstance,
  {
    decode: (tuple) => Version.fromTuple(tuple),
    encode: (v) => v.toTuple(),
  }
);

export const decodeVersion: (
  i: string,
  options?: SchemaAST.ParseOptions
) => Effect.Effect<Version, ParseResult.ParseError, never> = Schema.decode(VersionFromString);

/** True when `s` parses as a strict "X.Y.Z" version. */
export const isVersionString = (s: string): boolean => Either.isRight(Version.parse(s));
