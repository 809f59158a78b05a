// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Compatibility between versions. Two versions are compatible when their
 * majors match; minor and patch never break the contract.
 */

import { Array as Arr, Data, Effect, Match, type Option, pipe } from "effect";
import { IncompatibleVersionError } from "../lib/errors";
import { gte, maxVersion } from "./order";
import type { Version } from "./version";

// ─────────────────────────────────────────────────────────────────────────────
// Check result (sum type)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Result of checking a running version against a required one.
 * Callers pattern match instead of branching on a boolean, so the
 * incompatible case carries both versions for the error message.
 */
export type CompatibilityResult = Data.TaggedEnum<{
  versionCompatible: object;
  versionIncompatible: { readonly current: Version; readonly required: Version };
}>;

const { versionCompatible, versionIncompatible } = Data.taggedEnum<CompatibilityResult>();

// ─────────────────────────────────────────────────────────────────────────────
// Pure checks
// ─────────────────────────────────────────────────────────────────────────────

export const isCompatible = (a: Version, b: Version): boolean => a.isCompatible(b);

export const checkCompatibility = (current: Version, required: Version): CompatibilityResult =>
  isCompatible(current, required)
    ? versionCompatible()
    : versionIncompatible({ current, required });

/**
 * Highest candidate that shares `required`'s major and is not older than it.
 *
 * @example
 * findCompatible(v("1.2.0"), [v("1.1.0"), v("1.4.2"), v("2.0.0")]) // Some(1.4.2)
 */
export const findCompatible = (
  required: Version,
  candidates: readonly Version[]
): Option.Option<Version> =>
  pipe(
    candidates,
    Arr.filter((c) => isCompatible(c, required) && gte(c, required)),
    maxVersion
  );

// ─────────────────────────────────────────────────────────────────────────────
// Effectful boundary
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Fail with `IncompatibleVersionError` unless `current` can serve `required`.
 */
export const requireCompatible = (
  current: Version,
  required: Version
): Effect.Effect<void, IncompatibleVersionError> =>
  pipe(
    checkCompatibility(current, required),
    Match.value,
    Match.tag(
      "versionCompatible",
      (): Effect.Effect<void, IncompatibleVersionError> =>
        Effect.logDebug(
          `Version ${current.toString()} is compatible with ${required.toString()}`
        )
    ),
    Match.tag(
      "versionIncompatible",
      (result): Effect.Effect<void, IncompatibleVersionError> =>
        Effect.fail(
          new IncompatibleVersionError({
            current: result.current.toString(),
            required: result.required.toString(),
          })
        )
    ),
    Match.exhaustive,
    Effect.annotateLogs({ component: "compat" })
  );
