// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Either, Match, Option, pipe } from "effect";
import { describe, expect, test } from "vitest";
import { AppLoggerLive, type LogStream } from "../../src/lib/logger";
import {
  checkCompatibility,
  findCompatible,
  isCompatible,
  requireCompatible,
} from "../../src/version/compat";
import { Version } from "../../src/version/version";

const v = (major: number, minor: number, patch: number): Version =>
  new Version(major, minor, patch);

describe("compat", () => {
  describe("isCompatible", () => {
    test("matches on major only", () => {
      expect(isCompatible(v(1, 23, 46), v(1, 99, 2495))).toBe(true);
      expect(isCompatible(v(1, 23, 46), v(2, 23, 46))).toBe(false);
      expect(isCompatible(v(0, 1, 0), v(0, 2, 0))).toBe(true);
    });
  });

  describe("checkCompatibility", () => {
    test("tags compatible pairs", () => {
      expect(checkCompatibility(v(1, 4, 0), v(1, 0, 0))._tag).toBe("versionCompatible");
    });

    test("carries both versions when incompatible", () => {
      const result = checkCompatibility(v(1, 4, 0), v(2, 0, 0));
      const described = pipe(
        Match.value(result),
        Match.tag("versionCompatible", (): string => "compatible"),
        Match.tag(
          "versionIncompatible",
          ({ current, required }): string => `${current.toString()} vs ${required.toString()}`
        ),
        Match.exhaustive
      );
      expect(described).toBe("1.4.0 vs 2.0.0");
    });
  });

  describe("findCompatible", () => {
    const candidates = [v(1, 1, 0), v(1, 4, 2), v(2, 0, 0), v(1, 3, 9)];

    test("picks the highest compatible candidate not older than required", () => {
      expect(Option.getOrThrow(findCompatible(v(1, 2, 0), candidates)).toString()).toBe("1.4.2");
    });

    test("accepts an exact match", () => {
      expect(Option.getOrThrow(findCompatible(v(2, 0, 0), candidates)).toString()).toBe("2.0.0");
    });

    test("returns None when no candidate qualifies", () => {
      expect(Option.isNone(findCompatible(v(3, 0, 0), candidates))).toBe(true);
      expect(Option.isNone(findCompatible(v(1, 5, 0), candidates))).toBe(true);
      expect(Option.isNone(findCompatible(v(1, 0, 0), []))).toBe(true);
    });
  });

  describe("requireCompatible", () => {
    test("succeeds for the same major", () => {
      const result = Effect.runSync(Effect.either(requireCompatible(v(1, 4, 0), v(1, 0, 0))));
      expect(Either.isRight(result)).toBe(true);
    });

    test("fails with IncompatibleVersionError otherwise", () => {
      const result = Effect.runSync(Effect.either(requireCompatible(v(1, 4, 0), v(2, 0, 0))));
      const error = Either.getOrThrow(Either.flip(result));
      expect(error._tag).toBe("IncompatibleVersionError");
      expect(error.current).toBe("1.4.0");
      expect(error.required).toBe("2.0.0");
      expect(error.message).toBe("Version 1.4.0 is not compatible with required version 2.0.0");
    });

    test("logs the successful check at debug level", () => {
      const lines: Array<readonly [string, LogStream]> = [];
      const logger = AppLoggerLive({
        level: "debug",
        format: "pretty",
        color: false,
        sink: (line, stream) => {
          lines.push([line, stream]);
        },
      });

      Effect.runSync(requireCompatible(v(1, 4, 0), v(1, 0, 0)).pipe(Effect.provide(logger)));

      expect(lines).toEqual([["DEBUG [compat] Version 1.4.0 is compatible with 1.0.0", "stdout"]]);
    });
  });
});
