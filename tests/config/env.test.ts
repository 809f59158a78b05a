// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Exit } from "effect";
import { describe, expect, test } from "vitest";
import {
  LogFormatConfig,
  LogLevelConfig,
  LoggingConfigSpec,
  createTestConfigProvider,
  versionConfig,
} from "../../src/config/env";

describe("env config", () => {
  describe("logging", () => {
    test("defaults to info / pretty", () => {
      const logging = Effect.runSync(
        Effect.withConfigProvider(LoggingConfigSpec, createTestConfigProvider())
      );
      expect(logging).toEqual({ level: "info", format: "pretty" });
    });

    test("reads namespaced keys", () => {
      const provider = createTestConfigProvider({
        APP_VERSION_LOG_LEVEL: "debug",
        APP_VERSION_LOG_FORMAT: "json",
      });
      expect(Effect.runSync(Effect.withConfigProvider(LogLevelConfig, provider))).toBe("debug");
      expect(Effect.runSync(Effect.withConfigProvider(LogFormatConfig, provider))).toBe("json");
    });

    test("rejects unknown levels", () => {
      const exit = Effect.runSyncExit(
        Effect.withConfigProvider(
          LogLevelConfig,
          createTestConfigProvider({ APP_VERSION_LOG_LEVEL: "verbose" })
        )
      );
      expect(Exit.isFailure(exit)).toBe(true);
    });
  });

  describe("versionConfig", () => {
    test("parses a strict version", () => {
      const version = Effect.runSync(
        Effect.withConfigProvider(
          versionConfig("MIN_CLIENT_VERSION"),
          createTestConfigProvider({ MIN_CLIENT_VERSION: "1.2.3" })
        )
      );
      expect(version.toString()).toBe("1.2.3");
    });

    test("fails on malformed input", () => {
      const exit = Effect.runSyncExit(
        Effect.withConfigProvider(
          versionConfig("MIN_CLIENT_VERSION"),
          createTestConfigProvider({ MIN_CLIENT_VERSION: "1.x.3" })
        )
      );
      expect(Exit.isFailure(exit)).toBe(true);
    });

    test("fails when the key is missing", () => {
      const exit = Effect.runSyncExit(
        Effect.withConfigProvider(versionConfig("MIN_CLIENT_VERSION"), createTestConfigProvider())
      );
      expect(Exit.isFailure(exit)).toBe(true);
    });
  });
});
