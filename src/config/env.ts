// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * All exports are pure Config<A> values; nothing is read until a Config is
 * yielded inside an Effect. Keys live under the APP_VERSION_ namespace.
 */

import { Config, ConfigError, ConfigProvider, Either, pipe } from "effect";
import { Version } from "../version/version";

// ============================================================================
// Type Definitions
// ============================================================================

export const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_VALUES)[number];

export const LOG_FORMAT_VALUES = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMAT_VALUES)[number];

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly format: LogFormat;
}

const NAMESPACE = "APP_VERSION";

// ============================================================================
// Primitive Configs
// ============================================================================

export const LogLevelConfig: Config.Config<LogLevel> = Config.nested(
  Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL").pipe(Config.withDefault("info" as const)),
  NAMESPACE
);

export const LogFormatConfig: Config.Config<LogFormat> = Config.nested(
  Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT").pipe(Config.withDefault("pretty" as const)),
  NAMESPACE
);

export const LoggingConfigSpec: Config.Config<LoggingConfig> = Config.all([
  LogLevelConfig,
  LogFormatConfig,
]).pipe(Config.map(([level, format]) => ({ level, format })));

/**
 * A version read from the config key `name` with the strict "X.Y.Z" parser.
 * Malformed values fail with `ConfigError.InvalidData` carrying the parse message.
 *
 * @example
 * const minimum = yield* versionConfig("MIN_CLIENT_VERSION");
 */
export const versionConfig = (name: string): Config.Config<Version> =>
  pipe(
    Config.string(name),
    Config.mapOrFail((raw) =>
      Either.mapLeft(Version.parse(raw), (e) =>
        ConfigError.InvalidData([], `${e.message}: "${raw}"`)
      )
    )
  );

// ============================================================================
// Test Utilities
// ============================================================================

/**
 * ConfigProvider over a plain map of environment-style keys
 * (e.g. `APP_VERSION_LOG_LEVEL`). Uses "_" as the path delimiter so that
 * namespaced configs resolve the same way they do against `process.env`.
 */
export const createTestConfigProvider = (
  entries: Readonly<Record<string, string>> = {}
): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(new Map(Object.entries(entries)), { pathDelim: "_" });
