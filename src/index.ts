// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * app-version: a three-component semantic version value type.
 *
 * KEY TYPES:
 * - Version: u16 major.minor.patch with strict parsing and in-place increments
 * - VersionError: ParseIntError | InvalidFormat
 * - VersionProvider: capability for anything that reports its own version
 *
 * KEY FUNCTIONS:
 * - Version.parse("1.2.3"): string -> Either<Version, VersionError>
 * - isCompatible(a, b): same major
 * - VersionOrder: Effect Order over versions
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core value type
// ─────────────────────────────────────────────────────────────────────────────

export { Version, bump, parseVersion, type ReleaseType, type VersionTuple } from "./version/version";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  ComponentRangeError,
  IncompatibleVersionError,
  IntParseError,
  InvalidFormat,
  ParseIntError,
  errorMessage,
  formatVersionError,
  isVersionError,
  type ComponentName,
  type IntErrorKind,
  type VersionError,
} from "./lib/errors";

export { U16_MAX, isU16, parseU16 } from "./lib/int";

// ─────────────────────────────────────────────────────────────────────────────
// Ordering and compatibility
// ─────────────────────────────────────────────────────────────────────────────

export {
  VersionEquivalence,
  VersionOrder,
  compare,
  eq,
  gt,
  gte,
  lt,
  lte,
  maxVersion,
  minVersion,
  sortVersions,
  sortVersionsDesc,
} from "./version/order";

export {
  checkCompatibility,
  findCompatible,
  isCompatible,
  requireCompatible,
  type CompatibilityResult,
} from "./version/compat";

// ─────────────────────────────────────────────────────────────────────────────
// Capability
// ─────────────────────────────────────────────────────────────────────────────

export {
  VersionProviderTag,
  layerFromConfig,
  layerFromProvider,
  providedVersion,
  type VersionProvider,
} from "./version/provider";

// ─────────────────────────────────────────────────────────────────────────────
// Boundaries: schemas, config, logging
// ─────────────────────────────────────────────────────────────────────────────

export {
  VersionComponentSchema,
  VersionFromString,
  VersionFromTuple,
  decodeVersion,
  isVersionString,
} from "./version/schema";

export {
  LogFormatConfig,
  LogLevelConfig,
  LoggingConfigSpec,
  versionConfig,
  type LogFormat,
  type LogLevel,
  type LoggingConfig,
} from "./config/env";

export {
  AppLoggerFromEnv,
  AppLoggerLive,
  type AppLoggerOptions,
  type LogSink,
  type LogStream,
} from "./lib/logger";
