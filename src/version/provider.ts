// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * VersionProvider capability: anything that can report the version it
 * describes. The plain interface is enough for direct calls; the tag lets an
 * Effect program depend on "some component with a version" without knowing
 * which one.
 *
 * @example
 * class Exporter {
 *   static version(): Version {
 *     return new Version(1, 4, 0);
 *   }
 * }
 *
 * const provider: VersionProvider = Exporter;
 */

import { type ConfigError, Context, Effect, Layer } from "effect";
import { versionConfig } from "../config/env";
import type { Version } from "./version";

export interface VersionProvider {
  readonly version: () => Version;
}

/**
 * VersionProvider tag identifier type.
 * Used in Effect's R type parameter to track this dependency.
 */
export interface VersionProviderTag {
  readonly _tag: "VersionProvider";
}

/**
 * Use with `yield* VersionProviderTag` to access the provider in Effect generators.
 */
export const VersionProviderTag: Context.Tag<VersionProviderTag, VersionProvider> =
  Context.GenericTag<VersionProviderTag, VersionProvider>("app-version/VersionProvider");

/** Read the version reported by whichever provider is in context. */
export const providedVersion: Effect.Effect<Version, never, VersionProviderTag> = Effect.map(
  VersionProviderTag,
  (provider) => provider.version()
);

export const layerFromProvider = (provider: VersionProvider): Layer.Layer<VersionProviderTag> =>
  Layer.succeed(VersionProviderTag, provider);

/**
 * Provider whose version is read once from the config key `name`.
 * Each call hands out a copy; increments on it stay local to the caller.
 */
export const layerFromConfig = (
  name: string
): Layer.Layer<VersionProviderTag, ConfigError.ConfigError> =>
  Layer.effect(
    VersionProviderTag,
    Effect.gen(function* () {
      const version = yield* versionConfig(name);
      return { version: (): Version => version.copy() };
    })
  );
