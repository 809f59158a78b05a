// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Total ordering over Version: major, then minor, then patch.
 * Everything here is derived from `VersionOrder`, so sorting and comparison
 * cannot disagree.
 */

import { Array as Arr, Equivalence, Option, Order } from "effect";
import type { Version } from "./version";

export const VersionOrder: Order.Order<Version> = Order.combine(
  Order.mapInput(Order.number, (v: Version) => v.major()),
  Order.combine(
    Order.mapInput(Order.number, (v: Version) => v.minor()),
    Order.mapInput(Order.number, (v: Version) => v.patch())
  )
);

export const VersionEquivalence: Equivalence.Equivalence<Version> = Equivalence.make(
  (a: Version, b: Version) => a.equals(b)
);

/**
 * Compare two versions.
 * Returns: -1 if a < b, 0 if a === b, 1 if a > b.
 *
 * @example
 * compare(new Version(1, 0, 0), new Version(2, 0, 0)) // -1
 */
export const compare = (a: Version, b: Version): -1 | 0 | 1 => VersionOrder(a, b);

export const gt = (a: Version, b: Version): boolean => Order.greaterThan(VersionOrder)(a, b);

export const gte = (a: Version, b: Version): boolean =>
  Order.greaterThanOrEqualTo(VersionOrder)(a, b);

export const lt = (a: Version, b: Version): boolean => Order.lessThan(VersionOrder)(a, b);

export const lte = (a: Version, b: Version): boolean => Order.lessThanOrEqualTo(VersionOrder)(a, b);

export const eq = (a: Version, b: Version): boolean => VersionEquivalence(a, b);

/** Ascending order. The input array is not mutated. */
export const sortVersions = (versions: readonly Version[]): Version[] =>
  Arr.sort(versions, VersionOrder);

/** Descending order (newest first). */
export const sortVersionsDesc = (versions: readonly Version[]): Version[] =>
  Arr.sort(versions, Order.reverse(VersionOrder));

/**
 * Highest version, or None for an empty list.
 */
export const maxVersion = (versions: readonly Version[]): Option.Option<Version> =>
  Arr.match(versions, {
    onEmpty: (): Option.Option<Version> => Option.none(),
    onNonEmpty: (vs): Option.Option<Version> => Option.some(Arr.max(vs, VersionOrder)),
  });

export const minVersion = (versions: readonly Version[]): Option.Option<Version> =>
  Arr.match(versions, {
    onEmpty: (): Option.Option<Version> => Option.none(),
    onNonEmpty: (vs): Option.Option<Version> => Option.some(Arr.min(vs, VersionOrder)),
  });
