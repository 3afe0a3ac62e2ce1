/**
 * @file compare.ts
 * @module references/compare
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Canonical ordering of scoped symbol names.
 */

import { SCOPE_SEPARATOR } from '../config.js';

/**
 * Compare two scoped names component by component.
 *
 * Components are compared by code unit, not by locale. When one name is a
 * prefix of the other, the shorter one sorts first, so `std::vector` comes
 * before `std::vector::iterator`.
 *
 * @returns Negative, zero or positive, as for `Array.prototype.sort`
 */
export function compareSymbolNames(a: string, b: string): number {
  const aParts = a.split(SCOPE_SEPARATOR);
  const bParts = b.split(SCOPE_SEPARATOR);
  const shared = Math.min(aParts.length, bParts.length);

  for (let i = 0; i < shared; i++) {
    if (aParts[i] < bParts[i]) return -1;
    if (aParts[i] > bParts[i]) return 1;
  }

  return aParts.length - bParts.length;
}

/**
 * Sort names into canonical order.
 * @returns A new sorted array
 */
export function sortSymbolNames(names: Iterable<string>): string[] {
  return [...names].sort(compareSymbolNames);
}
