/**
 * Row ordering for the bandwidth tables.
 */

import type { Bandwidth } from '../types/monitoring.js';

/**
 * A row key paired with its counters.
 */
export type RankedEntry<K, B extends Bandwidth = Bandwidth> = readonly [K, B];

/**
 * The busier direction of an entity's traffic.
 *
 * @returns The larger of the upload and download totals
 */
export function dominantBandwidth(bandwidth: Bandwidth): number {
  return Math.max(
    bandwidth.totalBytesDownloaded,
    bandwidth.totalBytesUploaded
  );
}

/**
 * Order entries by dominant bandwidth, busiest first.
 *
 * There is no secondary key. The sort is stable, so exact ties stay in
 * input order, but callers should not depend on that.
 *
 * @param entries - Keyed counters, e.g. a snapshot map
 * @returns A new array; the input is left untouched
 */
export function rankByBandwidth<K, B extends Bandwidth>(
  entries: Iterable<RankedEntry<K, B>>
): Array<RankedEntry<K, B>> {
  return Array.from(entries).toSorted(
    ([, a], [, b]) => dominantBandwidth(b) - dominantBandwidth(a)
  );
}
