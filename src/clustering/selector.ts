/**
 * Spike subsampling for the selected clusters.
 *
 * @packageDocumentation
 */

import type { ClusterId, SpikeId } from './types.js';
import { sortedUnique } from './types.js';

/**
 * Read access to the live spike assignment.
 */
export interface SpikeSource {
  spikesIn(clusterIds: Iterable<ClusterId>): SpikeId[];
}

/**
 * Picks `nMax` evenly spaced spikes, at positions `floor(i * n / nMax)`,
 * when there are more than `nMax`.
 *
 * @param spikes - Spikes in ascending order.
 * @param nMax - Maximum number of spikes to keep.
 * @returns The spikes themselves when they fit, exactly `nMax` of them otherwise.
 */
export function regularSubset(spikes: readonly SpikeId[], nMax: number): SpikeId[] {
  if (spikes.length <= nMax) {
    return [...spikes];
  }
  const subset: SpikeId[] = [];
  for (let i = 0; i < nMax; i++) {
    const spike = spikes[Math.floor((i * spikes.length) / nMax)];
    if (spike !== undefined) {
      subset.push(spike);
    }
  }
  return subset;
}

/**
 * Derives a bounded, reproducible set of spikes from the selected clusters.
 *
 * @example
 * ```typescript
 * const selector = new Selector(clustering, { nSpikesMax: 100 });
 * selector.selectedClusters = [3];
 * selector.selectedSpikes; // at most 100 spikes of cluster 3
 * ```
 */
export class Selector {
  private readonly source: SpikeSource;
  private readonly maxSpikes: number;
  private clusters: ClusterId[];

  /**
   * Creates a selector over a live assignment.
   *
   * @param source - Assignment to read spikes from.
   * @param options - Maximum number of selected spikes.
   */
  constructor(source: SpikeSource, options: { nSpikesMax: number }) {
    if (!Number.isInteger(options.nSpikesMax) || options.nSpikesMax <= 0) {
      throw new RangeError(
        `nSpikesMax must be a positive integer, got ${String(options.nSpikesMax)}`
      );
    }
    this.source = source;
    this.maxSpikes = options.nSpikesMax;
    this.clusters = [];
  }

  get nSpikesMax(): number {
    return this.maxSpikes;
  }

  /** Selected clusters, ascending and distinct. */
  get selectedClusters(): readonly ClusterId[] {
    return this.clusters;
  }

  set selectedClusters(clusterIds: readonly ClusterId[]) {
    this.clusters = sortedUnique(clusterIds);
  }

  /** Subsampled spikes of the selected clusters, ascending. */
  get selectedSpikes(): SpikeId[] {
    if (this.clusters.length === 0) {
      return [];
    }
    return regularSubset(this.source.spikesIn(this.clusters), this.maxSpikes);
  }
}
