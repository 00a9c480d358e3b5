export interface VolumeBaselineOptions {
  /** Samples kept per symbol; the oldest is evicted first. */
  capacity: number;
  /** Samples required before an average is reported. */
  minSamples: number;
}

export const DEFAULT_VOLUME_BASELINE: Readonly<VolumeBaselineOptions> = {
  capacity: 30,
  minSamples: 5,
};

/** Rolling per-symbol volume history with a derived moving average. */
export class VolumeBaselineTracker {
  private readonly history = new Map<string, number[]>();
  private readonly capacity: number;
  private readonly minSamples: number;

  constructor(options: VolumeBaselineOptions = DEFAULT_VOLUME_BASELINE) {
    this.capacity = Math.max(1, Math.floor(options.capacity));
    this.minSamples = Math.min(this.capacity, Math.max(1, Math.floor(options.minSamples)));
  }

  /**
   * Appends `volume` and returns the mean of the retained samples, or
   * `undefined` while fewer than `minSamples` have been seen. Non-finite and
   * negative volumes are not recorded.
   */
  observe(symbol: string, volume: number): number | undefined {
    if (Number.isFinite(volume) && volume >= 0) {
      const samples = this.history.get(symbol) ?? [];
      samples.push(volume);
      while (samples.length > this.capacity) samples.shift();
      this.history.set(symbol, samples);
    }
    return this.average(symbol);
  }

  average(symbol: string): number | undefined {
    const samples = this.history.get(symbol);
    if (!samples || samples.length < this.minSamples) return undefined;
    return samples.reduce((sum, value) => sum + value, 0) / samples.length;
  }

  size(symbol: string): number {
    return this.history.get(symbol)?.length ?? 0;
  }

  symbols(): string[] {
    return Array.from(this.history.keys());
  }
}
