export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Nearest-rank percentile over an unsorted sample. Returns 0 for an empty sample.
 */
export function percentile(samples: readonly number[], p: number): number {
  if (samples.length === 0) return 0;
  const sorted = [...samples].sort((a, b) => a - b);
  const rank = Math.ceil((p / 100) * sorted.length);
  return sorted[Math.min(sorted.length, Math.max(1, rank)) - 1];
}

export function average(samples: readonly number[]): number {
  if (samples.length === 0) return 0;
  return samples.reduce((sum, value) => sum + value, 0) / samples.length;
}

/**
 * Fixed-capacity FIFO sample buffer.
 */
export class BoundedSample {
  private values: number[] = [];

  constructor(private readonly capacity: number) {}

  push(value: number): void {
    this.values.push(value);
    if (this.values.length > this.capacity) {
      this.values = this.values.slice(-this.capacity);
    }
  }

  snapshot(): number[] {
    return [...this.values];
  }

  clear(): void {
    this.values = [];
  }

  get length(): number {
    return this.values.length;
  }
}
