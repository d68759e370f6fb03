export interface ChunkLatencySample {
  /** Time the chunk waited for a free worker. */
  queueMs: number;
  audioMs: number;
  /** Model time across all attempts. */
  modelMs: number;
  attempts: number;
}

interface Distribution {
  p50: number;
  p95: number;
  max: number;
  avg: number;
}

export interface LatencySummary {
  chunks: number;
  retriedChunks: number;
  queueMs: Distribution;
  modelMs: Distribution;
  /** Model time over audio time; below 1 means the pool keeps up with speech. */
  realtimeFactor: number;
}

const EMPTY: Distribution = { p50: 0, p95: 0, max: 0, avg: 0 };

/** Nearest-rank percentile of an ascending list. */
const nearestRank = (ascending: number[], fraction: number): number => {
  const rank = Math.ceil(ascending.length * fraction);
  return ascending[Math.min(ascending.length, Math.max(1, rank)) - 1] ?? 0;
};

const distributionOf = (values: number[]): Distribution => {
  if (values.length === 0) {
    return { ...EMPTY };
  }

  const ascending = [...values].sort((left, right) => left - right);
  const sum = ascending.reduce((total, value) => total + value, 0);

  return {
    p50: Math.round(nearestRank(ascending, 0.5)),
    p95: Math.round(nearestRank(ascending, 0.95)),
    max: Math.round(nearestRank(ascending, 1)),
    avg: Math.round(sum / ascending.length)
  };
};

/** Per-session timing of chunk transcriptions, reported when the session ends. */
export class LatencyTracker {
  private samples: ChunkLatencySample[] = [];

  public reset(): void {
    this.samples = [];
  }

  public push(sample: ChunkLatencySample): void {
    this.samples.push(sample);
  }

  public summarize(): LatencySummary {
    let audioMs = 0;
    let modelMs = 0;
    let retriedChunks = 0;

    for (const sample of this.samples) {
      audioMs += sample.audioMs;
      modelMs += sample.modelMs;
      if (sample.attempts > 1) {
        retriedChunks += 1;
      }
    }

    return {
      chunks: this.samples.length,
      retriedChunks,
      queueMs: distributionOf(this.samples.map((sample) => sample.queueMs)),
      modelMs: distributionOf(this.samples.map((sample) => sample.modelMs)),
      realtimeFactor: audioMs > 0 ? Number((modelMs / audioMs).toFixed(3)) : 0
    };
  }
}
