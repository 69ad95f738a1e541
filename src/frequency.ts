/**
 * Frequency tables over a token sequence.
 *
 * Both tables are filled in the constructor and only read afterwards.
 */

export class FreqDist {
  private readonly counts = new Map<string, number>();
  private totalCount = 0;

  constructor(samples: Iterable<string> = []) {
    for (const sample of samples) {
      this.counts.set(sample, (this.counts.get(sample) ?? 0) + 1);
      this.totalCount++;
    }
  }

  /** Occurrences of `sample`; 0 if never seen */
  count(sample: string): number {
    return this.counts.get(sample) ?? 0;
  }

  /** Relative frequency of `sample`, 0 for an empty table */
  freq(sample: string): number {
    return this.totalCount === 0 ? 0 : this.count(sample) / this.totalCount;
  }

  /** Most frequent sample (earliest seen wins ties), null when empty */
  max(): string | null {
    let best: string | null = null;
    let bestCount = 0;
    for (const [sample, n] of this.counts) {
      if (n > bestCount) {
        best = sample;
        bestCount = n;
      }
    }
    return best;
  }

  maxCount(): number {
    const best = this.max();
    return best === null ? 0 : this.count(best);
  }

  /** Sum of all counts */
  total(): number {
    return this.totalCount;
  }

  /** Number of distinct samples */
  get size(): number {
    return this.counts.size;
  }

  entries(): IterableIterator<[string, number]> {
    return this.counts.entries();
  }
}

/**
 * For each condition (first token of a pair), the distribution of the
 * tokens that follow it.
 */
export class ConditionalFreqDist {
  private readonly dists = new Map<string, FreqDist>();

  constructor(pairs: Iterable<readonly [string, string]> = []) {
    const followers = new Map<string, string[]>();
    for (const [condition, sample] of pairs) {
      const list = followers.get(condition);
      if (list) {
        list.push(sample);
      } else {
        followers.set(condition, [sample]);
      }
    }
    for (const [condition, samples] of followers) {
      this.dists.set(condition, new FreqDist(samples));
    }
  }

  /** Followers of `condition`; an empty table if it never led a pair */
  get(condition: string): FreqDist {
    return this.dists.get(condition) ?? new FreqDist();
  }

  conditions(): string[] {
    return [...this.dists.keys()];
  }

  /** Number of distinct tokens seen right after `condition` */
  diversity(condition: string): number {
    return this.get(condition).size;
  }

  maxDiversity(): number {
    let best = 0;
    for (const dist of this.dists.values()) {
      best = Math.max(best, dist.size);
    }
    return best;
  }

  /** Total number of pairs */
  total(): number {
    let sum = 0;
    for (const dist of this.dists.values()) sum += dist.total();
    return sum;
  }
}
