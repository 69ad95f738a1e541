import { ConditionalFreqDist, FreqDist } from './frequency.js';
import { bigrams } from './tokenizer.js';
import type { Metric, MetricEntry, Sample } from './types.js';

function bigramKey(w1: string, w2: string): string {
  return `${w1} ${w2}`;
}

/**
 * Log-scaled word frequency: ln(count) / ln(maxCount).
 * A word seen once, or a text whose most common word is seen once, gives 0.
 */
export function logFrequencyRatio(count: number, maxCount: number): number {
  if (count <= 1 || maxCount <= 1) return 0;
  return Math.log(count) / Math.log(maxCount);
}

export const wordFrequency: Metric = (tokens) => {
  const freq = new FreqDist(tokens);
  const maxCount = freq.maxCount();
  return tokens.map((word) => ({
    value: logFrequencyRatio(freq.count(word), maxCount),
    key: word,
  }));
};

export const wordFrequencyLinear: Metric = (tokens) => {
  const freq = new FreqDist(tokens);
  const maxCount = freq.maxCount();
  return tokens.map((word) => ({
    value: maxCount === 0 ? 0 : freq.count(word) / maxCount,
    key: word,
  }));
};

/** P(w2 | w1) for each adjacent pair */
export const bigramProbability: Metric = (tokens) => {
  const pairs = bigrams(tokens);
  const cfd = new ConditionalFreqDist(pairs);
  return pairs.map(([w1, w2]) => ({
    value: cfd.get(w1).freq(w2),
    key: bigramKey(w1, w2),
  }));
};

/** Distinct followers of w1, relative to the most varied word in the text */
export const bigramDiversity: Metric = (tokens) => {
  const pairs = bigrams(tokens);
  const cfd = new ConditionalFreqDist(pairs);
  const maxDiversity = cfd.maxDiversity();
  return pairs.map(([w1, w2]) => ({
    value: maxDiversity === 0 ? 0 : cfd.diversity(w1) / maxDiversity,
    key: bigramKey(w1, w2),
  }));
};

export const wordLength: Metric = (tokens) => {
  const lengths = tokens.map((word) => [...word].length);
  const maxLength = lengths.reduce((a, b) => Math.max(a, b), 1);
  return tokens.map((word, i) => ({
    value: (lengths[i] ?? 0) / maxLength,
    key: word,
  }));
};

export const wordPosition: Metric = (tokens) =>
  tokens.map((word, i) => ({ value: i / tokens.length, key: word }));

/** Each distinct word gets an id in order of first appearance */
export const uniqueWord: Metric = (tokens) => {
  const ids = new Map<string, number>();
  for (const word of tokens) {
    if (!ids.has(word)) ids.set(word, ids.size);
  }
  const maxId = ids.size > 1 ? ids.size - 1 : 1;
  return tokens.map((word): Sample => ({
    value: (ids.get(word) ?? 0) / maxId,
    key: word,
  }));
};

export const METRICS: Record<string, MetricEntry> = {
  'word-freq': {
    metric: wordFrequency,
    description: 'Color by word frequency (log scale). Common words = high value.',
  },
  'word-freq-linear': {
    metric: wordFrequencyLinear,
    description: 'Color by word frequency (linear scale). Common words = high value.',
  },
  'bigram-prob': {
    metric: bigramProbability,
    description: 'Color by conditional probability P(word2|word1) for each bigram.',
  },
  'bigram-diversity': {
    metric: bigramDiversity,
    description: 'Color by how many different words can follow each word.',
  },
  'word-length': {
    metric: wordLength,
    description: 'Color by word length (normalized).',
  },
  'word-position': {
    metric: wordPosition,
    description: 'Color by position in text (gradient from start to end).',
  },
  'unique-word': {
    metric: uniqueWord,
    description: 'Assign consistent value to each unique word (for random coloring).',
  },
};

/** Own-property lookup, so names like "toString" are unknown */
export function lookupMetric(name: string): MetricEntry | undefined {
  return Object.hasOwn(METRICS, name) ? METRICS[name] : undefined;
}
