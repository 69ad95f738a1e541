import { describe, it, expect } from 'vitest';
import { redBlue } from './colors.js';
import {
  METRICS,
  bigramDiversity,
  bigramProbability,
  logFrequencyRatio,
  uniqueWord,
  wordFrequency,
  wordFrequencyLinear,
  wordLength,
  wordPosition,
} from './metrics.js';
import { tokenize } from './tokenizer.js';

const values = (samples: { value: number }[]) => samples.map((s) => s.value);

describe('logFrequencyRatio', () => {
  it('is ln(count) / ln(max)', () => {
    expect(logFrequencyRatio(4, 4)).toBe(1);
    expect(logFrequencyRatio(2, 4)).toBeCloseTo(0.5);
  });

  it('is 0 for single occurrences and degenerate maxima', () => {
    expect(logFrequencyRatio(1, 5)).toBe(0);
    expect(logFrequencyRatio(0, 5)).toBe(0);
    expect(logFrequencyRatio(1, 1)).toBe(0);
  });
});

describe('word metrics', () => {
  const tokens = tokenize('the cat sat on the mat');

  it('word-freq scores the repeated word highest', () => {
    const samples = wordFrequency(tokens);
    expect(values(samples)).toEqual([1, 0, 0, 0, 1, 0]);
    expect(samples.map((s) => s.key)).toEqual(tokens);
  });

  it('word-freq red channel follows count', () => {
    const samples = wordFrequency(['a', 'a', 'a', 'a', 'b', 'b', 'c']);
    const reds = samples.map((s) => redBlue(s)[0]);
    expect(reds).toEqual([255, 255, 255, 255, 127, 127, 0]);
  });

  it('word-freq is all zero when every word is unique', () => {
    expect(values(wordFrequency(['x', 'y', 'z']))).toEqual([0, 0, 0]);
  });

  it('word-freq-linear divides by the top count', () => {
    expect(values(wordFrequencyLinear(tokens))).toEqual([1, 0.5, 0.5, 0.5, 1, 0.5]);
  });

  it('word-length is relative to the longest word', () => {
    expect(values(wordLength(['a', 'abc', 'ab']))).toEqual([1 / 3, 1, 2 / 3]);
  });

  it('word-position runs from 0 towards 1', () => {
    expect(values(wordPosition(['a', 'b', 'c', 'd']))).toEqual([0, 0.25, 0.5, 0.75]);
  });

  it('unique-word numbers words by first appearance', () => {
    expect(values(uniqueWord(['x', 'y', 'x', 'z']))).toEqual([0, 0.5, 0, 1]);
    expect(values(uniqueWord(['x', 'x']))).toEqual([0, 0]);
  });
});

describe('bigram metrics', () => {
  const tokens = tokenize('a b a c a d');

  it('bigram-diversity gives the most varied word full intensity', () => {
    const samples = bigramDiversity(tokens);
    expect(samples.map((s) => s.key)).toEqual(['a b', 'b a', 'a c', 'c a', 'a d']);
    expect(values(samples)).toEqual([1, 1 / 3, 1, 1 / 3, 1]);
  });

  it('bigram-prob is P(w2 | w1)', () => {
    expect(values(bigramProbability(tokens))).toEqual([1 / 3, 1, 1 / 3, 1, 1 / 3]);
  });

  it('has one item per adjacent pair', () => {
    expect(bigramDiversity(['only'])).toEqual([]);
    expect(bigramProbability(['x', 'y'])).toHaveLength(1);
  });
});

describe('METRICS', () => {
  it('yields nothing for empty input', () => {
    for (const { metric } of Object.values(METRICS)) {
      expect(metric([])).toEqual([]);
    }
  });

  it('keeps every value in 0-1', () => {
    const tokens = tokenize('It was the best of times, it was the worst of times.');
    for (const { metric } of Object.values(METRICS)) {
      for (const { value } of metric(tokens)) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
      }
    }
  });
});
