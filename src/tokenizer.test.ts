import { describe, it, expect } from 'vitest';
import { bigrams, tokenize } from './tokenizer.js';

describe('tokenize', () => {
  it('splits plain words in order, keeping duplicates', () => {
    expect(tokenize('the cat sat on the mat')).toEqual(['the', 'cat', 'sat', 'on', 'the', 'mat']);
  });

  it('makes punctuation its own token', () => {
    expect(tokenize('Hello, world!')).toEqual(['Hello', ',', 'world', '!']);
  });

  it('splits clitics and keeps ellipses whole', () => {
    expect(tokenize("Don't stop, it's late...")).toEqual([
      'Do', "n't", 'stop', ',', 'it', "'s", 'late', '...',
    ]);
  });

  it('keeps hyphenated words together', () => {
    expect(tokenize('rock-and-roll band')).toEqual(['rock-and-roll', 'band']);
  });

  it('handles non-ASCII letters', () => {
    expect(tokenize('Élan vital, über alles')).toEqual(['Élan', 'vital', ',', 'über', 'alles']);
  });

  it('keeps decomposed accents on their word', () => {
    expect(tokenize('cafe\u0301 au lait')).toEqual(['cafe\u0301', 'au', 'lait']);
  });

  it('keeps vowel signs and viramas inside Devanagari words', () => {
    const hindi = '\u0939\u093f\u0928\u094d\u0926\u0940';
    expect(tokenize(`${hindi} ${hindi}.`)).toEqual([hindi, hindi, '.']);
  });

  it('keeps decimals and grouped numbers whole', () => {
    expect(tokenize('it cost 3.14 or 1,000 dollars.')).toEqual([
      'it', 'cost', '3.14', 'or', '1,000', 'dollars', '.',
    ]);
    expect(tokenize('the 3rd of 12.')).toEqual(['the', '3rd', 'of', '12', '.']);
  });

  it('returns nothing for empty or blank text', () => {
    expect(tokenize('')).toEqual([]);
    expect(tokenize(' \n\t ')).toEqual([]);
  });
});

describe('bigrams', () => {
  it('pairs adjacent tokens', () => {
    expect(bigrams(['a', 'b', 'c'])).toEqual([['a', 'b'], ['b', 'c']]);
  });

  it('yields length - 1 pairs', () => {
    const tokens = tokenize('the cat sat on the mat');
    expect(bigrams(tokens)).toHaveLength(tokens.length - 1);
  });

  it('returns nothing for fewer than two tokens', () => {
    expect(bigrams([])).toEqual([]);
    expect(bigrams(['a'])).toEqual([]);
  });
});
