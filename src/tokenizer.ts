// Word tokenizer in the style of the Penn Treebank conventions:
// punctuation becomes its own token, clitics split off the word they
// attach to ("don't" -> "do", "n't"), hyphenated words stay whole.
// Combining marks belong to the word they follow; numbers keep their
// decimal point and group separators ("3.14", "1,000").

const WORD_RE =
  /\p{N}+(?:[.,]\p{N}+)+|[\p{L}\p{M}\p{N}]+(?:['’-][\p{L}\p{M}\p{N}]+)*|\.\.\.|--|[^\p{L}\p{M}\p{N}\s]/gu;

const CLITIC_RE = /^(.+?)(n['’]t|['’](?:s|re|ve|ll|d|m))$/iu;

function splitClitic(word: string): string[] {
  const match = CLITIC_RE.exec(word);
  if (!match || match[1] === undefined || match[2] === undefined) return [word];
  return [match[1], match[2]];
}

/** Split text into an ordered sequence of word and punctuation tokens. */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const match of text.matchAll(WORD_RE)) {
    tokens.push(...splitClitic(match[0]));
  }
  return tokens;
}

/** Adjacent token pairs, in text order. Fewer than two tokens gives none. */
export function bigrams(tokens: readonly string[]): [string, string][] {
  const pairs: [string, string][] = [];
  for (let i = 0; i + 1 < tokens.length; i++) {
    const w1 = tokens[i];
    const w2 = tokens[i + 1];
    if (w1 === undefined || w2 === undefined) break;
    pairs.push([w1, w2]);
  }
  return pairs;
}
