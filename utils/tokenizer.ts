import stopwordList from '../data/stopwords.json';

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * Lower-cases and splits on anything that is not a letter or digit.
 * Stop words are dropped unless `keepStopwords` is set.
 */
export function tokenize(text: string, keepStopwords: boolean = false): string[] {
  const tokens = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
  return keepStopwords ? tokens : tokens.filter(token => !STOPWORDS.has(token));
}

export function termFrequencies(tokens: string[]): Map<string, number> {
  const frequencies = new Map<string, number>();
  for (const token of tokens) {
    frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
  }
  return frequencies;
}
