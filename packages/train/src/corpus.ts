/**
 * Corpus encoding and the feasibility filter.
 */
import type { Tokenizer } from "@lexembed/core";
import { Counter, type Vocabulary } from "@lexembed/tokenizers";

export interface EncodedCorpus {
  /** Canonical token sequence of every record, in corpus order. */
  readonly records: string[][];
  /** Token occurrences over the whole corpus (not de-duplicated per record). */
  readonly counts: Counter;
}

export function encodeCorpus(tokenizer: Tokenizer, texts: Iterable<string>): EncodedCorpus {
  const records: string[][] = [];
  const counts = new Counter();
  for (const text of texts) {
    const tokens = tokenizer.tokenize(text);
    counts.update(tokens);
    records.push(tokens);
  }
  return { records, counts };
}

export interface FeasibleToken {
  /** Position in the lexicographically sorted vocabulary. */
  readonly index: number;
  readonly label: string;
  readonly count: number;
}

/** Vocabulary tokens, sorted, that occur at least `minPos` times. */
export function feasibleTokens(vocabulary: Vocabulary, counts: Counter, minPos: number): FeasibleToken[] {
  const sorted = [...vocabulary.tokens].sort();
  const out: FeasibleToken[] = [];
  sorted.forEach((label, index) => {
    const count = counts.get(label);
    if (count >= minPos) out.push({ index, label, count });
  });
  return out;
}
