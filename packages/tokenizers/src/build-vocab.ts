/**
 * Vocabulary size reduction.
 *
 * Starts from the `2^k` most frequent words of a base vocabulary and, for each
 * configured q-gram length from longest to shortest, re-tokenizes every base
 * word against the current tokens plus that length's q-grams, keeping the
 * `2^k` tokens with the largest frequency-weighted credit. A final pass over
 * the corpus replaces the credits with true per-record counts.
 */
import { Effect } from "effect";
import {
  ConfigError,
  VocabularyError,
  validateVocabularyConfig,
  type VocabularyArtifact,
  type VocabularyConfig,
} from "@lexembed/core";
import { Counter } from "./counter.js";
import { BOUNDARY, QGRAM_PREFIX } from "./text.js";
import { SeqTokenizer } from "./seq.js";
import { emojiSymbols, type SymbolTable } from "./symbols.js";
import { Vocabulary } from "./vocabulary.js";

/** Decides whether a q-gram surface of `length` characters takes part. */
export type Admissibility = (surface: string, length: number) => boolean;

export const admitAll: Admissibility = () => true;

/** Below length 4, only q-grams touching a word boundary. */
export const prefixSuffix: Admissibility = (surface, length) =>
  length >= 4 || surface.startsWith(BOUNDARY) || surface.endsWith(BOUNDARY);

export interface VocabularyBuildOptions extends VocabularyConfig {
  /** Overrides the filter selected by `prefixSuffix`. */
  readonly admissible?: Admissibility;
  readonly symbols?: SymbolTable;
}

export interface VocabularyBuildReport {
  readonly artifact: VocabularyArtifact;
  /**
   * Per q-gram length: word characters (boundary markers excluded) left
   * outside every span of that length's tokenizer, weighted by word frequency.
   */
  readonly uncovered: ReadonlyMap<number, number>;
  /** Corpus records read by the final pass. */
  readonly records: number;
}

function codePoints(s: string): number {
  return [...s].length;
}

function attempt<A>(what: string, f: () => A): Effect.Effect<A, VocabularyError> {
  return Effect.try({
    try: f,
    catch: (cause) =>
      cause instanceof VocabularyError
        ? cause
        : new VocabularyError({ message: `${what}: ${cause instanceof Error ? cause.message : String(cause)}`, cause }),
  });
}

interface Credit {
  readonly counter: Counter;
  readonly uncovered: number;
}

function creditWords(tokenizer: SeqTokenizer, words: readonly string[], base: Counter): Credit {
  const counter = new Counter();
  let uncovered = 0;
  for (const word of words) {
    const freq = base.get(word);
    const normalized = tokenizer.textModel.normalize(word);
    const spans = tokenizer.spans(normalized);
    const covered = new Uint8Array(normalized.length);
    const tokens = new Set<string>();
    for (const s of spans) {
      covered.fill(1, s.start, s.end);
      tokens.add(s.token);
    }
    tokens.delete(BOUNDARY);
    for (const t of tokens) counter.increment(t, freq);
    for (let i = 0; i < normalized.length; i++) {
      if (covered[i] === 0 && normalized[i] !== BOUNDARY) uncovered += freq;
    }
  }
  return { counter, uncovered };
}

export function buildVocabulary(
  base: VocabularyArtifact,
  corpus: Iterable<string>,
  options: VocabularyBuildOptions,
): Effect.Effect<VocabularyBuildReport, VocabularyError | ConfigError> {
  return Effect.gen(function* () {
    yield* Effect.try({
      try: () => validateVocabularyConfig(options),
      catch: (cause) =>
        cause instanceof ConfigError ? cause : new ConfigError({ message: String(cause), cause }),
    });

    const budget = 2 ** options.sizeExponent;
    const admissible = options.admissible ?? (options.prefixSuffix ? prefixSuffix : admitAll);
    const symbols = options.symbols ?? emojiSymbols;
    const baseCounter = Counter.fromRecord(base.counter);
    const params = base.params;

    const words = [...baseCounter.keys()].filter((k) => !k.startsWith(QGRAM_PREFIX));
    const wordSet = new Set(words);
    let current = baseCounter
      .mostCommon()
      .filter(([k]) => wordSet.has(k))
      .slice(0, budget)
      .map(([k]) => k);
    let credited: Counter | undefined;

    const lengths = params.tokenList.filter((q) => q > 0).sort((a, b) => b - a);
    const uncovered = new Map<number, number>();

    for (const length of lengths) {
      const tokenizer = yield* attempt(`temporary tokenizer for length ${length}`, () => {
        const temp = new Counter(undefined, baseCounter.updateCalls);
        for (const [k, v] of baseCounter.entries()) {
          if (!k.startsWith(QGRAM_PREFIX)) continue;
          const surface = k.slice(QGRAM_PREFIX.length);
          if (codePoints(surface) !== length || !admissible(surface, length)) continue;
          temp.set(k, v);
        }
        for (const token of current) {
          const freq = baseCounter.get(token);
          if (freq === 0) continue;
          temp.set(token, freq);
        }
        return new SeqTokenizer(
          Vocabulary.fromArtifact({ params, counter: temp.toInsertionRecord() }),
          { symbols, sizeExponent: options.sizeExponent },
        );
      });

      const credit = yield* attempt(`re-tokenizing words at length ${length}`, () =>
        creditWords(tokenizer, words, baseCounter),
      );
      credited = credit.counter;
      current = credit.counter.mostCommon(budget).map(([k]) => k);
      uncovered.set(length, credit.uncovered);

      yield* Effect.logInfo(`q-gram length ${length}`).pipe(
        Effect.annotateLogs({
          candidates: tokenizer.vocabSize,
          kept: current.length,
          uncovered: credit.uncovered,
        }),
      );
    }

    const finalCounter = credited ?? baseCounter;
    const selected = new Counter(
      current.map((k): [string, number] => [k, finalCounter.get(k)]),
      baseCounter.updateCalls,
    );

    const result = yield* attempt("final corpus pass", () => {
      const tokenizer = new SeqTokenizer(
        Vocabulary.fromArtifact({ params, counter: selected.toInsertionRecord() }),
        { symbols, sizeExponent: options.sizeExponent },
      );
      const counter = new Counter();
      for (const text of corpus) {
        if (options.limit !== undefined && counter.updateCalls >= options.limit) break;
        counter.update(new Set(tokenizer.tokenize(text)));
      }
      return counter;
    });

    yield* Effect.logInfo("vocabulary built").pipe(
      Effect.annotateLogs({ records: result.updateCalls, tokens: Math.min(result.size, budget) }),
    );

    return {
      artifact: { params, counter: result.toRecord(budget) },
      uncovered,
      records: result.updateCalls,
    };
  });
}
