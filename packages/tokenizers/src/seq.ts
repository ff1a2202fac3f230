/**
 * Sub-word tokenizer over a fixed vocabulary.
 *
 * Text is normalized by the base text model and segmented against a trie of
 * surface forms. Surfaces are registered in vocabulary id order: a word `w`
 * as `~w~`; a q-gram `q:s` as `s` unless `s` is already taken; then every
 * symbol-table entry `k` as `k`, `~k~`, `~k` and `k~`, replacing earlier
 * registrations.
 */
import type { Tokenizer, VocabularyArtifact } from "@lexembed/core";
import { BOUNDARY, QGRAM_PREFIX, TextModel } from "./text.js";
import { buildTrie, segment, type Span, type TrieNode } from "./trie.js";
import { emojiSymbols, type SymbolTable } from "./symbols.js";
import { Vocabulary } from "./vocabulary.js";

export interface SeqTokenizerOptions {
  /** Defaults to the bundled emoji table. */
  readonly symbols?: SymbolTable;
  /** Recorded in `identifier`; defaults to log2 of the vocabulary size. */
  readonly sizeExponent?: number;
}

export function surfaceForms(vocabulary: Vocabulary, symbols: SymbolTable): Map<string, string> {
  const surfaces = new Map<string, string>();
  for (const token of vocabulary.tokens) {
    if (token.startsWith(QGRAM_PREFIX)) {
      const s = token.slice(QGRAM_PREFIX.length);
      if (!surfaces.has(s)) surfaces.set(s, token);
    } else {
      surfaces.set(`${BOUNDARY}${token}${BOUNDARY}`, token);
    }
  }
  for (const [k, v] of symbols) {
    surfaces.set(k, v);
    surfaces.set(`${BOUNDARY}${k}${BOUNDARY}`, v);
    surfaces.set(`${BOUNDARY}${k}`, v);
    surfaces.set(`${k}${BOUNDARY}`, v);
  }
  return surfaces;
}

export class SeqTokenizer implements Tokenizer {
  readonly name = "seq";
  readonly vocabulary: Vocabulary;
  readonly textModel: TextModel;
  readonly sizeExponent: number;

  private readonly _symbols: SymbolTable;
  private readonly _surfaces: ReadonlyMap<string, string>;
  private readonly _trie: TrieNode;

  constructor(vocabulary: Vocabulary, options: SeqTokenizerOptions = {}) {
    this.vocabulary = vocabulary;
    this.textModel = new TextModel(vocabulary.params);
    this._symbols = options.symbols ?? emojiSymbols;
    this.sizeExponent = options.sizeExponent ?? Math.ceil(Math.log2(Math.max(vocabulary.size, 1)));
    this._surfaces = surfaceForms(vocabulary, this._symbols);
    this._trie = buildTrie(this._surfaces);
  }

  static fromArtifact(artifact: VocabularyArtifact, options: SeqTokenizerOptions = {}): SeqTokenizer {
    return new SeqTokenizer(Vocabulary.fromArtifact(artifact), options);
  }

  get vocabSize(): number {
    return this.vocabulary.size;
  }

  get symbols(): SymbolTable {
    return this._symbols;
  }

  get identifier(): string {
    return `seqtm_${this.vocabulary.params.lang}_${this.sizeExponent}`;
  }

  /** Spans over the normalized text. */
  spans(normalized: string): Span[] {
    return segment(this._trie, normalized);
  }

  tokenize(text: string): string[] {
    const normalized = this.textModel.normalize(text);
    return this.spans(normalized).map((s) => {
      const raw = normalized.slice(s.start, s.end);
      return this._surfaces.get(raw) ?? raw;
    });
  }

  encode(text: string): Int32Array {
    const ids: number[] = [];
    for (const token of this.tokenize(text)) {
      const id = this.vocabulary.id(token);
      if (id !== undefined) ids.push(id);
    }
    return Int32Array.from(ids);
  }
}
