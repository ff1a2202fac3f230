/**
 * @lexembed/tokenizers -- base text model, trie tokenizer and vocabulary
 * construction.
 *
 * The tokenizer registry maps a name to a factory taking a vocabulary
 * artifact, so the rest of the system can look tokenizers up by name.
 */
import { Registry, type Tokenizer, type VocabularyArtifact } from "@lexembed/core";
import { SeqTokenizer } from "./seq.js";
import { noSymbols } from "./symbols.js";

// ── Re-exports ────────────────────────────────────────────────────────────
export { Counter } from "./counter.js";
export { TextModel, computeBaseVocabulary, BOUNDARY, QGRAM_PREFIX } from "./text.js";
export { Vocabulary, isQGram } from "./vocabulary.js";
export { buildTrie, segment, type TrieNode, type Span } from "./trie.js";
export { SeqTokenizer, surfaceForms, type SeqTokenizerOptions } from "./seq.js";
export { emojiSymbols, noSymbols, loadSymbolTable, parseSymbolTable, type SymbolTable } from "./symbols.js";
export {
  buildVocabulary,
  admitAll,
  prefixSuffix,
  type Admissibility,
  type VocabularyBuildOptions,
  type VocabularyBuildReport,
} from "./build-vocab.js";
export {
  indicatorProjection,
  tfidfProjection,
  projectionFor,
  project,
  type Projection,
} from "./bow.js";
export {
  saveVocabulary,
  loadVocabulary,
  parseVocabularyArtifact,
  encodeFile,
  decodeFile,
} from "./persist.js";

// ── Tokenizer registry ────────────────────────────────────────────────────

export type TokenizerFactory = (artifact: VocabularyArtifact) => Tokenizer;

/**
 * Pre-registered implementations:
 * - `"seq"`       -- trie tokenizer with the bundled emoji table
 * - `"seq-plain"` -- trie tokenizer without symbols
 */
export const tokenizerRegistry = new Registry<TokenizerFactory>("tokenizer");

tokenizerRegistry.register("seq", (artifact) => SeqTokenizer.fromArtifact(artifact));
tokenizerRegistry.register("seq-plain", (artifact) => SeqTokenizer.fromArtifact(artifact, { symbols: noSymbols }));
