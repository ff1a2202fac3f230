/**
 * Base text model.
 *
 * Normalizes a text into the boundary-marked form `~w1~w2~…~` and emits the
 * raw candidate strings a vocabulary is counted from: whole words and
 * `q:`-prefixed character q-grams of every `~word~`.
 */
import { Effect } from "effect";
import {
  TokenizerError,
  defaultTextModelParams,
  type BaseTokenizer,
  type TextModelParams,
  type VocabularyArtifact,
} from "@lexembed/core";
import { Counter } from "./counter.js";

/** Synthetic character marking the start and end of every word. */
export const BOUNDARY = "~";

/** Prefix of persisted q-gram tokens. */
export const QGRAM_PREFIX = "q:";

const URL_RE = /https?:\/\/\S+/gu;
const USER_RE = /@\S+/gu;
const MARK_RE = /\p{M}/gu;
const PUNCT_RE = /\p{P}/gu;

export class TextModel implements BaseTokenizer {
  readonly params: TextModelParams;

  constructor(params: Partial<TextModelParams> = {}) {
    this.params = { ...defaultTextModelParams, ...params };
  }

  /** The words of `text` after every configured transformation. */
  words(text: string): string[] {
    const p = this.params;
    let t = text;
    if (p.deleteUrls) t = t.replace(URL_RE, " ");
    if (p.deleteUsers) t = t.replace(USER_RE, " ");
    if (p.lowercase) t = t.toLowerCase();
    if (p.stripDiacritics) t = t.normalize("NFD").replace(MARK_RE, "").normalize("NFC");
    if (p.stripPunctuation) t = t.replace(PUNCT_RE, "");
    // The marker is reserved.
    t = t.replaceAll(BOUNDARY, " ");
    return t.split(/\s+/u).filter((w) => w.length > 0);
  }

  normalize(text: string): string {
    const words = this.words(text);
    if (words.length === 0) return "";
    return `${BOUNDARY}${words.join(BOUNDARY)}${BOUNDARY}`;
  }

  tokenize(text: string): string[] {
    const words = this.words(text);
    const out: string[] = [];
    for (const q of this.params.tokenList) {
      if (q === -1) {
        out.push(...words);
        continue;
      }
      if (q <= 0) continue;
      for (const w of words) {
        // Code points, so surrogate pairs stay whole.
        const chars = [...`${BOUNDARY}${w}${BOUNDARY}`];
        for (let i = 0; i + q <= chars.length; i++) {
          out.push(QGRAM_PREFIX + chars.slice(i, i + q).join(""));
        }
      }
    }
    return out;
  }
}

/**
 * Count the de-duplicated base tokens of every record.
 *
 * `update_calls` of the result is the number of records counted.
 */
export function computeBaseVocabulary(
  texts: Iterable<string>,
  textModel: TextModel,
  limit?: number,
): Effect.Effect<VocabularyArtifact, TokenizerError> {
  return Effect.try({
    try: () => {
      const counter = new Counter();
      let seen = 0;
      for (const text of texts) {
        if (limit !== undefined && seen >= limit) break;
        counter.update(new Set(textModel.tokenize(text)));
        seen++;
      }
      return { params: textModel.params, counter: counter.toRecord() };
    },
    catch: (cause) =>
      new TokenizerError({ message: `Base vocabulary computation failed: ${String(cause)}`, cause }),
  });
}
