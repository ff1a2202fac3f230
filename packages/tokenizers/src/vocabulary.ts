/**
 * Immutable vocabulary built from a persisted artifact.
 *
 * Ids are dense and follow the counter's entry order. The IDF weight of a
 * token is `log2(N) - log2(freq)`, where `N` is the counter's update count.
 */
import { VocabularyError, type TextModelParams, type VocabularyArtifact } from "@lexembed/core";
import { QGRAM_PREFIX } from "./text.js";

export class Vocabulary {
  readonly params: TextModelParams;
  readonly tokens: readonly string[];
  readonly frequencies: Float64Array;
  readonly idf: Float64Array;
  readonly updateCalls: number;
  private readonly _ids: ReadonlyMap<string, number>;

  private constructor(params: TextModelParams, tokens: string[], freqs: number[], updateCalls: number) {
    this.params = params;
    this.tokens = tokens;
    this.frequencies = Float64Array.from(freqs);
    this.updateCalls = updateCalls;
    this._ids = new Map(tokens.map((t, i) => [t, i]));

    const logN = updateCalls > 0 ? Math.log2(updateCalls) : 0;
    this.idf = new Float64Array(tokens.length);
    for (let i = 0; i < tokens.length; i++) {
      // Zero-frequency entries carry no weight.
      this.idf[i] = freqs[i] > 0 ? logN - Math.log2(freqs[i]) : 0;
    }
  }

  static fromArtifact(artifact: VocabularyArtifact): Vocabulary {
    const tokens: string[] = [];
    const freqs: number[] = [];
    for (const [token, freq] of Object.entries(artifact.counter.dict)) {
      if (!Number.isFinite(freq)) {
        throw new VocabularyError({ message: `Non-numeric frequency for token "${token}"` });
      }
      tokens.push(token);
      freqs.push(freq);
    }
    return new Vocabulary(artifact.params, tokens, freqs, artifact.counter.update_calls);
  }

  get size(): number {
    return this.tokens.length;
  }

  id(token: string): number | undefined {
    return this._ids.get(token);
  }

  has(token: string): boolean {
    return this._ids.has(token);
  }

  frequency(token: string): number {
    const i = this._ids.get(token);
    return i === undefined ? 0 : this.frequencies[i];
  }

  toArtifact(): VocabularyArtifact {
    const dict: Record<string, number> = {};
    for (let i = 0; i < this.tokens.length; i++) dict[this.tokens[i]] = this.frequencies[i];
    return { params: this.params, counter: { dict, update_calls: this.updateCalls } };
  }
}

export function isQGram(token: string): boolean {
  return token.startsWith(QGRAM_PREFIX);
}
