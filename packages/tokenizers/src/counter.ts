/**
 * Insertion-ordered frequency table.
 *
 * `updateCalls` counts how many records were folded in through `update`, which
 * is the document count IDF weights are computed against.
 */
import type { CounterRecord } from "@lexembed/core";

export class Counter {
  private readonly _counts = new Map<string, number>();
  updateCalls: number;

  constructor(entries?: Iterable<readonly [string, number]>, updateCalls = 0) {
    this.updateCalls = updateCalls;
    if (entries) {
      for (const [token, count] of entries) this._counts.set(token, count);
    }
  }

  static fromRecord(record: CounterRecord): Counter {
    return new Counter(Object.entries(record.dict), record.update_calls);
  }

  get size(): number {
    return this._counts.size;
  }

  get(token: string): number {
    return this._counts.get(token) ?? 0;
  }

  has(token: string): boolean {
    return this._counts.has(token);
  }

  /** Count every element of `tokens` once more and register one update call. */
  update(tokens: Iterable<string>): void {
    for (const t of tokens) this._counts.set(t, (this._counts.get(t) ?? 0) + 1);
    this.updateCalls++;
  }

  /** Add `by` to one token without registering an update call. */
  increment(token: string, by = 1): void {
    this._counts.set(token, (this._counts.get(token) ?? 0) + by);
  }

  set(token: string, count: number): void {
    this._counts.set(token, count);
  }

  keys(): IterableIterator<string> {
    return this._counts.keys();
  }

  entries(): IterableIterator<[string, number]> {
    return this._counts.entries();
  }

  /**
   * Entries by descending count; equal counts keep first-insertion order.
   * Returns all entries when `n` is omitted.
   */
  mostCommon(n?: number): [string, number][] {
    const sorted = [...this._counts.entries()].sort((a, b) => b[1] - a[1]);
    return n === undefined ? sorted : sorted.slice(0, n);
  }

  /** Persisted form, most common first. */
  toRecord(n?: number): CounterRecord {
    return {
      dict: Object.fromEntries(this.mostCommon(n)),
      update_calls: this.updateCalls,
    };
  }

  /** Persisted form in insertion order. */
  toInsertionRecord(): CounterRecord {
    return {
      dict: Object.fromEntries(this._counts),
      update_calls: this.updateCalls,
    };
  }
}
