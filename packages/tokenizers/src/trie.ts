/**
 * Character trie and the greedy longest-match segmentation automaton.
 */
import { BOUNDARY } from "./text.js";

export interface TrieNode {
  readonly kids: Map<string, TrieNode>;
  /** Canonical token for a surface ending here. */
  label?: string;
}

/** Half-open `[start, end)` range over the segmented text. */
export interface Span {
  readonly start: number;
  readonly end: number;
  readonly token: string;
}

function node(): TrieNode {
  return { kids: new Map() };
}

/**
 * Build a trie from `surface -> canonical token` entries. A later entry for the
 * same surface replaces the earlier label.
 */
export function buildTrie(entries: Iterable<readonly [string, string]>): TrieNode {
  const root = node();
  for (const [surface, label] of entries) {
    if (surface.length === 0) continue;
    let cur = root;
    for (let i = 0; i < surface.length; i++) {
      const ch = surface[i];
      let next = cur.kids.get(ch);
      if (next === undefined) {
        next = node();
        cur.kids.set(ch, next);
      }
      cur = next;
    }
    cur.label = label;
  }
  return root;
}

/**
 * Segment `text` by longest match from each start position.
 *
 * Three cursors `init <= end <= i`: `i` walks the trie, `end` is the end of the
 * longest terminal reached from `init`. When a match of two or more
 * characters ends in the boundary marker, the next attempt starts on that
 * marker so adjacent q-grams share it. Characters that start no match are
 * skipped one at a time; trailing characters consumed after the last
 * terminal are dropped.
 */
export function segment(root: TrieNode, text: string): Span[] {
  const spans: Span[] = [];
  let init = 0;
  let end = 0;
  let i = 0;
  let label = "";
  let cur = root;

  while (i < text.length) {
    const next = cur.kids.get(text[i]);
    if (next !== undefined) {
      cur = next;
      i++;
      if (next.label !== undefined) {
        end = i;
        label = next.label;
      }
      continue;
    }

    cur = root;
    if (end > init) {
      spans.push({ start: init, end, token: label });
      if (end - init >= 2 && text[end - 1] === BOUNDARY) {
        init = i = end = end - 1;
      } else {
        init = i = end;
      }
    } else if (i > init) {
      if (i - init >= 2 && text[i - 1] === BOUNDARY) {
        init = end = i = i - 1;
      } else {
        init = end = i;
      }
    } else {
      init++;
      i = end = init;
    }
  }

  if (end > init) spans.push({ start: init, end, token: label });
  return spans;
}
