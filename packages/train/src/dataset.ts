/**
 * Balanced per-token dataset construction.
 *
 * One pass over the encoded corpus. Records containing the label become
 * positives (with the label removed); the rest feed a bounded negative pool.
 * While `negatives - positives < negativeCap` a negative is appended;
 * otherwise a uniformly random slot of the pool is overwritten. The scan stops
 * once positives exceed `maxPos`.
 */
import { shuffle, type Rng } from "@lexembed/core";

export interface DatasetOptions {
  readonly maxPos: number;
  readonly negativeCap: number;
  readonly rng: Rng;
  /** Called after every scanned record with the current class sizes. */
  readonly onScan?: (positives: number, negatives: number) => void;
}

export interface TokenDataset {
  readonly label: string;
  /** De-duplicated token sets, label removed. */
  readonly positives: string[][];
  readonly negatives: string[][];
}

function tokenSet(record: readonly string[], without?: string): string[] {
  const set = new Set(record);
  if (without !== undefined) set.delete(without);
  return [...set];
}

/**
 * Returns `null` when either class is empty. Otherwise both classes have the
 * same size: negatives are shuffled, then both are cut to the smaller count.
 */
export function buildDataset(
  label: string,
  records: readonly (readonly string[])[],
  options: DatasetOptions,
): TokenDataset | null {
  const positives: string[][] = [];
  const negatives: string[][] = [];

  for (const record of records) {
    if (record.includes(label)) {
      positives.push(tokenSet(record, label));
    } else if (negatives.length - positives.length < options.negativeCap) {
      negatives.push(tokenSet(record));
    } else {
      negatives[options.rng.nextInt(negatives.length)] = tokenSet(record);
    }
    options.onScan?.(positives.length, negatives.length);
    if (positives.length > options.maxPos) break;
  }

  if (positives.length === 0 || negatives.length === 0) return null;

  shuffle(negatives, options.rng);
  const n = Math.min(positives.length, negatives.length);
  return { label, positives: positives.slice(0, n), negatives: negatives.slice(0, n) };
}
