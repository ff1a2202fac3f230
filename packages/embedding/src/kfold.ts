/**
 * Stratified k-fold partitioning.
 *
 * The members of each class are (optionally) shuffled and dealt round-robin
 * over the folds, so every fold holds roughly the same class proportions and
 * every index is held out exactly once.
 */
import { SeededRng, defaultKFoldOptions, shuffle, validateKFoldOptions, type KFoldOptions, type Label } from "@lexembed/core";
import { uniqueLabels } from "@lexembed/train";

export interface Fold {
  readonly train: number[];
  readonly test: number[];
}

export function stratifiedKFold(labels: readonly Label[], options: Partial<KFoldOptions> = {}): Fold[] {
  const opts: KFoldOptions = { ...defaultKFoldOptions, ...options };
  validateKFoldOptions(opts, labels.length);

  const rng = new SeededRng(opts.seed);
  const foldOf = new Int32Array(labels.length);
  // Continue dealing where the previous class stopped so small classes
  // do not all land in fold 0.
  let next = 0;
  for (const cls of uniqueLabels(labels)) {
    const members: number[] = [];
    labels.forEach((l, i) => {
      if (l === cls) members.push(i);
    });
    if (opts.shuffle) shuffle(members, rng);
    for (const i of members) {
      foldOf[i] = next;
      next = (next + 1) % opts.k;
    }
  }

  const folds: Fold[] = [];
  for (let f = 0; f < opts.k; f++) {
    const train: number[] = [];
    const test: number[] = [];
    for (let i = 0; i < labels.length; i++) (foldOf[i] === f ? test : train).push(i);
    folds.push({ train, test });
  }
  return folds;
}
