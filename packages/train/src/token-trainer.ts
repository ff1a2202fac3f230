/**
 * Per-token classifier training.
 *
 * Each feasible token gets its own balanced dataset and its own classifier,
 * cloned from the `ClassifierService` prototype. Tasks share only read-only
 * inputs, so they fan out with bounded concurrency.
 */
import { Effect } from "effect";
import {
  ClassifierError,
  ClassifierService,
  SeededRng,
  castTo,
  row,
  type LinearClassifier,
  type Rng,
  type TrainConfig,
} from "@lexembed/core";
import { project, type Projection, type Vocabulary } from "@lexembed/tokenizers";
import type { TrainedTokenArtifact } from "./artifact.js";
import type { FeasibleToken } from "./corpus.js";
import { buildDataset } from "./dataset.js";

export interface TokenTrainingInput {
  readonly vocabulary: Vocabulary;
  /** Encoded corpus, read-only. */
  readonly records: readonly (readonly string[])[];
  readonly projection: Projection;
  readonly config: Pick<TrainConfig, "maxPos" | "negativeCap" | "precision">;
}

/** Train one token. Succeeds with `null` when a class ends up empty. */
export function trainToken(
  label: string,
  input: TokenTrainingInput,
  classifier: LinearClassifier,
  rng: Rng,
): Effect.Effect<TrainedTokenArtifact | null, ClassifierError> {
  const dataset = buildDataset(label, input.records, {
    maxPos: input.config.maxPos,
    negativeCap: input.config.negativeCap,
    rng,
  });
  if (dataset === null) {
    return Effect.logDebug("skipped: empty class").pipe(
      Effect.annotateLogs({ label }),
      Effect.as(null),
    );
  }

  return Effect.try({
    try: () => {
      const x = project([...dataset.positives, ...dataset.negatives], input.projection, input.vocabulary);
      const y = [...dataset.positives.map(() => 1), ...dataset.negatives.map(() => 0)];
      classifier.fit(x, y);
      const artifact: TrainedTokenArtifact = {
        label,
        N: y.length,
        coef: castTo(row(classifier.coef, 0), input.config.precision),
        intercept: classifier.intercept[0],
      };
      return artifact;
    },
    catch: (cause) =>
      new ClassifierError({
        message: `Classifier failed for token "${label}": ${cause instanceof Error ? cause.message : String(cause)}`,
        label,
        cause,
      }),
  });
}

export interface TrainTokensOptions {
  readonly concurrency: number;
  readonly seed: number;
}

/**
 * Train every token in `tokens`. Artifacts come back in input order, skipped
 * tokens omitted. Token `i` samples with a generator seeded `seed + i`.
 */
export function trainTokens(
  tokens: readonly FeasibleToken[],
  input: TokenTrainingInput,
  options: TrainTokensOptions,
): Effect.Effect<TrainedTokenArtifact[], ClassifierError, ClassifierService> {
  return Effect.gen(function* () {
    const prototype = yield* ClassifierService;
    yield* Effect.logInfo(`training ${tokens.length} tokens`).pipe(
      Effect.annotateLogs({ classifier: prototype.name, concurrency: options.concurrency }),
    );

    const results = yield* Effect.forEach(
      tokens,
      (token, i) =>
        Effect.suspend(() => trainToken(token.label, input, prototype.clone(), new SeededRng(options.seed + i))).pipe(
          Effect.tap((artifact) =>
            artifact === null
              ? Effect.void
              : Effect.logDebug("trained").pipe(Effect.annotateLogs({ label: token.label, N: artifact.N })),
          ),
        ),
      { concurrency: options.concurrency },
    );

    const trained = results.filter((a): a is TrainedTokenArtifact => a !== null);
    yield* Effect.logInfo("training done").pipe(
      Effect.annotateLogs({ trained: trained.length, skipped: tokens.length - trained.length }),
    );
    return trained;
  });
}
