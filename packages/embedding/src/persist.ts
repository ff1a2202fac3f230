import { Effect } from "effect";
import {
  ArtifactError,
  ConfigError,
  defaultEmbeddingOptions,
  type EmbeddingOptions,
  type Precision,
} from "@lexembed/core";
import { loadModelArtifact } from "@lexembed/train";
import { EmbeddingModel, type EmbeddingModelDeps } from "./model.js";

export interface LoadEmbeddingOptions extends EmbeddingModelDeps {
  /** Precision the coefficients were written at; defaults to `options.precision`. */
  readonly stored?: Precision;
}

/** Read a model artifact and assemble it. */
export function loadEmbeddingModel(
  path: string,
  options: Partial<EmbeddingOptions> = {},
  load: LoadEmbeddingOptions = {},
): Effect.Effect<EmbeddingModel, ArtifactError | ConfigError> {
  const precision = options.precision ?? defaultEmbeddingOptions.precision;
  return loadModelArtifact(path, load.stored ?? precision).pipe(
    Effect.flatMap((artifact) =>
      Effect.try({
        try: () => EmbeddingModel.assemble(artifact, options, load),
        catch: (cause) =>
          cause instanceof ArtifactError || cause instanceof ConfigError
            ? cause
            : new ArtifactError({ message: `Failed to assemble "${path}"`, path, cause }),
      }),
    ),
    Effect.tap((model) =>
      Effect.logInfo("embedding model loaded").pipe(
        Effect.annotateLogs({ path, rows: model.weights.rows, vocabulary: model.tokenizer.vocabSize }),
      ),
    ),
  );
}
