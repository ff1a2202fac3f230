/**
 * Typed error classes for every subsystem.
 *
 * Out-of-vocabulary tokens, infeasible tokens and degenerate classes are
 * expected outcomes and never surface as errors.
 */
import { Data } from "effect";

export class TokenizerError extends Data.TaggedError("TokenizerError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class VocabularyError extends Data.TaggedError("VocabularyError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** A persisted vocabulary or model failed structural validation on load. */
export class ArtifactError extends Data.TaggedError("ArtifactError")<{
  readonly message: string;
  readonly path?: string;
  readonly cause?: unknown;
}> {}

/** The linear-classifier capability raised while fitting or scoring. */
export class ClassifierError extends Data.TaggedError("ClassifierError")<{
  readonly message: string;
  readonly label?: string;
  readonly cause?: unknown;
}> {}

export class RecordError extends Data.TaggedError("RecordError")<{
  readonly message: string;
  readonly path: string;
  readonly line?: number;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
