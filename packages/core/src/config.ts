/**
 * Validation of configuration records. Every check raises `ConfigError`.
 */
import { ConfigError } from "./errors.js";
import type { ClassifierConfig, EmbeddingOptions, KFoldOptions, TrainConfig, VocabularyConfig } from "./types.js";

function fail(message: string): never {
  throw new ConfigError({ message });
}

export function validateVocabularyConfig(config: VocabularyConfig): void {
  if (!Number.isInteger(config.sizeExponent) || config.sizeExponent < 1 || config.sizeExponent > 24) {
    fail(`sizeExponent must be an integer in [1, 24], got ${config.sizeExponent}`);
  }
  if (config.limit !== undefined && config.limit < 1) {
    fail(`limit must be >= 1, got ${config.limit}`);
  }
}

export function validateTrainConfig(config: TrainConfig): void {
  if (config.minPos < 1) fail(`minPos must be >= 1, got ${config.minPos}`);
  if (config.maxPos < config.minPos) {
    fail(`maxPos (${config.maxPos}) must be >= minPos (${config.minPos})`);
  }
  if (config.negativeCap < 1) fail(`negativeCap must be >= 1, got ${config.negativeCap}`);
  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    fail(`concurrency must be a positive integer, got ${config.concurrency}`);
  }
}

export function validateClassifierConfig(config: ClassifierConfig): void {
  if (!(config.C > 0)) fail(`C must be > 0, got ${config.C}`);
  if (!(config.tol > 0)) fail(`tol must be > 0, got ${config.tol}`);
  if (config.maxIter < 1) fail(`maxIter must be >= 1, got ${config.maxIter}`);
}

export function validateEmbeddingOptions(options: EmbeddingOptions): void {
  if (options.intercept && options.mergeIdf) {
    fail("intercept mode cannot be combined with mergeIdf");
  }
}

export function validateKFoldOptions(options: KFoldOptions, nSamples: number): void {
  if (!Number.isInteger(options.k) || options.k < 2) {
    fail(`k must be an integer >= 2, got ${options.k}`);
  }
  if (options.k > nSamples) {
    fail(`k (${options.k}) cannot exceed the number of samples (${nSamples})`);
  }
}
