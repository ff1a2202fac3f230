/**
 * @lexembed/embedding -- per-token classifier weights as text embeddings.
 */
export {
  EmbeddingModel,
  type AdjustOptions,
  type ForceTokenOptions,
  type EmbeddingModelDeps,
} from "./model.js";
export { stratifiedKFold, type Fold } from "./kfold.js";
export { loadEmbeddingModel, type LoadEmbeddingOptions } from "./persist.js";
