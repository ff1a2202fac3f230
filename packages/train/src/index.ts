export {
  streamRecords, readRecords, readTexts, writeJsonLines, parseRecord,
  type TextRecord, type ReadOptions,
} from "./records.js";
export { encodeCorpus, feasibleTokens, type EncodedCorpus, type FeasibleToken } from "./corpus.js";
export { buildDataset, type DatasetOptions, type TokenDataset } from "./dataset.js";
export {
  LinearSvm, classifierRegistry, compareLabels, uniqueLabels,
  type ClassifierFactory,
} from "./classifier.js";
export { trainToken, trainTokens, type TokenTrainingInput, type TrainTokensOptions } from "./token-trainer.js";
export {
  encodeCoef, decodeCoef, serializeToken, parseToken, castToken,
  serializeModel, parseModel, saveModelArtifact, loadModelArtifact, convertPrecision,
  type TrainedTokenArtifact, type ModelArtifact,
} from "./artifact.js";
