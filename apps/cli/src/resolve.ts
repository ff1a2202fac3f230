/**
 * Resolve pluggable implementations from CLI args.
 */
import { tokenizerRegistry, type TokenizerFactory } from "@lexembed/tokenizers";
import { classifierRegistry } from "@lexembed/train";
import type { ClassifierConfig, LinearClassifier } from "@lexembed/core";

export function resolveTokenizer(name: string): TokenizerFactory {
  return tokenizerRegistry.get(name);
}

export function resolveClassifier(name: string, config: Partial<ClassifierConfig>): LinearClassifier {
  return classifierRegistry.get(name)(config);
}

export function listImplementations(): string {
  return [
    `Tokenizers:  ${tokenizerRegistry.list().join(", ")}`,
    `Classifiers: ${classifierRegistry.list().join(", ")}`,
  ].join("\n");
}
