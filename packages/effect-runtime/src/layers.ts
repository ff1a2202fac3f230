/**
 * Effect layers for dependency injection.
 *
 * Each port gets a Layer that supplies a concrete implementation.
 */
import { Layer } from "effect";
import { ClassifierService, type LinearClassifier } from "@lexembed/core";

// ── Classifier Layer ───────────────────────────────────────────────────────

/** Provide `classifier` as the prototype every training task clones. */
export const ClassifierFrom = (classifier: LinearClassifier) =>
  Layer.succeed(ClassifierService, classifier);
