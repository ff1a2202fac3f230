/**
 * Model artifact format.
 *
 * Newline-delimited JSON, gzipped when the path ends in `.gz`:
 *   line 1     vocabulary artifact
 *   line 2..n  { N, coef, intercept, label }
 *
 * `coef` is the lowercase hex of the little-endian coefficient bytes at a
 * precision the reader must be told; it is not recorded in the file.
 */
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import {
  ArtifactError,
  castTo,
  fromBytes,
  precisionBytes,
  toBytes,
  type Precision,
  type VocabularyArtifact,
} from "@lexembed/core";
import { decodeFile, encodeFile, parseVocabularyArtifact } from "@lexembed/tokenizers";

export interface TrainedTokenArtifact {
  readonly label: string;
  /** Examples the classifier was fit on. */
  readonly N: number;
  /** Over the full vocabulary dimension, rounded to the storage precision. */
  readonly coef: Float64Array;
  readonly intercept: number;
}

export interface ModelArtifact {
  readonly vocabulary: VocabularyArtifact;
  readonly tokens: readonly TrainedTokenArtifact[];
}

// ── Coefficient codec ───────────────────────────────────────────────────────

export function encodeCoef(coef: ArrayLike<number>, precision: Precision): string {
  return Buffer.from(toBytes(coef, precision)).toString("hex");
}

export function decodeCoef(hex: string, precision: Precision): Float64Array {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new ArtifactError({ message: "coef is not a hex string" });
  }
  const bytes = Buffer.from(hex, "hex");
  if (bytes.length % precisionBytes(precision) !== 0) {
    throw new ArtifactError({
      message: `coef has ${bytes.length} bytes, not a multiple of ${precisionBytes(precision)} (${precision})`,
    });
  }
  return fromBytes(new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength), precision);
}

export function serializeToken(token: TrainedTokenArtifact, precision: Precision): string {
  return JSON.stringify({
    N: token.N,
    coef: encodeCoef(token.coef, precision),
    intercept: token.intercept,
    label: token.label,
  });
}

export function parseToken(raw: unknown, precision: Precision, dimension: number): TrainedTokenArtifact {
  if (typeof raw !== "object" || raw === null) {
    throw new ArtifactError({ message: "Token record must be an object" });
  }
  if (!("label" in raw) || typeof raw.label !== "string") {
    throw new ArtifactError({ message: "Token record is missing 'label'" });
  }
  const label = raw.label;
  if (!("N" in raw) || typeof raw.N !== "number" || !Number.isInteger(raw.N)) {
    throw new ArtifactError({ message: `Token "${label}" is missing 'N'` });
  }
  if (!("intercept" in raw) || typeof raw.intercept !== "number") {
    throw new ArtifactError({ message: `Token "${label}" is missing 'intercept'` });
  }
  if (!("coef" in raw) || typeof raw.coef !== "string") {
    throw new ArtifactError({ message: `Token "${label}" is missing 'coef'` });
  }
  const coef = decodeCoef(raw.coef, precision);
  if (coef.length !== dimension) {
    throw new ArtifactError({
      message: `Token "${label}" has ${coef.length} coefficients, vocabulary has ${dimension}`,
    });
  }
  return { label, N: raw.N, coef, intercept: raw.intercept };
}

/** Copy of `token` with its coefficients rounded to `precision`. */
export function castToken(token: TrainedTokenArtifact, precision: Precision): TrainedTokenArtifact {
  return { ...token, coef: castTo(token.coef, precision) };
}

// ── Files ───────────────────────────────────────────────────────────────────

export function serializeModel(model: ModelArtifact, precision: Precision): string {
  const lines = [JSON.stringify(model.vocabulary), ...model.tokens.map((t) => serializeToken(t, precision))];
  return lines.join("\n") + "\n";
}

export function parseModel(text: string, precision: Precision): ModelArtifact {
  const lines = text.split("\n").filter((l) => l.trim().length > 0);
  if (lines.length === 0) throw new ArtifactError({ message: "Model artifact is empty" });
  const decode = (line: string, n: number): unknown => {
    try {
      return JSON.parse(line);
    } catch (cause) {
      throw new ArtifactError({ message: `Line ${n} is not valid JSON`, cause });
    }
  };
  const vocabulary = parseVocabularyArtifact(decode(lines[0], 1));
  const dimension = Object.keys(vocabulary.counter.dict).length;
  const tokens = lines.slice(1).map((l, i) => parseToken(decode(l, i + 2), precision, dimension));
  return { vocabulary, tokens };
}

function artifactError(what: string, path: string) {
  return (cause: unknown): ArtifactError =>
    cause instanceof ArtifactError
      ? new ArtifactError({ message: cause.message, path, cause: cause.cause })
      : new ArtifactError({ message: `Failed to ${what} "${path}"`, path, cause });
}

export function saveModelArtifact(
  path: string,
  model: ModelArtifact,
  precision: Precision,
): Effect.Effect<void, ArtifactError> {
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, encodeFile(path, serializeModel(model, precision)));
    },
    catch: artifactError("save model artifact to", path),
  });
}

export function loadModelArtifact(path: string, precision: Precision): Effect.Effect<ModelArtifact, ArtifactError> {
  return Effect.tryPromise({
    try: async () => parseModel(decodeFile(path, await readFile(path)), precision),
    catch: artifactError("load model artifact from", path),
  });
}

/** Re-encode every coefficient vector of a model file at another precision. */
export function convertPrecision(
  input: string,
  output: string,
  from: Precision,
  to: Precision,
): Effect.Effect<ModelArtifact, ArtifactError> {
  return Effect.gen(function* () {
    const model = yield* loadModelArtifact(input, from);
    const converted: ModelArtifact = {
      vocabulary: model.vocabulary,
      tokens: model.tokens.map((t) => castToken(t, to)),
    };
    yield* saveModelArtifact(output, converted, to);
    yield* Effect.logInfo("converted model artifact").pipe(
      Effect.annotateLogs({ tokens: converted.tokens.length, from, to }),
    );
    return converted;
  });
}
