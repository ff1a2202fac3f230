/**
 * Persistence helpers for vocabulary artifacts.
 *
 * Artifacts are JSON `{ params, counter: { dict, update_calls } }`, gzipped when
 * the path ends in `.gz`. Every I/O operation is wrapped in
 * `Effect.tryPromise` so callers get typed `ArtifactError` failures.
 */
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { gzipSync, gunzipSync } from "node:zlib";
import { Effect } from "effect";
import {
  ArtifactError,
  defaultTextModelParams,
  type TextModelParams,
  type VocabularyArtifact,
} from "@lexembed/core";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseParams(raw: unknown): TextModelParams {
  if (!isRecord(raw)) throw new ArtifactError({ message: "Missing or invalid 'params' field" });
  const rec: Record<string, unknown> = raw;
  const d = defaultTextModelParams;
  const bool = (key: string, fallback: boolean): boolean => {
    const v = rec[key];
    if (v === undefined) return fallback;
    if (typeof v !== "boolean") throw new ArtifactError({ message: `params.${key} must be a boolean` });
    return v;
  };
  const lang = raw.lang ?? d.lang;
  if (typeof lang !== "string") throw new ArtifactError({ message: "params.lang must be a string" });
  let tokenList: readonly number[] = d.tokenList;
  if (raw.tokenList !== undefined) {
    const list: unknown = raw.tokenList;
    if (!Array.isArray(list)) throw new ArtifactError({ message: "params.tokenList must be an array" });
    const qs: number[] = [];
    for (const q of list) {
      if (typeof q !== "number" || !Number.isInteger(q)) {
        throw new ArtifactError({ message: "params.tokenList must contain integers" });
      }
      qs.push(q);
    }
    tokenList = qs;
  }
  return {
    lang,
    lowercase: bool("lowercase", d.lowercase),
    stripDiacritics: bool("stripDiacritics", d.stripDiacritics),
    stripPunctuation: bool("stripPunctuation", d.stripPunctuation),
    deleteUrls: bool("deleteUrls", d.deleteUrls),
    deleteUsers: bool("deleteUsers", d.deleteUsers),
    tokenList,
  };
}

/** Validate the structure of a decoded vocabulary artifact. */
export function parseVocabularyArtifact(raw: unknown): VocabularyArtifact {
  if (!isRecord(raw)) throw new ArtifactError({ message: "Vocabulary artifact must be an object" });
  const params = parseParams(raw.params);
  const counter = raw.counter;
  if (!isRecord(counter)) throw new ArtifactError({ message: "Missing or invalid 'counter' field" });
  if (typeof counter.update_calls !== "number" || !Number.isInteger(counter.update_calls) || counter.update_calls < 0) {
    throw new ArtifactError({ message: "Missing or invalid 'counter.update_calls' field" });
  }
  if (!isRecord(counter.dict)) throw new ArtifactError({ message: "Missing or invalid 'counter.dict' field" });
  const dict: Record<string, number> = {};
  for (const [token, freq] of Object.entries(counter.dict)) {
    if (typeof freq !== "number" || !Number.isFinite(freq)) {
      throw new ArtifactError({ message: `Invalid frequency for token "${token}"` });
    }
    dict[token] = freq;
  }
  return { params, counter: { dict, update_calls: counter.update_calls } };
}

export function encodeFile(path: string, text: string): Buffer {
  const buf = Buffer.from(text, "utf-8");
  return path.endsWith(".gz") ? gzipSync(buf) : buf;
}

export function decodeFile(path: string, data: Buffer): string {
  return (path.endsWith(".gz") ? gunzipSync(data) : data).toString("utf-8");
}

export function saveVocabulary(path: string, artifact: VocabularyArtifact): Effect.Effect<void, ArtifactError> {
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, encodeFile(path, JSON.stringify(artifact)));
    },
    catch: (cause) => new ArtifactError({ message: `Failed to save vocabulary to "${path}"`, path, cause }),
  });
}

export function loadVocabulary(path: string): Effect.Effect<VocabularyArtifact, ArtifactError> {
  return Effect.tryPromise({
    try: async () => parseVocabularyArtifact(JSON.parse(decodeFile(path, await readFile(path)))),
    catch: (cause) =>
      cause instanceof ArtifactError
        ? new ArtifactError({ message: cause.message, path, cause: cause.cause })
        : new ArtifactError({ message: `Failed to load vocabulary from "${path}"`, path, cause }),
  });
}
