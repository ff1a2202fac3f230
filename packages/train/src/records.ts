/**
 * Newline-delimited record files.
 *
 * One JSON value per line: either a string or an object with a `text` field
 * and an optional `label` (or `klass`). Files ending in `.gz` are gunzipped
 * while streaming. Blank lines are skipped.
 */
import { createReadStream } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { createInterface } from "node:readline";
import { createGunzip, gzipSync } from "node:zlib";
import { Effect } from "effect";
import { RecordError, type Label } from "@lexembed/core";

export interface TextRecord {
  readonly text: string;
  readonly label?: Label;
}

export interface ReadOptions {
  /** Stop after this many records. */
  readonly limit?: number;
}

function isLabel(value: unknown): value is Label {
  return typeof value === "string" || typeof value === "number";
}

export function parseRecord(line: string, path: string, lineNo: number): TextRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (cause) {
    throw new RecordError({ message: "Invalid JSON", path, line: lineNo, cause });
  }
  if (typeof raw === "string") return { text: raw };
  if (typeof raw === "object" && raw !== null && "text" in raw && typeof raw.text === "string") {
    const label = "label" in raw ? raw.label : "klass" in raw ? raw.klass : undefined;
    if (label !== undefined && !isLabel(label)) {
      throw new RecordError({ message: "label must be a string or a number", path, line: lineNo });
    }
    return label === undefined ? { text: raw.text } : { text: raw.text, label };
  }
  throw new RecordError({ message: "Record must be a string or an object with a 'text' field", path, line: lineNo });
}

/** Yield the records of `path` in file order. */
export async function* streamRecords(path: string, options: ReadOptions = {}): AsyncGenerator<TextRecord> {
  const file = createReadStream(path);
  const input = path.endsWith(".gz") ? file.pipe(createGunzip()) : file;
  const rl = createInterface({ input, crlfDelay: Infinity });
  let lineNo = 0;
  let count = 0;
  try {
    for await (const line of rl) {
      lineNo++;
      if (options.limit !== undefined && count >= options.limit) break;
      if (line.trim().length === 0) continue;
      yield parseRecord(line, path, lineNo);
      count++;
    }
  } finally {
    rl.close();
    file.destroy();
  }
}

export function readRecords(path: string, options: ReadOptions = {}): Effect.Effect<TextRecord[], RecordError> {
  return Effect.tryPromise({
    try: async () => {
      const out: TextRecord[] = [];
      for await (const record of streamRecords(path, options)) out.push(record);
      return out;
    },
    catch: (cause) =>
      cause instanceof RecordError ? cause : new RecordError({ message: "Failed to read records", path, cause }),
  });
}

export function readTexts(path: string, options: ReadOptions = {}): Effect.Effect<string[], RecordError> {
  return Effect.map(readRecords(path, options), (records) => records.map((r) => r.text));
}

/** Write one JSON line per value, gzipped when the path ends in `.gz`. */
export function writeJsonLines(path: string, rows: readonly unknown[]): Effect.Effect<void, RecordError> {
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true });
      const body = rows.map((r) => JSON.stringify(r)).join("\n") + "\n";
      const buf = Buffer.from(body, "utf-8");
      await writeFile(path, path.endsWith(".gz") ? gzipSync(buf) : buf);
    },
    catch: (cause) => new RecordError({ message: "Failed to write records", path, cause }),
  });
}
