/**
 * Command: lexembed convert
 */
import { Effect } from "effect";
import { withLogging } from "@lexembed/effect-runtime";
import { convertPrecision } from "@lexembed/train";
import { parseKV, requireArg, strArg, precisionArg } from "../parse.js";

export async function convertCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const inputPath = requireArg(kv, "input", "model artifact");
  const outPath = requireArg(kv, "out", "output model artifact");
  const from = precisionArg(kv, "from", "f32");
  const to = precisionArg(kv, "to", "f16");

  const model = await Effect.runPromise(
    convertPrecision(inputPath, outPath, from, to).pipe(withLogging(strArg(kv, "log", "info"))),
  );
  console.log(`Converted ${model.tokens.length} tokens (${from} -> ${to}) to ${outPath}`);
}
