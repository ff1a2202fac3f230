/**
 * Symbol table: surface symbol -> canonical token.
 *
 * The bundled table maps emoji (skin-tone variants included) to their base
 * emoji. Each key is registered with every boundary-marker combination.
 */
import { readFileSync } from "node:fs";
import { TokenizerError } from "@lexembed/core";

export type SymbolTable = ReadonlyMap<string, string>;

export function parseSymbolTable(raw: unknown, source = "symbol table"): SymbolTable {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new TokenizerError({ message: `${source}: expected an object of symbol -> token` });
  }
  const table = new Map<string, string>();
  for (const [k, v] of Object.entries(raw)) {
    if (typeof v !== "string" || k.length === 0) {
      throw new TokenizerError({ message: `${source}: invalid entry for "${k}"` });
    }
    table.set(k, v);
  }
  return table;
}

export function loadSymbolTable(path: string | URL): SymbolTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (cause) {
    throw new TokenizerError({ message: `Failed to read symbol table ${String(path)}`, cause });
  }
  return parseSymbolTable(raw, String(path));
}

export const emojiSymbols: SymbolTable = loadSymbolTable(new URL("../data/emojis.json", import.meta.url));

export const noSymbols: SymbolTable = new Map();
