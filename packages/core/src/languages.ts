/**
 * Language profiles.
 *
 * A profile gives the base text-model defaults for one language. Languages
 * written without spaces between words get character q-grams only.
 */
import { defaultTextModelParams, type TextModelParams } from "./types.js";

export interface LanguageConfig {
  readonly id: string;
  readonly displayName: string;
  readonly textModel: Partial<TextModelParams>;
}

const WORDS_AND_QGRAMS: readonly number[] = [-1, 2, 3, 4, 5, 6, 7, 8];
const QGRAMS_ONLY: readonly number[] = [1, 2, 3];

function spaced(id: string, displayName: string): [string, LanguageConfig] {
  return [id, { id, displayName, textModel: { tokenList: WORDS_AND_QGRAMS } }];
}

export const languages: ReadonlyMap<string, LanguageConfig> = new Map<string, LanguageConfig>([
  spaced("ar", "Arabic"),
  spaced("ca", "Catalan"),
  spaced("de", "German"),
  spaced("en", "English"),
  spaced("es", "Spanish"),
  spaced("fr", "French"),
  spaced("hi", "Hindi"),
  spaced("in", "Indonesian"),
  spaced("it", "Italian"),
  spaced("ko", "Korean"),
  spaced("nl", "Dutch"),
  spaced("pl", "Polish"),
  spaced("pt", "Portuguese"),
  spaced("ru", "Russian"),
  spaced("tl", "Tagalog"),
  spaced("tr", "Turkish"),
  ["ja", { id: "ja", displayName: "Japanese", textModel: { tokenList: QGRAMS_ONLY } }],
  ["zh", { id: "zh", displayName: "Chinese", textModel: { tokenList: QGRAMS_ONLY } }],
]);

/** Look up a language by id. Returns undefined if not found. */
export function getLanguage(id: string): LanguageConfig | undefined {
  return languages.get(id);
}

/** Base text-model params for a language, falling back to the defaults. */
export function textModelParams(lang: string, overrides: Partial<TextModelParams> = {}): TextModelParams {
  const profile = languages.get(lang);
  return {
    ...defaultTextModelParams,
    ...(profile?.textModel ?? {}),
    ...overrides,
    lang,
  };
}
