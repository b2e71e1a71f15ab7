import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { z } from "zod";

const DEFAULT_DICTIONARY = fileURLToPath(new URL("../../data/dictionary.json", import.meta.url));

const wordListSchema = z.array(z.string().min(1));

/** Loads the word list used by the `ocr_gibberish` rule. Words are lower-cased. */
export function loadDictionary(path: string = DEFAULT_DICTIONARY): ReadonlySet<string> {
  const words = wordListSchema.parse(JSON.parse(readFileSync(path, "utf8")));
  return new Set(words.map((w) => w.toLowerCase()));
}
