import { readFile } from "node:fs/promises";
import type { DictionaryEntry } from "../core/syllable-estimator";
import { dictionaryLogger as logger, logError } from "../utils/logger";

export interface ParsedDictionary {
  entries: DictionaryEntry[];
  skipped: number;
}

/**
 * Parse `word=hy-phen-a-tion` lines. The syllable count is the number of
 * non-empty hyphen groups in the second `=` field; later fields are ignored.
 */
export function parseDictionary(content: string): ParsedDictionary {
  const entries: DictionaryEntry[] = [];
  let skipped = 0;

  for (const line of content.split(/\r?\n/)) {
    if (line.trim().length === 0) continue;

    const fields = line.split("=").map(field => field.trim()).filter(field => field.length > 0);
    const word = (fields[0] ?? "").toLowerCase();
    const syllables = (fields[1] ?? "").split("-").filter(part => part.length > 0).length;

    if (word.length === 0 || syllables === 0) {
      skipped++;
      continue;
    }
    entries.push([word, syllables]);
  }

  return { entries, skipped };
}

/**
 * Read a dictionary file. A missing or unreadable file yields no entries;
 * callers fall back to heuristic counting.
 */
export async function loadDictionary(file: string): Promise<DictionaryEntry[]> {
  const startLoad = Date.now();
  logger.info({ dictFile: file }, 'Loading dictionary');

  let content: string;
  try {
    content = await readFile(file, "utf8");
  } catch (error) {
    const missing = error instanceof Error && "code" in error && error.code === "ENOENT";
    logError(logger, error, { dictFile: file },
      missing ? 'Could not find the dictionary' : 'Could not load the dictionary');
    return [];
  }

  const { entries, skipped } = parseDictionary(content);
  if (skipped > 0) {
    logger.warn({ dictFile: file, skipped }, 'Skipped malformed dictionary lines');
  }

  logger.info({
    dictionarySize: entries.length,
    loadTime: Date.now() - startLoad,
  }, 'Dictionary loaded');

  return entries;
}
