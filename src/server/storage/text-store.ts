import { readFile } from "node:fs/promises";
import { tokenize } from "../core/tokenizer";
import { textLogger as logger, logError } from "../utils/logger";

/** Read and tokenize a text file; an unreadable file gives no tokens. */
export async function loadTokens(file: string): Promise<string[]> {
  const startLoad = Date.now();

  let content: string;
  try {
    content = await readFile(file, "utf8");
  } catch (error) {
    const missing = error instanceof Error && "code" in error && error.code === "ENOENT";
    logError(logger, error, { textFile: file }, missing ? 'File not found' : 'IO error');
    return [];
  }

  const tokens = tokenize(content);
  logger.info({
    textFile: file,
    tokens: tokens.length,
    loadTime: Date.now() - startLoad,
  }, 'Text loaded');
  return tokens;
}
