// ===========================================================================
//  src/server/cli.ts   (scan a text file and print every haiku found)
// ===========================================================================

import { DICTIONARY_FILE, TEXT_FILE } from "./config";
import { HaikuScanner, type HaikuMatch } from "./core/haiku-scanner";
import { SyllableEstimator } from "./core/syllable-estimator";
import { formatHaiku, formatSummary } from "./core/report";
import { loadDictionary } from "./storage/dictionary-store";
import { loadTokens } from "./storage/text-store";
import { startupLogger, logPerformance } from "./utils/logger";

const textFile = process.argv[2] ?? TEXT_FILE;

if (!textFile) {
  startupLogger.error('No text file given; pass a path or set HAIKU_TEXT_FILE');
  process.exit(1);
}

const startTime = Date.now();

const estimator = new SyllableEstimator(await loadDictionary(DICTIONARY_FILE));
const tokens = await loadTokens(textFile);

const scanner = new HaikuScanner(estimator);
scanner.on("haiku", (match: HaikuMatch) => {
  process.stdout.write(`${formatHaiku(match)}\n`);
});

const { total } = scanner.run(tokens);
process.stdout.write(`${formatSummary(total)}\n`);

logPerformance(startupLogger, 'haiku-scan', startTime, {
  textFile,
  tokens: tokens.length,
  haikus: total,
  dictionarySize: estimator.size,
});
