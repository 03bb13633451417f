import { EventEmitter } from "events";
import type { SyllableCounter } from "./syllable-estimator";
import { isWord } from "./tokenizer";
import { scannerLogger as logger } from "../utils/logger";

const LINE_1 = 5;
const LINE_2 = 7;
const LINE_3 = 5;

/** A 5-7-5 run of tokens, `start` inclusive and `end` exclusive. */
export interface HaikuMatch {
  start: number;
  end: number;
  tokens: readonly string[];
}

export interface ScanReport {
  haikus: HaikuMatch[];
  total: number;
}

/**
 * Finds 5-7-5 syllable runs in a token stream.
 *
 * Every word token with at most five syllables anchors a candidate window
 * that grows word by word, filling line 1, then line 2, then line 3. A window
 * is reported when line 3 is full and the next word no longer fits anywhere;
 * that word closes the window without being part of it. A non-word token, or
 * running out of tokens, abandons the window. The next anchor is always the
 * token after the previous one, so matches may overlap.
 *
 * Emits `"haiku"` with each {@link HaikuMatch} as it is found.
 */
export class HaikuScanner extends EventEmitter {
  private readonly counter: SyllableCounter;

  constructor(counter: SyllableCounter) {
    super();
    this.counter = counter;
    logger.debug('HaikuScanner initialized');
  }

  *scan(tokens: readonly string[]): Generator<HaikuMatch, number, undefined> {
    let found = 0;

    for (let i = 0; i < tokens.length; i++) {
      if (!isWord(tokens[i])) continue;

      let count = this.counter.count(tokens[i]);
      if (count > LINE_1) continue; // too long for line 1

      let line1 = count;
      let line2 = 0;
      let line3 = 0;

      for (let j = i + 1; j < tokens.length; j++) {
        if (!isWord(tokens[j])) break;

        count = this.counter.count(tokens[j]);
        if (count + line1 <= LINE_1) {
          line1 += count;
        } else if (count + line2 <= LINE_2 && line1 === LINE_1) {
          line2 += count;
        } else if (count + line3 <= LINE_3 && line2 === LINE_2 && line1 === LINE_1) {
          line3 += count;
        } else if (line1 === LINE_1 && line2 === LINE_2 && line3 === LINE_3) {
          const match: HaikuMatch = { start: i, end: j, tokens: tokens.slice(i, j) };
          found++;
          logger.debug({ start: i, end: j, found }, 'Haiku detected');
          this.emit("haiku", match);
          yield match;
          break;
        } else {
          break; // over budget
        }
      }
    }

    return found;
  }

  /** Drain {@link scan} and collect every match. */
  run(tokens: readonly string[]): ScanReport {
    const startTime = Date.now();
    const haikus: HaikuMatch[] = [];
    const it = this.scan(tokens);
    let step = it.next();
    while (!step.done) {
      haikus.push(step.value);
      step = it.next();
    }

    logger.info({
      tokens: tokens.length,
      haikus: step.value,
      duration: Date.now() - startTime,
    }, 'Scan finished');

    return { haikus, total: step.value };
  }
}
