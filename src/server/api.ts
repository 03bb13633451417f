// ===========================================================================
//  src/server/api.ts   (REST façade over the haiku scanner)
// ===========================================================================

import express from "express";
import helmet from "helmet";
import compression from "compression";
import pinoHttp from "pino-http";

import { HaikuScanner } from "./core/haiku-scanner";
import { SyllableEstimator, type DictionaryEntry } from "./core/syllable-estimator";
import { tokenize } from "./core/tokenizer";
import { formatHaiku } from "./core/report";
import { MAX_TEXT_BYTES, REST_ROOT } from "./config";
import { httpLogger, logError } from "./utils/logger";

/**
 * Every scan gets its own estimator seeded from `entries`, so words memoized
 * for one request body are dropped with it.
 */
export function createApp(entries: readonly DictionaryEntry[]): express.Express {
  const app = express();

  app.use(pinoHttp({
    logger: httpLogger,
    customLogLevel: (_req, res, err) => {
      if (res.statusCode >= 400 && res.statusCode < 500) return 'warn';
      if (res.statusCode >= 500 || err) return 'error';
      return 'debug';
    },
    serializers: {
      req: (req) => ({
        method: req.method,
        url: req.url,
      }),
      res: (res) => ({
        statusCode: res.statusCode,
      }),
    },
  }));

  app
    .use(helmet())
    .use(compression())
    .use(express.text({ type: "text/plain", limit: MAX_TEXT_BYTES }));

  const router = express.Router();

  // Health / metrics
  router.get("/status", (_req, res) => {
    res.json({
      dictionarySize: entries.length,
      uptimeSec: Math.floor(process.uptime()),
    });
  });

  router.post("/haikus", (req, res) => {
    const body: unknown = req.body;
    if (typeof body !== "string") {
      httpLogger.warn({ contentType: req.headers["content-type"] }, 'Expected a text/plain body');
      res.status(400).json({ error: "Expected a text/plain body" });
      return;
    }

    try {
      const report = new HaikuScanner(new SyllableEstimator(entries)).run(tokenize(body));
      res.json({
        total: report.total,
        haikus: report.haikus.map(match => ({
          start: match.start,
          end: match.end,
          text: formatHaiku(match),
        })),
      });
    } catch (error) {
      logError(httpLogger, error, { context: 'scan' });
      res.status(500).json({ error: "Failed to scan text" });
    }
  });

  app.use(REST_ROOT, router);

  return app;
}
