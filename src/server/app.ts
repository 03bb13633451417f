// ===========================================================================
//  src/server/app.ts   (HTTP entry point)
// ===========================================================================

import { createServer } from "node:http";

import { createApp } from "./api";
import { DICTIONARY_FILE, HTTP_PORT, REST_ROOT } from "./config";
import { loadDictionary } from "./storage/dictionary-store";
import { logger, startupLogger, logError, logPerformance } from "./utils/logger";

startupLogger.info({
  HTTP_PORT,
  REST_ROOT,
  DICTIONARY_FILE,
  NODE_ENV: process.env.NODE_ENV,
}, 'Starting haiku finder server');

const startTime = Date.now();

try {
  const entries = await loadDictionary(DICTIONARY_FILE);
  startupLogger.info({ dictionarySize: entries.length }, 'Dictionary ready');

  const http = createServer(createApp(entries));

  http.listen(HTTP_PORT, () => {
    logPerformance(startupLogger, 'server-startup', startTime);
    startupLogger.info({
      port: HTTP_PORT,
      restRoot: REST_ROOT,
    }, `Server listening on port ${HTTP_PORT}`);
  });

  // Graceful shutdown
  process.on('SIGTERM', () => {
    logger.info('SIGTERM received, shutting down gracefully');
    http.close((error) => {
      if (error) {
        logError(logger, error, { context: 'shutdown' });
        process.exit(1);
      }
      logger.info('Cleanup completed successfully');
      process.exit(0);
    });
  });

} catch (error) {
  logError(startupLogger, error, { context: 'startup-failure' });
  process.exit(1);
}
