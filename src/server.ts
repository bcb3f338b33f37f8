import { loadConfig } from "./config.js";
import { createPhraseSearchEngine } from "./http/engine.js";
import { startServer } from "./http/server.js";
import { createLogger } from "./logger.js";

const config = loadConfig();
const logger = createLogger({ level: config.logLevel, pretty: config.nodeEnv === "development" });

const engine = createPhraseSearchEngine({
  parallelism: config.search.parallelism,
  minChunkLength: config.search.minChunkLength,
});

const { server, port } = await startServer({
  port: config.port,
  engine,
  logger,
  limits: { maxTextLength: config.search.maxTextLength, maxPhrases: config.search.maxPhrases },
  defaults: { parallelSearching: config.search.parallelSearching, parallelPhrases: config.search.parallelPhrases },
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info("shutting down", { signal });
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

logger.info(`listening on :${port}`, { parallelism: engine.parallelism });
