import { loadConfig } from "./config.js";
import { createInMemoryEngine } from "./engine.js";
import { startServer } from "./http/server.js";
import { loadInterpretations } from "./io/interpretations.js";
import { createLogger } from "./log.js";

const logger = createLogger("server");
const config = loadConfig();
const table = await loadInterpretations(config.interpretationsPath);

const engine = createInMemoryEngine(
  { retainPunctuation: config.retainPunctuation, boundarySet: config.boundarySet, topK: config.topK },
  table,
);

const { server, port } = await startServer({ port: config.port, engine, logger, logRequests: config.logRequests });

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

logger.info(`listening on :${port} (${table.size} interpretations loaded)`);
