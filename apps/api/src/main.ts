import { createServer, type Server } from "node:http";
import { getConfig, initConfig, parseListenAddress } from "@clean-articles/config";
import { ArticleService } from "@clean-articles/core";
import {
  PgArticleRepository,
  PgAuthorRepository,
  buildDatabaseUrl,
  closeDbClient,
  createDbClient,
  pingDatabase,
} from "@clean-articles/db";
import { createLogger, getLogger, setLogger } from "@clean-articles/logger";
import { createApp } from "./app.js";

function listen(server: Server, port: number, host?: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

async function main(): Promise<void> {
  initConfig();
  const config = getConfig();
  setLogger(createLogger({ level: config.log.level, service: "article-api" }));
  const logger = getLogger();

  const db = createDbClient({
    url: buildDatabaseUrl(config.database),
    maxConnections: config.database.poolMax,
  });
  await pingDatabase(db);

  const service = new ArticleService({
    articleRepo: new PgArticleRepository(db),
    authorRepo: new PgAuthorRepository(db),
  });
  // logger and config come from the process-wide singletons set above
  const app = createApp({ service });

  const { host, port } = parseListenAddress(config.server.address);
  const server = createServer(app);
  await listen(server, port, host);
  logger.info(
    { address: config.server.address, adapter: config.server.adapter },
    "Server listening",
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutting down");
    await closeServer(server);
    await closeDbClient(db);
    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.once("SIGTERM", () => onSignal("SIGTERM"));
  process.once("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  getLogger().fatal({ err }, "Fatal error");
  process.exit(1);
});
