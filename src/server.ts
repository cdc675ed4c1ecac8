import Fastify from "fastify";
import { AppDatabase } from "./db.js";
import type { Logger } from "./lib/logger.js";

interface ServerDeps {
  db: AppDatabase;
  logger: Logger;
}

export function createHttpServer(deps: ServerDeps) {
  const app = Fastify({ loggerInstance: deps.logger });

  app.get("/", async () => {
    return {
      service: "tea-journal-bot",
      status: "ok"
    };
  });

  app.get("/health", async (request, reply) => {
    let db = false;
    try {
      db = deps.db.ping();
    } catch (error) {
      request.log.error({ err: error }, "Database ping failed");
    }

    reply.code(db ? 200 : 503);
    return {
      ok: db,
      db: db ? "ok" : "fail",
      timestamp: new Date().toISOString()
    };
  });

  return app;
}
