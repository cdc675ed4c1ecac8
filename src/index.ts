import { createTelegramBot, registerCommands } from "./bot.js";
import { loadConfig } from "./config.js";
import { AppDatabase } from "./db.js";
import { AlbumBuffer } from "./flows/albums.js";
import type { FlowDeps } from "./flows/context.js";
import { SessionStore } from "./flows/session.js";
import { Throttle } from "./flows/throttle.js";
import { createLogger } from "./lib/logger.js";
import { createHttpServer } from "./server.js";
import { EventLog } from "./services/analytics.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const db = new AppDatabase(config.dbPath);
  logger.info({ db: db.location, ok: db.ping() }, "Database opened");

  const flows: FlowDeps = {
    db,
    sessions: new SessionStore(db),
    events: new EventLog({ db, logger: logger.child({ module: "analytics" }), enabled: config.analyticsEnabled }),
    albums: new AlbumBuffer(config.albumQuietMs, logger.child({ module: "albums" })),
    throttle: new Throttle(config.moreThrottleMs),
    logger: logger.child({ module: "flows" }),
    adminIds: new Set(config.adminIds),
    runtime: { appEnv: config.appEnv, timeZone: config.timeZone },
    now: () => new Date()
  };

  const bot = createTelegramBot({ config, flows });
  const server = createHttpServer({ db, logger });

  let shuttingDown = false;

  const stop = async (signal: string) => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.info({ signal }, "Shutting down");
    await bot.stop();
    await server.close();
    flows.albums.clear();
    db.close();
    process.exit(0);
  };

  process.once("SIGINT", () => {
    void stop("SIGINT");
  });
  process.once("SIGTERM", () => {
    void stop("SIGTERM");
  });

  await server.listen({
    port: config.port,
    host: "0.0.0.0"
  });

  try {
    await registerCommands(bot);
  } catch (error) {
    logger.warn({ err: error }, "Failed to register bot commands");
  }

  bot
    .start({
      drop_pending_updates: true,
      onStart: (botInfo) => {
        logger.info({ username: botInfo.username, analytics: config.analyticsEnabled }, "Bot started");
      }
    })
    .catch((error: unknown) => {
      logger.fatal({ err: error }, "Polling stopped");
      process.exit(1);
    });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
