import { AppDatabase } from "../db.js";
import type { Logger } from "../lib/logger.js";
import { EventLog } from "../services/analytics.js";
import type { Responder } from "../transport.js";
import { AlbumBuffer } from "./albums.js";
import { SessionStore } from "./session.js";
import { Throttle } from "./throttle.js";

export interface FlowDeps {
  db: AppDatabase;
  sessions: SessionStore;
  events: EventLog;
  albums: AlbumBuffer;
  throttle: Throttle;
  logger: Logger;
  adminIds: ReadonlySet<number>;
  runtime: { appEnv: string; timeZone: string };
  now: () => Date;
}

/** One inbound update, reduced to what the flows need. */
export interface FlowContext {
  userId: number;
  chatId: number;
  io: Responder;
}

export const STALE_STEP = "Шаг устарел. Начни заново через меню.";
