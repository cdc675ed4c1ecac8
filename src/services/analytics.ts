import { AppDatabase } from "../db.js";
import type { Logger } from "../lib/logger.js";
import type { DailyStats } from "../types.js";

export type EventName =
  | "start"
  | "new_tasting_started"
  | "tasting_saved"
  | "search_run"
  | "card_opened"
  | "tasting_edited"
  | "tasting_deleted";

interface EventLogOptions {
  db: AppDatabase;
  logger: Logger;
  enabled: boolean;
}

/** Append-only bot_events writer. Never throws into the caller. */
export class EventLog {
  private readonly db: AppDatabase;
  private readonly logger: Logger;
  readonly enabled: boolean;

  constructor(options: EventLogOptions) {
    this.db = options.db;
    this.logger = options.logger;
    this.enabled = options.enabled;
  }

  log(userId: number | null, chatId: number | null, event: EventName, props: Record<string, unknown> = {}): void {
    if (!this.enabled || !event) {
      return;
    }

    try {
      this.db.insertBotEvent(userId, chatId, event, props);
    } catch (error) {
      this.logger.error({ err: error, event }, "Failed to record bot event");
    }
  }

  today(now: Date = new Date()): DailyStats {
    const dayStart = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
    const dayEnd = new Date(dayStart.getTime() + 24 * 60 * 60 * 1000);
    return this.db.dailyStats(dayStart.toISOString(), dayEnd.toISOString());
  }
}
