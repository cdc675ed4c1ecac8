import type { InlineKeyboard } from "grammy";
import { AppDatabase } from "../db.js";
import { AlbumBuffer } from "../flows/albums.js";
import type { FlowContext, FlowDeps } from "../flows/context.js";
import { SessionStore } from "../flows/session.js";
import { Throttle } from "../flows/throttle.js";
import { silentLogger } from "../lib/logger.js";
import { EventLog } from "../services/analytics.js";
import type { ReplyMarkup, Responder } from "../transport.js";
import type { InfusionInput, TastingInput } from "../types.js";

export interface Sent {
  via: "respond" | "send";
  text: string;
  markup?: ReplyMarkup;
}

/** Records everything a flow does to the chat. */
export class FakeResponder implements Responder {
  readonly sent: Sent[] = [];
  readonly notices: Array<{ notice?: string; alert?: boolean }> = [];
  readonly markups: Array<InlineKeyboard | null> = [];
  readonly albums: Array<{ fileIds: string[]; caption?: string }> = [];
  readonly photos: Array<{ fileId: string; caption?: string }> = [];
  failAlbums = false;

  async respond(text: string, markup?: InlineKeyboard): Promise<void> {
    this.sent.push({ via: "respond", text, markup });
  }

  async send(text: string, markup?: ReplyMarkup): Promise<void> {
    this.sent.push({ via: "send", text, markup });
  }

  async setMarkup(markup: InlineKeyboard | null): Promise<void> {
    this.markups.push(markup);
  }

  async acknowledge(notice?: string, alert?: boolean): Promise<void> {
    this.notices.push({ notice, alert });
  }

  async sendAlbum(fileIds: string[], caption?: string): Promise<void> {
    if (this.failAlbums) {
      throw new Error("album rejected");
    }
    this.albums.push({ fileIds, caption });
  }

  async sendPhoto(fileId: string, caption?: string): Promise<void> {
    this.photos.push({ fileId, caption });
  }

  texts(): string[] {
    return this.sent.map((message) => message.text);
  }

  lastText(): string | undefined {
    return this.sent[this.sent.length - 1]?.text;
  }

  reset(): void {
    this.sent.length = 0;
    this.notices.length = 0;
    this.markups.length = 0;
    this.albums.length = 0;
    this.photos.length = 0;
  }
}

/** In-memory database with the row counts assertions need. */
export class TestDatabase extends AppDatabase {
  constructor() {
    super(":memory:");
  }

  countTastings(userId: number): number {
    return this.total(`SELECT COUNT(*) AS total FROM tastings WHERE user_id = ?`, userId);
  }

  countInfusions(tastingId: number): number {
    return this.total(`SELECT COUNT(*) AS total FROM infusions WHERE tasting_id = ?`, tastingId);
  }

  countBotEvents(event: string): number {
    return this.total(`SELECT COUNT(*) AS total FROM bot_events WHERE event = ?`, event);
  }

  private total(sql: string, param: string | number): number {
    return this.db.prepare<[string | number], { total: number }>(sql).get(param)?.total ?? 0;
  }
}

export interface TestClock {
  date: Date;
  ms: number;
}

export type TestDeps = FlowDeps & { db: TestDatabase; clock: TestClock };

export function createTestDeps(overrides: Partial<Omit<FlowDeps, "db">> = {}): TestDeps {
  const db = new TestDatabase();
  const clock: TestClock = { date: new Date("2024-05-01T09:30:00.000Z"), ms: 0 };

  return {
    sessions: new SessionStore(db),
    events: new EventLog({ db, logger: silentLogger, enabled: true }),
    albums: new AlbumBuffer(1000, silentLogger),
    throttle: new Throttle(1000, () => clock.ms),
    logger: silentLogger,
    adminIds: new Set([1]),
    runtime: { appEnv: "test", timeZone: "UTC" },
    now: () => clock.date,
    ...overrides,
    db,
    clock
  };
}

export function flowContext(userId = 42): FlowContext & { io: FakeResponder } {
  return { userId, chatId: userId, io: new FakeResponder() };
}

/** Callback data of every button of an inline keyboard, row by row. */
export function buttonData(markup: ReplyMarkup | undefined): string[] {
  if (!markup || !("inline_keyboard" in markup)) {
    return [];
  }

  return markup.inline_keyboard.flat().flatMap((button) => ("callback_data" in button ? [button.callback_data] : []));
}

export function tastingInput(userId: number, overrides: Partial<TastingInput> = {}): TastingInput {
  return {
    userId,
    name: "Те Гуань Инь",
    year: 2021,
    region: "Аньси",
    category: "Улун",
    grams: 7,
    tempC: 95,
    tastedAt: "10:15",
    gear: "гайвань",
    aromaDry: "цветы",
    aromaWarmed: "мёд",
    effectsCsv: "Тепло",
    scenariosCsv: "Отдых",
    rating: 8,
    summary: null,
    ...overrides
  };
}

export function infusionInput(n: number, overrides: Partial<InfusionInput> = {}): InfusionInput {
  return {
    n,
    seconds: 10 * n,
    liquorColor: "золотистый",
    taste: "цветы",
    specialNotes: null,
    body: "лёгкое",
    aftertaste: "сладкий",
    ...overrides
  };
}
