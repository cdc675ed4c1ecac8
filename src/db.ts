import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { nowIso } from "./lib/format.js";
import type {
  DailyStats,
  EditableColumn,
  Infusion,
  InfusionInput,
  SearchKind,
  SearchPage,
  Tasting,
  TastingInput,
  User,
  UserState
} from "./types.js";

interface UserRow {
  id: number;
  created_at: string;
  tz_offset_min: number;
}

interface TastingRow {
  id: number;
  user_id: number;
  seq_no: number;
  name: string;
  year: number | null;
  region: string | null;
  category: string | null;
  grams: number | null;
  temp_c: number | null;
  tasted_at: string | null;
  gear: string | null;
  aroma_dry: string | null;
  aroma_warmed: string | null;
  effects_csv: string | null;
  scenarios_csv: string | null;
  rating: number;
  summary: string | null;
  created_at: string;
}

interface InfusionRow {
  id: number;
  tasting_id: number;
  n: number;
  seconds: number | null;
  liquor_color: string | null;
  taste: string | null;
  special_notes: string | null;
  body: string | null;
  aftertaste: string | null;
}

interface UserStateRow {
  user_id: number;
  step: string;
  payload: string | null;
  updated_at: string;
}

type SqlValue = string | number | null;
type SqlParams = Record<string, SqlValue>;

interface SearchFilter {
  clause: string;
  params: SqlParams;
}

const TASTING_COLUMNS = `
  id, user_id, seq_no, name, year, region, category, grams, temp_c, tasted_at, gear,
  aroma_dry, aroma_warmed, effects_csv, scenarios_csv, rating, summary, created_at
`;

const EDITABLE_COLUMNS: ReadonlySet<EditableColumn> = new Set<EditableColumn>([
  "name",
  "year",
  "region",
  "category",
  "grams",
  "temp_c",
  "tasted_at",
  "gear",
  "aroma_dry",
  "aroma_warmed",
  "effects_csv",
  "scenarios_csv",
  "rating",
  "summary"
]);

export class AppDatabase {
  protected readonly db: Database.Database;
  readonly location: string;

  constructor(dbPath: string) {
    if (dbPath === ":memory:") {
      this.location = dbPath;
    } else {
      this.location = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(this.location), { recursive: true });
    }

    this.db = new Database(this.location);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.function("casefold", { deterministic: true }, (value: unknown) =>
      typeof value === "string" ? value.toLowerCase() : null
    );

    this.migrate();
  }

  close(): void {
    this.db.close();
  }

  ping(): boolean {
    const row = this.db.prepare<[], { ok: number }>("SELECT 1 AS ok").get();
    return row?.ok === 1;
  }

  ensureUser(userId: number): User {
    this.db
      .prepare(
        `
        INSERT INTO users (id, created_at, tz_offset_min)
        VALUES (?, ?, 0)
        ON CONFLICT(id) DO NOTHING
      `
      )
      .run(userId, nowIso());

    const user = this.getUser(userId);
    if (!user) {
      throw new Error(`User ${userId} was not stored`);
    }

    return user;
  }

  getUser(userId: number): User | null {
    const row = this.db
      .prepare<[number], UserRow>(`SELECT id, created_at, tz_offset_min FROM users WHERE id = ?`)
      .get(userId);

    return row ? mapUserRow(row) : null;
  }

  setUserTimezone(userId: number, offsetMin: number): void {
    this.db
      .prepare(
        `
        INSERT INTO users (id, created_at, tz_offset_min)
        VALUES (?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET tz_offset_min = excluded.tz_offset_min
      `
      )
      .run(userId, nowIso(), offsetMin);
  }

  /**
   * Next per-user sequence number. Callers run it inside an IMMEDIATE
   * transaction: SQLite has no row locks, so the write lock taken at BEGIN
   * is what serializes allocation for the same user.
   */
  nextSeqNo(userId: number): number {
    const row = this.db
      .prepare<[number], { next_seq: number }>(
        `SELECT COALESCE(MAX(seq_no), 0) + 1 AS next_seq FROM tastings WHERE user_id = ?`
      )
      .get(userId);

    return row?.next_seq ?? 1;
  }

  insertTastingGraph(input: TastingInput, infusions: InfusionInput[], photoIds: string[]): Tasting {
    const insertTasting = this.db.prepare<SqlParams>(
      `
      INSERT INTO tastings (
        user_id, seq_no, name, year, region, category, grams, temp_c, tasted_at, gear,
        aroma_dry, aroma_warmed, effects_csv, scenarios_csv, rating, summary, created_at
      ) VALUES (
        @userId, @seqNo, @name, @year, @region, @category, @grams, @tempC, @tastedAt, @gear,
        @aromaDry, @aromaWarmed, @effectsCsv, @scenariosCsv, @rating, @summary, @createdAt
      )
    `
    );
    const insertInfusion = this.db.prepare<SqlParams>(
      `
      INSERT INTO infusions (tasting_id, n, seconds, liquor_color, taste, special_notes, body, aftertaste)
      VALUES (@tastingId, @n, @seconds, @liquorColor, @taste, @specialNotes, @body, @aftertaste)
    `
    );
    const insertPhoto = this.db.prepare<[number, string]>(
      `INSERT INTO photos (tasting_id, file_id) VALUES (?, ?)`
    );

    const tx = this.db.transaction((): number => {
      const seqNo = this.nextSeqNo(input.userId);
      const result = insertTasting.run({ ...input, seqNo, createdAt: nowIso() });
      const tastingId = Number(result.lastInsertRowid);

      for (const infusion of infusions) {
        insertInfusion.run({ ...infusion, tastingId });
      }

      for (const fileId of photoIds) {
        insertPhoto.run(tastingId, fileId);
      }

      return tastingId;
    });

    const tastingId = tx.immediate();
    const tasting = this.getTastingForOwner(tastingId, input.userId);
    if (!tasting) {
      throw new Error(`Tasting ${tastingId} vanished after insert`);
    }

    return tasting;
  }

  getTastingForOwner(tastingId: number, userId: number): Tasting | null {
    const row = this.db
      .prepare<[number, number], TastingRow>(
        `SELECT ${TASTING_COLUMNS} FROM tastings WHERE id = ? AND user_id = ?`
      )
      .get(tastingId, userId);

    return row ? mapTastingRow(row) : null;
  }

  getTastingBySeq(userId: number, seqNo: number): Tasting | null {
    const row = this.db
      .prepare<[number, number], TastingRow>(
        `SELECT ${TASTING_COLUMNS} FROM tastings WHERE user_id = ? AND seq_no = ?`
      )
      .get(userId, seqNo);

    return row ? mapTastingRow(row) : null;
  }

  listInfusions(tastingId: number): Infusion[] {
    const rows = this.db
      .prepare<[number], InfusionRow>(
        `
        SELECT id, tasting_id, n, seconds, liquor_color, taste, special_notes, body, aftertaste
        FROM infusions
        WHERE tasting_id = ?
        ORDER BY n ASC, id ASC
      `
      )
      .all(tastingId);

    return rows.map(mapInfusionRow);
  }

  listPhotoIds(tastingId: number, limit: number): string[] {
    const rows = this.db
      .prepare<[number, number], { file_id: string }>(
        `SELECT file_id FROM photos WHERE tasting_id = ? ORDER BY id ASC LIMIT ?`
      )
      .all(tastingId, limit);

    return rows.map((row) => row.file_id);
  }

  countPhotos(tastingId: number): number {
    const row = this.db
      .prepare<[number], { total: number }>(`SELECT COUNT(*) AS total FROM photos WHERE tasting_id = ?`)
      .get(tastingId);

    return row?.total ?? 0;
  }

  updateTastingField(
    tastingId: number,
    userId: number,
    column: EditableColumn,
    value: string | number | null
  ): boolean {
    if (!EDITABLE_COLUMNS.has(column)) {
      throw new Error(`Column ${column} is not editable`);
    }

    const statement = this.db.prepare<[SqlValue, number, number]>(
      `UPDATE tastings SET ${column} = ? WHERE id = ? AND user_id = ?`
    );
    const tx = this.db.transaction(() => statement.run(value, tastingId, userId).changes);

    return tx() > 0;
  }

  deleteTasting(tastingId: number, userId: number): boolean {
    const result = this.db
      .prepare<[number, number]>(`DELETE FROM tastings WHERE id = ? AND user_id = ?`)
      .run(tastingId, userId);

    return result.changes > 0;
  }

  searchTastings(
    userId: number,
    kind: SearchKind,
    value: string,
    beforeId: number | null,
    limit: number
  ): SearchPage {
    const filter = buildSearchFilter(kind, value);
    if (!filter) {
      return { rows: [], hasMore: false };
    }

    const conditions = ["user_id = @userId", filter.clause];
    const params: SqlParams = { ...filter.params, userId, limit };
    if (beforeId !== null) {
      conditions.push("id < @beforeId");
      params.beforeId = beforeId;
    }

    const rows = this.db
      .prepare<SqlParams, TastingRow>(
        `
        SELECT ${TASTING_COLUMNS}
        FROM tastings
        WHERE ${conditions.join(" AND ")}
        ORDER BY id DESC
        LIMIT @limit
      `
      )
      .all(params)
      .map(mapTastingRow);

    const oldest = rows[rows.length - 1];
    if (!oldest) {
      return { rows: [], hasMore: false };
    }

    const probe = this.db
      .prepare<SqlParams, { id: number }>(
        `
        SELECT id
        FROM tastings
        WHERE user_id = @userId AND ${filter.clause} AND id < @oldestId
        ORDER BY id DESC
        LIMIT 1
      `
      )
      .get({ ...filter.params, userId, oldestId: oldest.id });

    return { rows, hasMore: probe !== undefined };
  }

  setUserState(userId: number, step: string, payload: string | null = null): void {
    this.db
      .prepare(
        `
        INSERT INTO user_states (user_id, step, payload, updated_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(user_id) DO UPDATE SET
          step = excluded.step,
          payload = excluded.payload,
          updated_at = excluded.updated_at
      `
      )
      .run(userId, step, payload, nowIso());
  }

  getUserState(userId: number): UserState | null {
    const row = this.db
      .prepare<[number], UserStateRow>(
        `SELECT user_id, step, payload, updated_at FROM user_states WHERE user_id = ?`
      )
      .get(userId);

    return row
      ? {
          userId: row.user_id,
          step: row.step,
          payload: row.payload,
          updatedAt: row.updated_at
        }
      : null;
  }

  clearUserState(userId: number): void {
    this.db.prepare(`DELETE FROM user_states WHERE user_id = ?`).run(userId);
  }

  insertBotEvent(
    userId: number | null,
    chatId: number | null,
    event: string,
    props: Record<string, unknown>
  ): void {
    this.db
      .prepare(
        `
        INSERT INTO bot_events (ts, user_id, chat_id, event, props)
        VALUES (?, ?, ?, ?, ?)
      `
      )
      .run(nowIso(), userId, chatId, event, JSON.stringify(props));
  }

  dailyStats(dayStartIso: string, dayEndIso: string): DailyStats {
    const row = this.db
      .prepare<[string, string], { active_users: number; started: number; saved: number }>(
        `
        SELECT
          COUNT(DISTINCT user_id) AS active_users,
          COALESCE(SUM(CASE WHEN event = 'new_tasting_started' THEN 1 ELSE 0 END), 0) AS started,
          COALESCE(SUM(CASE WHEN event = 'tasting_saved' THEN 1 ELSE 0 END), 0) AS saved
        FROM bot_events
        WHERE ts >= ? AND ts < ?
      `
      )
      .get(dayStartIso, dayEndIso);

    return {
      activeUsers: row?.active_users ?? 0,
      started: row?.started ?? 0,
      saved: row?.saved ?? 0
    };
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        id INTEGER PRIMARY KEY,
        created_at TEXT NOT NULL,
        tz_offset_min INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS tastings (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL,
        seq_no INTEGER NOT NULL,
        name TEXT NOT NULL,
        year INTEGER,
        region TEXT,
        category TEXT,
        grams REAL,
        temp_c INTEGER,
        tasted_at TEXT,
        gear TEXT,
        aroma_dry TEXT,
        aroma_warmed TEXT,
        effects_csv TEXT,
        scenarios_csv TEXT,
        rating INTEGER NOT NULL DEFAULT 0 CHECK(rating BETWEEN 0 AND 10),
        summary TEXT,
        created_at TEXT NOT NULL,
        UNIQUE (user_id, seq_no),
        FOREIGN KEY (user_id) REFERENCES users(id)
      );

      CREATE TABLE IF NOT EXISTS infusions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        tasting_id INTEGER NOT NULL,
        n INTEGER NOT NULL,
        seconds INTEGER,
        liquor_color TEXT,
        taste TEXT,
        special_notes TEXT,
        body TEXT,
        aftertaste TEXT,
        FOREIGN KEY (tasting_id) REFERENCES tastings(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS photos (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        tasting_id INTEGER NOT NULL,
        file_id TEXT NOT NULL,
        FOREIGN KEY (tasting_id) REFERENCES tastings(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS bot_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts TEXT NOT NULL,
        user_id INTEGER,
        chat_id INTEGER,
        event TEXT NOT NULL CHECK(length(event) <= 64),
        props TEXT NOT NULL DEFAULT '{}'
      );

      CREATE TABLE IF NOT EXISTS user_states (
        user_id INTEGER PRIMARY KEY,
        step TEXT NOT NULL,
        payload TEXT,
        updated_at TEXT NOT NULL,
        FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_tastings_user ON tastings(user_id, id);
      CREATE INDEX IF NOT EXISTS idx_infusions_tasting ON infusions(tasting_id);
      CREATE INDEX IF NOT EXISTS idx_photos_tasting ON photos(tasting_id);
      CREATE INDEX IF NOT EXISTS ix_bot_events_ts ON bot_events(ts);
      CREATE INDEX IF NOT EXISTS ix_bot_events_user_id ON bot_events(user_id);
      CREATE INDEX IF NOT EXISTS ix_bot_events_event_ts ON bot_events(event, ts);
    `);
  }
}

export function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    (error.code === "SQLITE_CONSTRAINT_UNIQUE" || error.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}

function buildSearchFilter(kind: SearchKind, value: string): SearchFilter | null {
  const clean = value.trim();

  if (kind === "last") {
    return { clause: "1 = 1", params: {} };
  }

  if (kind === "name") {
    if (!clean) return null;
    return { clause: "instr(casefold(name), @needle) > 0", params: { needle: clean.toLowerCase() } };
  }

  if (kind === "cat") {
    if (!clean) return null;
    return { clause: "casefold(category) = @needle", params: { needle: clean.toLowerCase() } };
  }

  if (kind === "year") {
    if (!/^\d+$/.test(clean)) return null;
    return { clause: "year = @year", params: { year: Number(clean) } };
  }

  if (!/^-?\d+$/.test(clean)) return null;
  return { clause: "rating >= @minRating", params: { minRating: Number(clean) } };
}

function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    createdAt: row.created_at,
    tzOffsetMin: row.tz_offset_min
  };
}

function mapTastingRow(row: TastingRow): Tasting {
  return {
    id: row.id,
    userId: row.user_id,
    seqNo: row.seq_no,
    name: row.name,
    year: row.year,
    region: row.region,
    category: row.category,
    grams: row.grams,
    tempC: row.temp_c,
    tastedAt: row.tasted_at,
    gear: row.gear,
    aromaDry: row.aroma_dry,
    aromaWarmed: row.aroma_warmed,
    effectsCsv: row.effects_csv,
    scenariosCsv: row.scenarios_csv,
    rating: row.rating,
    summary: row.summary,
    createdAt: row.created_at
  };
}

function mapInfusionRow(row: InfusionRow): Infusion {
  return {
    id: row.id,
    tastingId: row.tasting_id,
    n: row.n,
    seconds: row.seconds,
    liquorColor: row.liquor_color,
    taste: row.taste,
    specialNotes: row.special_notes,
    body: row.body,
    aftertaste: row.aftertaste
  };
}
