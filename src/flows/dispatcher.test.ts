import { afterEach, describe, expect, it, vi } from "vitest";
import { MENU_FIND } from "../ui/keyboards.js";
import { buttonData, createTestDeps, flowContext } from "../testing/harness.js";
import { handleCallback, handleCommand, handlePhoto, handleText } from "./dispatcher.js";
import { MAIN_MENU_TEXT } from "./menu.js";

describe("/tz", () => {
  it("shows the stored offset with a usage hint", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(42);

    await handleCommand(deps, ctx, "tz", "");

    expect(ctx.io.lastText()).toBe("Твой локальный сдвиг (UTC): UTC+0\n\nЧтобы поменять:\n/tz +3\n/tz -5.5");
  });

  it("stores a fractional offset", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(42);

    await handleCommand(deps, ctx, "tz", "-5.5");

    expect(ctx.io.lastText()).toBe("Запомнил UTC-5.5. Теперь буду подставлять твоё локальное время.");
    expect(deps.db.getUser(42)?.tzOffsetMin).toBe(-330);
  });

  it("rejects an offset outside the real range", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(42);

    await handleCommand(deps, ctx, "tz", "+15");

    expect(ctx.io.lastText()).toBe("Не понял формат. Пример: /tz +3 или /tz -5.5");
  });
});

describe("admin commands", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("stay silent for everyone else", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(42);

    await handleCommand(deps, ctx, "whoami", "");
    await handleCommand(deps, ctx, "health", "");
    await handleCommand(deps, ctx, "stats", "");

    expect(ctx.io.sent).toEqual([]);
  });

  it("report identity, database state and location", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(1);

    await handleCommand(deps, ctx, "whoami", "");
    await handleCommand(deps, ctx, "health", "");
    await handleCommand(deps, ctx, "dbinfo", "");

    expect(ctx.io.texts()).toEqual([
      "you_id=1\nis_admin=true",
      "DB: OK",
      "DB: sqlite | file=:memory:\nAPP_ENV=test | TZ=UTC"
    ]);
  });

  it("reports a failing ping with the error", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(1);
    vi.spyOn(deps.db, "ping").mockImplementation(() => {
      throw new Error("disk I/O error");
    });

    await handleCommand(deps, ctx, "health", "");

    expect(ctx.io.lastText()).toBe("DB: FAIL — Error: disk I/O error");
  });

  it("counts today's activity", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2024-05-01T09:30:00.000Z"));
    const deps = createTestDeps();

    await handleCommand(deps, flowContext(42), "start", "");
    await handleCommand(deps, flowContext(43), "new", "");
    const admin = flowContext(1);
    await handleCommand(deps, admin, "stats", "");

    expect(admin.io.lastText()).toBe("Сегодня:\n• DAU: 2\n• Начали дегустаций: 1\n• Сохранили: 0");
  });
});

describe("routing", () => {
  it("lets a reply-keyboard button win over an open wizard", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(42);
    await handleCommand(deps, ctx, "new", "");

    await handleText(deps, ctx, MENU_FIND);

    expect(ctx.io.lastText()).toBe("Выбери способ поиска:");
    expect(deps.sessions.load(42)).toBeNull();
  });

  it("answers free text outside any flow with the main menu", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(42);

    await handleText(deps, ctx, "привет");

    expect(ctx.io.texts()).toEqual([MAIN_MENU_TEXT]);
    expect(buttonData(ctx.io.sent[0]?.markup)).toEqual(["new", "find", "help"]);
  });

  it("ignores photos outside the wizard", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(42);

    await handlePhoto(deps, ctx, "file-1");

    expect(ctx.io.sent).toEqual([]);
    expect(deps.albums.pending(42)).toBe(0);
  });

  it("drops the session on /reset", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(42);
    await handleCommand(deps, ctx, "new", "");

    await handleCommand(deps, ctx, "reset", "");

    expect(ctx.io.lastText()).toBe("Ок, сбросил. Возвращаю в меню.");
    expect(deps.sessions.load(42)).toBeNull();
  });

  it("acknowledges an unknown button", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(42);

    await handleCallback(deps, ctx, "noop");

    expect(ctx.io.notices).toEqual([{ notice: undefined, alert: undefined }]);
    expect(ctx.io.sent).toEqual([]);
  });

  it("turns a failing step into a way back to the menu", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(42);
    vi.spyOn(deps.db, "getTastingForOwner").mockImplementation(() => {
      throw new Error("database is locked");
    });

    await handleCallback(deps, ctx, "open:1");

    expect(ctx.io.texts()).toEqual(["Что-то пошло не так. Начни заново через меню."]);
    expect(buttonData(ctx.io.sent[0]?.markup)).toEqual(["nav:home"]);
    expect(ctx.io.notices).toHaveLength(1);
  });
});
