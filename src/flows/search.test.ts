import { beforeEach, describe, expect, it } from "vitest";
import { encodeMorePayload } from "../lib/payload.js";
import { createTasting } from "../services/tastings.js";
import { FakeResponder, buttonData, createTestDeps, flowContext, tastingInput } from "../testing/harness.js";
import type { TestDeps } from "../testing/harness.js";
import { handleCallback, handleCommand, handleText } from "./dispatcher.js";
import { moreCallbackData } from "./search.js";

function moreButton(io: FakeResponder): string {
  const message = io.sent.find((sent) => sent.text === "Показать ещё:");
  const [data = ""] = buttonData(message?.markup);
  return data;
}

describe("search", () => {
  let deps: TestDeps;

  beforeEach(() => {
    deps = createTestDeps();
    deps.db.ensureUser(42);
    for (let index = 1; index <= 12; index += 1) {
      createTasting(deps.db, tastingInput(42, { name: `Чай ${index}` }), [], []);
    }
  });

  it("pages the latest records five at a time", async () => {
    const ctx = flowContext(42);

    await handleCommand(deps, ctx, "last", "");
    expect(ctx.io.texts()).toEqual([
      "Последние записи:",
      "#12 [Улун] Чай 12",
      "#11 [Улун] Чай 11",
      "#10 [Улун] Чай 10",
      "#9 [Улун] Чай 9",
      "#8 [Улун] Чай 8",
      "Показать ещё:",
      "Ещё варианты:"
    ]);
    expect(deps.db.countBotEvents("search_run")).toBe(1);

    const secondPage = moreButton(ctx.io);
    ctx.io.reset();
    await handleCallback(deps, ctx, secondPage);
    expect(ctx.io.texts()).toEqual([
      "#7 [Улун] Чай 7",
      "#6 [Улун] Чай 6",
      "#5 [Улун] Чай 5",
      "#4 [Улун] Чай 4",
      "#3 [Улун] Чай 3",
      "Показать ещё:"
    ]);
    expect(ctx.io.markups).toEqual([null]);

    const thirdPage = moreButton(ctx.io);
    deps.clock.ms = 1100;
    ctx.io.reset();
    await handleCallback(deps, ctx, thirdPage);
    expect(ctx.io.texts()).toEqual(["#2 [Улун] Чай 2", "#1 [Улун] Чай 1"]);
  });

  it("ignores a second load-more press inside the throttle interval", async () => {
    const ctx = flowContext(42);
    const data = `more:last:${encodeMorePayload(42, 9999)}`;

    await handleCallback(deps, ctx, data);
    ctx.io.reset();
    await handleCallback(deps, ctx, data);

    expect(ctx.io.notices).toEqual([{ notice: "Слишком часто. Подожди секунду.", alert: undefined }]);
    expect(ctx.io.sent).toEqual([]);
  });

  it("refuses a payload minted for another user", async () => {
    const ctx = flowContext(42);

    await handleCallback(deps, ctx, `more:last:${encodeMorePayload(7, 9999)}`);

    expect(ctx.io.texts()).toEqual(["Контекст поиска устарел. Запусти поиск заново."]);
    expect(ctx.io.markups).toEqual([null]);
  });

  it("searches by name after asking for the query", async () => {
    const ctx = flowContext(42);

    await handleCallback(deps, ctx, "s_name");
    expect(ctx.io.lastText()).toBe("Введи часть названия чая:");

    await handleText(deps, ctx, "чай 1");
    expect(ctx.io.texts().slice(1)).toEqual([
      "Найдено:",
      "#12 [Улун] Чай 12",
      "#11 [Улун] Чай 11",
      "#10 [Улун] Чай 10",
      "#1 [Улун] Чай 1",
      "Ещё варианты:"
    ]);
    expect(deps.sessions.load(42)).toBeNull();
  });

  it("reports an empty result for a category", async () => {
    const ctx = flowContext(42);

    await handleCallback(deps, ctx, "scat:Белый");

    expect(ctx.io.texts()).toEqual(["Ничего не нашёл."]);
  });

  it("asks for a number when the year is not one", async () => {
    const ctx = flowContext(42);

    await handleCallback(deps, ctx, "s_year");
    await handleText(deps, ctx, "позапрошлый");

    expect(ctx.io.lastText()).toBe("Нужно число, например 2020.");
    expect(deps.sessions.load(42)).toBeNull();
  });

  it("replaces the load-more button with a hint when the query is too long", async () => {
    const ctx = flowContext(42);
    const longName = "Очень длинное название улуна";
    for (let index = 0; index < 6; index += 1) {
      createTasting(deps.db, tastingInput(42, { name: longName }), [], []);
    }

    await handleCallback(deps, ctx, "s_name");
    await handleText(deps, ctx, longName);

    expect(ctx.io.texts()).toContain("Результатов больше, но запрос слишком длинный для кнопки. Уточни запрос.");
    expect(ctx.io.texts()).not.toContain("Показать ещё:");
  });
});

describe("moreCallbackData", () => {
  it("keeps short queries", () => {
    expect(moreCallbackData("name", 42, 100, "улун")).toBe(`more:name:${encodeMorePayload(42, 100, "улун")}`);
  });

  it("returns null past 64 bytes", () => {
    expect(moreCallbackData("name", 42, 100, "улун".repeat(10))).toBeNull();
  });
});
