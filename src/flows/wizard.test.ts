import { describe, expect, it } from "vitest";
import { buttonData, createTestDeps, flowContext } from "../testing/harness.js";
import { handleCallback, handleCommand, handlePhoto, handleText } from "./dispatcher.js";
import type { SummaryDraft, WizardAt } from "./session.js";
import { STALE_STEP } from "./context.js";
import { completePicker, skipStep, wizardText } from "./wizard.js";

const summaryDraft: SummaryDraft = {
  name: "Шен Пуэр 2015",
  year: null,
  region: null,
  category: null,
  grams: null,
  tempC: null,
  tastedAt: null,
  gear: null,
  aromaDry: null,
  aromaWarmed: null,
  infusions: [],
  effects: [],
  scenarios: [],
  rating: 5,
  summary: null
};

describe("wizard transitions", () => {
  it("stores an unparseable year as unset and moves on", () => {
    const result = wizardText({ step: "year", draft: { name: "Чай" } }, "20");

    expect(result).toEqual({ next: { step: "region", draft: { name: "Чай", year: null } } });
  });

  it("answers text at the category step with a hint until «Другое» is pressed", () => {
    const draft = { name: "Чай", year: null, region: null };

    expect(wizardText({ step: "category", draft, awaitingCustom: false }, "Габа")).toEqual({
      hint: "Выбери категорию кнопкой или нажми «Другое»."
    });
    expect(wizardText({ step: "category", draft, awaitingCustom: true }, "Габа")).toEqual({
      next: { step: "grams", draft: { ...draft, category: "Габа" } }
    });
  });

  it("clamps a typed rating", () => {
    const draft = { ...summaryDraft };
    const { rating: _rating, summary: _summary, ...scenariosDraft } = draft;
    const result = wizardText({ step: "rating", draft: scenariosDraft }, "15");

    expect(result).toEqual({ next: { step: "summary", draft: { ...scenariosDraft, rating: 10 } } });
  });

  it("only skips the step the button belongs to", () => {
    expect(skipStep({ step: "year", draft: { name: "Чай" } }, "region")).toBeNull();
    expect(skipStep({ step: "year", draft: { name: "Чай" } }, "year")).toEqual({
      step: "region",
      draft: { name: "Чай", year: null }
    });
  });

  it("joins a multi-select and leaves an empty one unset", () => {
    const state: WizardAt<"aroma_dry"> = {
      step: "aroma_dry",
      draft: {
        name: "Чай",
        year: null,
        region: null,
        category: null,
        grams: null,
        tempC: null,
        tastedAt: null,
        gear: null
      },
      picker: { selected: [], awaitingCustom: false }
    };

    const filled = completePicker(state, ["мёд", "цветы"]);
    const empty = completePicker(state, []);

    expect(filled.step === "aroma_warmed" && filled.draft.aromaDry).toBe("мёд, цветы");
    expect(empty.step === "aroma_warmed" && empty.draft.aromaDry).toBeNull();
  });
});

describe("wizard conversation", () => {
  it("collects a full tasting and saves it with its infusion and photo", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(42);

    await handleCommand(deps, ctx, "tz", "+3");
    await handleCommand(deps, ctx, "new", "");
    expect(ctx.io.lastText()).toBe("🍵 Название чая?");

    await handleText(deps, ctx, "Те Гуань Инь");
    await handleText(deps, ctx, "2021");
    await handleCallback(deps, ctx, "skip:region");
    await handleCallback(deps, ctx, "cat:Улун");
    await handleText(deps, ctx, "7,5");
    await handleText(deps, ctx, "95");
    expect(ctx.io.lastText()).toBe(
      "⏰ Время дегустации? Сейчас 12:30. Введи HH:MM, нажми «Текущее время» или пропусти."
    );
    await handleCallback(deps, ctx, "time:now");
    await handleCallback(deps, ctx, "skip:gear");

    await handleCallback(deps, ctx, "ad:1");
    expect(buttonData(ctx.io.markups[ctx.io.markups.length - 1] ?? undefined)).toContain("ad:done");
    await handleCallback(deps, ctx, "ad:done");
    await handleCallback(deps, ctx, "aw:other");
    await handleText(deps, ctx, "карамель");
    expect(ctx.io.lastText()).toBe("🫖 Пролив 1. Время, сек?");

    await handleText(deps, ctx, "15");
    await handleCallback(deps, ctx, "skip:color");
    await handleText(deps, ctx, "сливочный");
    await handleCallback(deps, ctx, "skip:special");
    await handleCallback(deps, ctx, "body:плотное");
    await handleCallback(deps, ctx, "aft:0");
    await handleCallback(deps, ctx, "aft:done");
    await handleCallback(deps, ctx, "finish_inf");

    await handleCallback(deps, ctx, "eff:3");
    await handleCallback(deps, ctx, "eff:other");
    await handleText(deps, ctx, "Ясность");
    expect(ctx.io.lastText()).toBe("Добавил. Можешь выбрать ещё и нажать «Готово».");
    await handleCallback(deps, ctx, "eff:done");
    await handleCallback(deps, ctx, "scn:done");
    await handleCallback(deps, ctx, "rate:9");
    await handleText(deps, ctx, "Очень цветочный");

    await handlePhoto(deps, ctx, "file-1");
    expect(ctx.io.lastText()).toBe("Добавлено 1/3. Отправьте ещё или нажмите «Готово».");
    await handleCallback(deps, ctx, "photos:done");

    const tasting = deps.db.getTastingBySeq(42, 1);
    expect(tasting).toMatchObject({
      name: "Те Гуань Инь",
      year: 2021,
      region: null,
      category: "Улун",
      grams: 7.5,
      tempC: 95,
      tastedAt: "12:30",
      gear: null,
      aromaDry: "мёд",
      aromaWarmed: "карамель",
      effectsCsv: "Фокус, Ясность",
      scenariosCsv: null,
      rating: 9,
      summary: "Очень цветочный"
    });
    expect(deps.db.listInfusions(tasting?.id ?? 0)).toMatchObject([
      { n: 1, seconds: 15, liquorColor: null, taste: "сливочный", specialNotes: null, body: "плотное", aftertaste: "сладкий" }
    ]);
    expect(deps.db.listPhotoIds(tasting?.id ?? 0, 3)).toEqual(["file-1"]);
    expect(deps.sessions.load(42)).toBeNull();

    expect(ctx.io.photos).toHaveLength(1);
    expect(ctx.io.photos[0]?.caption?.startsWith("#1 Те Гуань Инь · Улун · 2021")).toBe(true);
    expect(ctx.io.lastText()).toBe("Действия:");
    expect(deps.db.countBotEvents("new_tasting_started")).toBe(1);
    expect(deps.db.countBotEvents("tasting_saved")).toBe(1);
  });

  it("rejects a button from another step", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(42);

    await handleCommand(deps, ctx, "new", "");
    await handleText(deps, ctx, "Чай");
    await handleCallback(deps, ctx, "skip:region");

    expect(ctx.io.notices).toContainEqual({ notice: STALE_STEP, alert: true });
    expect(deps.sessions.load(42)).toMatchObject({ kind: "wizard", wizard: { step: "year" } });
  });

  it("keeps only what fits of an album", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(42);
    deps.db.ensureUser(42);
    deps.sessions.save(42, { kind: "wizard", wizard: { step: "photos", draft: summaryDraft, photos: ["p1", "p2"] } });

    await handlePhoto(deps, ctx, "a1", "album");
    await handlePhoto(deps, ctx, "a2", "album");
    await handlePhoto(deps, ctx, "a3", "album");
    await deps.albums.drain(42, true);

    expect(ctx.io.texts()).toEqual([
      "Из-за лимита 3 фото сохранил только часть альбома.",
      "Добавлено 3/3. Отправьте ещё или нажмите «Готово»."
    ]);
    expect(deps.sessions.load(42)).toMatchObject({ wizard: { photos: ["p1", "p2", "a1"] } });
  });

  it("drops buffered photos when the photo step is skipped", async () => {
    const deps = createTestDeps();
    const ctx = flowContext(42);
    deps.db.ensureUser(42);
    deps.sessions.save(42, { kind: "wizard", wizard: { step: "photos", draft: summaryDraft, photos: ["p1"] } });

    await handlePhoto(deps, ctx, "a1", "album");
    await handleCallback(deps, ctx, "skip:photos");

    const tasting = deps.db.getTastingBySeq(42, 1);
    expect(deps.db.countPhotos(tasting?.id ?? 0)).toBe(0);
    expect(deps.albums.pending(42)).toBe(0);
    expect(ctx.io.photos).toHaveLength(0);
    expect(ctx.io.sent[0]?.text.startsWith("#1 Шен Пуэр 2015")).toBe(true);
  });
});
