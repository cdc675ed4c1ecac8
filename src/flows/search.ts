import { decodeMorePayload, encodeMorePayload } from "../lib/payload.js";
import type { SearchKind, Tasting } from "../types.js";
import { shortRow } from "../ui/card.js";
import {
  fitsCallbackData,
  moreKeyboard,
  openKeyboard,
  ratingKeyboard,
  searchCategoryKeyboard,
  searchMenuKeyboard
} from "../ui/keyboards.js";
import type { FlowContext, FlowDeps } from "./context.js";
import type { SessionOf } from "./session.js";

export const PAGE_SIZE = 5;

const SEARCH_KINDS: readonly SearchKind[] = ["last", "name", "cat", "year", "rating"];
const OTHER_CATEGORY_QUERY = "__other__";

const PROMPTS = {
  menu: "Выбери способ поиска:",
  name: "Введи часть названия чая:",
  category: "Выбери категорию или укажи вручную:",
  categoryText: "Введи категорию текстом:",
  year: "Введи год (4 цифры):",
  rating: "Минимальная оценка?"
} as const;

export function isSearchKind(value: string): value is SearchKind {
  return SEARCH_KINDS.some((kind) => kind === value);
}

export function resultsHeader(kind: SearchKind, value: string): string {
  switch (kind) {
    case "last":
      return "Последние записи:";
    case "name":
      return "Найдено:";
    case "cat":
      return `Найдено по категории «${value}»:`;
    case "year":
      return `Найдено за ${value}:`;
    case "rating":
      return `Найдено с оценкой ≥ ${value}:`;
  }
}

/** Callback data of the "load more" button, or null when it exceeds Telegram's limit. */
export function moreCallbackData(kind: SearchKind, userId: number, cursor: number, value: string): string | null {
  const data = `more:${kind}:${encodeMorePayload(userId, cursor, value)}`;
  return fitsCallbackData(data) ? data : null;
}

export async function showSearchMenu(deps: FlowDeps, ctx: FlowContext): Promise<void> {
  deps.sessions.clear(ctx.userId);
  await ctx.io.respond(PROMPTS.menu, searchMenuKeyboard());
}

/** `s_name`, `s_cat`, `s_year`, `s_rating`, `s_last` from the search menu. */
export async function handleSearchMenu(deps: FlowDeps, ctx: FlowContext, data: string): Promise<void> {
  switch (data) {
    case "s_name":
      await awaitQuery(deps, ctx, "name", PROMPTS.name);
      return;
    case "s_year":
      await awaitQuery(deps, ctx, "year", PROMPTS.year);
      return;
    case "s_cat":
      deps.sessions.clear(ctx.userId);
      await ctx.io.respond(PROMPTS.category, searchCategoryKeyboard());
      return;
    case "s_rating":
      deps.sessions.clear(ctx.userId);
      await ctx.io.respond(PROMPTS.rating, ratingKeyboard("frate"));
      return;
    case "s_last":
      await ctx.io.acknowledge();
      await runSearch(deps, ctx, "last", "");
      return;
    default:
      await ctx.io.acknowledge();
  }
}

/** `scat:<category>` or `scat:__other__`. */
export async function handleCategoryPick(deps: FlowDeps, ctx: FlowContext, value: string): Promise<void> {
  if (value === OTHER_CATEGORY_QUERY) {
    await awaitQuery(deps, ctx, "category", PROMPTS.categoryText);
    return;
  }

  await ctx.io.acknowledge();
  await runSearch(deps, ctx, "cat", value);
}

/** `frate:<n>` */
export async function handleRatingPick(deps: FlowDeps, ctx: FlowContext, value: string): Promise<void> {
  await ctx.io.acknowledge();
  if (!/^\d+$/.test(value)) {
    return;
  }

  await runSearch(deps, ctx, "rating", String(Number(value)));
}

export async function handleSearchText(
  deps: FlowDeps,
  ctx: FlowContext,
  session: SessionOf<"search">,
  raw: string
): Promise<void> {
  const text = raw.trim();
  deps.sessions.clear(ctx.userId);

  switch (session.awaiting) {
    case "name":
      await runSearch(deps, ctx, "name", text);
      return;
    case "category":
      await runSearch(deps, ctx, "cat", text);
      return;
    case "year":
      if (!/^\d+$/.test(text)) {
        await ctx.io.send("Нужно число, например 2020.", searchMenuKeyboard());
        return;
      }
      await runSearch(deps, ctx, "year", String(Number(text)));
      return;
  }
}

export async function showLast(deps: FlowDeps, ctx: FlowContext): Promise<void> {
  await runSearch(deps, ctx, "last", "");
}

/** First page of a search: header, one row per record, optional "more", search menu. */
export async function runSearch(deps: FlowDeps, ctx: FlowContext, kind: SearchKind, value: string): Promise<void> {
  const page = deps.db.searchTastings(ctx.userId, kind, value, null, PAGE_SIZE);
  deps.events.log(ctx.userId, ctx.chatId, "search_run", { kind, results: page.rows.length });

  if (page.rows.length === 0) {
    await ctx.io.send(kind === "last" ? "Пока пусто." : "Ничего не нашёл.", searchMenuKeyboard());
    return;
  }

  await ctx.io.send(resultsHeader(kind, value));
  await sendRows(deps, ctx, kind, value, page.rows, page.hasMore);
  await ctx.io.send("Ещё варианты:", searchMenuKeyboard());
}

/** `more:<kind>:<payload>` */
export async function handleMore(deps: FlowDeps, ctx: FlowContext, data: string): Promise<void> {
  const [, kind = "", ...rest] = data.split(":");
  const payload = decodeMorePayload(rest.join(":"));
  if (!payload || !isSearchKind(kind)) {
    await ctx.io.acknowledge();
    return;
  }

  if (payload.userId !== ctx.userId) {
    await ctx.io.setMarkup(null);
    await ctx.io.send("Контекст поиска устарел. Запусти поиск заново.", searchMenuKeyboard());
    await ctx.io.acknowledge();
    return;
  }

  if (!deps.throttle.allow(ctx.userId)) {
    await ctx.io.acknowledge("Слишком часто. Подожди секунду.");
    return;
  }

  const page = deps.db.searchTastings(ctx.userId, kind, payload.value, payload.cursor, PAGE_SIZE);
  await ctx.io.setMarkup(null);
  await ctx.io.acknowledge();

  if (page.rows.length === 0) {
    await ctx.io.send(kind === "last" ? "Больше записей нет." : "Больше результатов нет.", searchMenuKeyboard());
    return;
  }

  await sendRows(deps, ctx, kind, payload.value, page.rows, page.hasMore);
}

async function awaitQuery(
  deps: FlowDeps,
  ctx: FlowContext,
  awaiting: SessionOf<"search">["awaiting"],
  prompt: string
): Promise<void> {
  deps.sessions.save(ctx.userId, { kind: "search", awaiting });
  await ctx.io.respond(prompt);
}

async function sendRows(
  deps: FlowDeps,
  ctx: FlowContext,
  kind: SearchKind,
  value: string,
  rows: readonly Tasting[],
  hasMore: boolean
): Promise<void> {
  for (const row of rows) {
    await ctx.io.send(shortRow(row), openKeyboard(row.id));
  }

  const oldest = rows[rows.length - 1];
  if (!hasMore || !oldest) {
    return;
  }

  const data = moreCallbackData(kind, ctx.userId, oldest.id, value);
  if (!data) {
    deps.logger.debug({ userId: ctx.userId, kind }, "Load-more action exceeds callback data limit");
    await ctx.io.send("Результатов больше, но запрос слишком длинный для кнопки. Уточни запрос.");
    return;
  }

  await ctx.io.send("Показать ещё:", moreKeyboard(data));
}
