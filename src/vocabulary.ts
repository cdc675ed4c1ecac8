import type { ParseResult } from "./lib/parsers.js";

export const OTHER_CATEGORY = "Другое";

export const CATEGORIES = [
  "Зелёный",
  "Белый",
  "Красный",
  "Улун",
  "Шу Пуэр",
  "Шен Пуэр",
  "Хэй Ча",
  OTHER_CATEGORY
] as const;

export const BODY_PRESETS = ["тонкое", "лёгкое", "среднее", "плотное", "маслянистое"] as const;

export const EFFECTS = [
  "Тепло",
  "Охлаждение",
  "Расслабление",
  "Фокус",
  "Бодрость",
  "Тонус",
  "Спокойствие",
  "Сонливость"
] as const;

export const SCENARIOS = ["Отдых", "Работа/учеба", "Творчество", "Медитация", "Общение", "Прогулка"] as const;

export const DESCRIPTORS = [
  "сухофрукты",
  "мёд",
  "хлебные",
  "цветы",
  "орех",
  "древесный",
  "дымный",
  "ягоды",
  "фрукты",
  "травянистый",
  "овощные",
  "пряный",
  "землистый"
] as const;

export const AFTERTASTE_SET = [
  "сладкий",
  "фруктовый",
  "ягодный",
  "цветочный",
  "цитрусовый",
  "кондитерский",
  "хлебный",
  "древесный",
  "пряный",
  "горький",
  "минеральный",
  "овощной",
  "землистый"
] as const;

export const CATEGORY_MAX_LENGTH = 60;

export function isKnownCategory(value: string): boolean {
  return CATEGORIES.some((category) => category === value && category !== OTHER_CATEGORY);
}

/** Adds the item when absent, removes it when present. */
export function toggleItem(selected: readonly string[], item: string): string[] {
  return selected.includes(item) ? selected.filter((value) => value !== item) : [...selected, item];
}

export function joinSelection(selected: readonly string[]): string | null {
  return selected.length > 0 ? selected.join(", ") : null;
}

export function validateCustomCategory(raw: string): ParseResult<string> {
  const text = raw.trim();
  if (!text || text === "-") {
    return { ok: false, error: "Категория не может быть пустой. Пришли категорию текстом." };
  }
  if (text.length > CATEGORY_MAX_LENGTH) {
    return { ok: false, error: "Категория слишком длинная. Пришли категорию текстом покороче." };
  }
  return { ok: true, value: text };
}
