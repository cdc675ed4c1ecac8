import { InlineKeyboard, Keyboard } from "grammy";
import { FIELD_LABELS } from "../flows/editFields.js";
import type { FieldKey } from "../flows/editFields.js";
import { BODY_PRESETS, CATEGORIES, OTHER_CATEGORY } from "../vocabulary.js";

export const MENU_NEW = "📝 Новая дегустация";
export const MENU_FIND = "🔎 Найти записи";
export const MENU_LAST = "🕔 Последние 5";
export const MENU_HELP = "❔ Помощь";
export const MENU_RESET = "Сброс";

/** Telegram rejects callback data longer than this many bytes. */
export const CALLBACK_DATA_LIMIT = 64;

const EDIT_FIELD_ORDER: FieldKey[] = [
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
  "effects",
  "scenarios",
  "rating",
  "summary"
];

type Button = readonly [label: string, data: string];

function grid(buttons: readonly Button[], ...widths: number[]): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  let index = 0;
  let row = 0;

  while (index < buttons.length) {
    const width = widths[Math.min(row, widths.length - 1)] ?? 1;
    for (const [label, data] of buttons.slice(index, index + width)) {
      keyboard.text(label, data);
    }
    index += width;
    row += 1;
    if (index < buttons.length) {
      keyboard.row();
    }
  }

  return keyboard;
}

export function fitsCallbackData(data: string): boolean {
  return Buffer.byteLength(data, "utf-8") <= CALLBACK_DATA_LIMIT;
}

export function mainMenuKeyboard(): InlineKeyboard {
  return grid(
    [
      [MENU_NEW, "new"],
      [MENU_FIND, "find"],
      [MENU_HELP, "help"]
    ],
    1
  );
}

export function replyMenuKeyboard(): Keyboard {
  return new Keyboard()
    .text(MENU_NEW)
    .text(MENU_FIND)
    .row()
    .text(MENU_LAST)
    .text(MENU_HELP)
    .row()
    .text(MENU_RESET)
    .resized()
    .placeholder("Выбери действие");
}

export function skipKeyboard(step: string): InlineKeyboard {
  return new InlineKeyboard().text("Пропустить", `skip:${step}`);
}

export function categoryKeyboard(): InlineKeyboard {
  return grid(
    CATEGORIES.map((category) => [category, `cat:${category}`] as const),
    2
  );
}

export function timeKeyboard(): InlineKeyboard {
  return grid(
    [
      ["Текущее время", "time:now"],
      ["Пропустить", "skip:tasted_at"]
    ],
    1
  );
}

/** Multi-select: `<prefix>:<index>` toggles, `<prefix>:other`, `<prefix>:done`. */
export function toggleKeyboard(
  source: readonly string[],
  selected: readonly string[],
  prefix: string,
  doneLabel = "Готово"
): InlineKeyboard {
  const buttons: Button[] = source.map((item, index) => [
    selected.includes(item) ? `✅ ${item}` : item,
    `${prefix}:${index}`
  ]);
  buttons.push([OTHER_CATEGORY, `${prefix}:other`], [doneLabel, `${prefix}:done`]);
  return grid(buttons, 2);
}

export function bodyKeyboard(): InlineKeyboard {
  const buttons: Button[] = BODY_PRESETS.map((body) => [body, `body:${body}`]);
  buttons.push([OTHER_CATEGORY, "body:other"]);
  return grid(buttons, 3, 3);
}

export function moreInfusionsKeyboard(): InlineKeyboard {
  return grid(
    [
      ["🫖 Ещё пролив", "more_inf"],
      ["✅ Завершить", "finish_inf"]
    ],
    2
  );
}

export function ratingKeyboard(prefix: "rate" | "frate" | "erat"): InlineKeyboard {
  const buttons: Button[] = Array.from({ length: 11 }, (_, value) => [String(value), `${prefix}:${value}`]);
  return grid(buttons, 6, 5);
}

export function photosKeyboard(): InlineKeyboard {
  return grid(
    [
      ["Готово", "photos:done"],
      ["Пропустить", "skip:photos"]
    ],
    2
  );
}

export function searchMenuKeyboard(): InlineKeyboard {
  return grid(
    [
      ["По названию", "s_name"],
      ["По категории", "s_cat"],
      ["По году", "s_year"],
      ["По рейтингу", "s_rating"],
      ["Последние 5", "s_last"],
      ["⬅️ Назад", "back:main"]
    ],
    2
  );
}

export function searchCategoryKeyboard(): InlineKeyboard {
  const buttons: Button[] = CATEGORIES.filter((category) => category !== OTHER_CATEGORY).map((category) => [
    category,
    `scat:${category}`
  ]);
  buttons.push(["Другая категория (ввести)", "scat:__other__"]);
  return grid(buttons, 2);
}

export function openKeyboard(tastingId: number): InlineKeyboard {
  return new InlineKeyboard().text("Открыть", `open:${tastingId}`);
}

export function moreKeyboard(data: string): InlineKeyboard {
  return new InlineKeyboard().text("Показать ещё", data);
}

export function cardActionsKeyboard(tastingId: number, photoCount = 0): InlineKeyboard {
  const buttons: Button[] = [
    ["✏️ Редактировать", `edit:${tastingId}`],
    ["🗑️ Удалить", `del:${tastingId}`]
  ];
  if (photoCount > 0) {
    buttons.push(["📷 Фото", `pics:${tastingId}`]);
  }
  buttons.push(["⬅️ Назад", "back:main"]);
  return grid(buttons, 2);
}

export function editFieldsKeyboard(): InlineKeyboard {
  const buttons: Button[] = EDIT_FIELD_ORDER.map((field) => [FIELD_LABELS[field], `efld:${field}`]);
  buttons.push(["Отмена", "efld:cancel"]);
  return grid(buttons, 2);
}

export function editCategoryKeyboard(): InlineKeyboard {
  const buttons: Button[] = CATEGORIES.filter((category) => category !== OTHER_CATEGORY).map((category) => [
    category,
    `ecat:${category}`
  ]);
  buttons.push(["Другое (ввести)", "ecat:__other__"], ["⬅️ Назад", "ecat:__back__"]);
  return grid(buttons, 2);
}

export function confirmDeleteKeyboard(tastingId: number): InlineKeyboard {
  return grid(
    [
      ["Да, удалить", `delok:${tastingId}`],
      ["Отмена", `delno:${tastingId}`]
    ],
    2
  );
}

export function homeKeyboard(): InlineKeyboard {
  return new InlineKeyboard().text("⬅️ В меню", "nav:home");
}
