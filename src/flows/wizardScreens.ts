import type { InlineKeyboard } from "grammy";
import { MAX_PHOTOS } from "../services/tastings.js";
import {
  bodyKeyboard,
  categoryKeyboard,
  moreInfusionsKeyboard,
  photosKeyboard,
  ratingKeyboard,
  skipKeyboard,
  timeKeyboard,
  toggleKeyboard
} from "../ui/keyboards.js";
import { AFTERTASTE_SET, DESCRIPTORS, EFFECTS, SCENARIOS } from "../vocabulary.js";
import type { WizardAt, WizardState } from "./session.js";

export type PickerStep = WizardAt<"aroma_dry" | "aroma_warmed" | "inf_taste" | "inf_aftertaste" | "effects" | "scenarios">;
export type PickerStepName = PickerStep["step"];

interface PickerSpec {
  prefix: string;
  source: readonly string[];
  prompt: string;
  customPrompt: string;
  /** A typed item completes the step instead of returning to the picker. */
  customFinishes: boolean;
}

export const PICKERS: Record<PickerStepName, PickerSpec> = {
  aroma_dry: {
    prefix: "ad",
    source: DESCRIPTORS,
    prompt: "🌬️ Аромат сухого листа: выбери дескрипторы и нажми «Готово», или «Другое».",
    customPrompt: "Введи аромат сухого листа текстом:",
    customFinishes: true
  },
  aroma_warmed: {
    prefix: "aw",
    source: DESCRIPTORS,
    prompt: "🌬️ Аромат прогретого/промытого листа: выбери и нажми «Готово».",
    customPrompt: "Введи аромат прогретого/промытого листа текстом:",
    customFinishes: true
  },
  inf_taste: {
    prefix: "taste",
    source: DESCRIPTORS,
    prompt: "Вкус настоя: выбери дескрипторы и нажми «Готово», или «Другое».",
    customPrompt: "Введи вкус текстом:",
    customFinishes: true
  },
  inf_aftertaste: {
    prefix: "aft",
    source: AFTERTASTE_SET,
    prompt: "Характер послевкусия: выбери пункты и нажми «Готово», или «Другое».",
    customPrompt: "Введи характер послевкусия текстом:",
    customFinishes: true
  },
  effects: {
    prefix: "eff",
    source: EFFECTS,
    prompt: "Ощущения (мультивыбор). Жми пункты, затем «Готово», либо «Другое».",
    customPrompt: "Введи ощущение текстом:",
    customFinishes: false
  },
  scenarios: {
    prefix: "scn",
    source: SCENARIOS,
    prompt: "Сценарии (мультивыбор). Жми пункты, затем «Готово», либо «Другое».",
    customPrompt: "Введи сценарий текстом:",
    customFinishes: false
  }
};

export function pickerStepByPrefix(prefix: string): PickerStepName | null {
  for (const [step, spec] of Object.entries(PICKERS)) {
    if (spec.prefix === prefix && isPickerStepName(step)) {
      return step;
    }
  }
  return null;
}

export function isPickerStep(state: WizardState): state is PickerStep {
  return isPickerStepName(state.step);
}

function isPickerStepName(step: string): step is PickerStepName {
  return step in PICKERS;
}

export function pickerKeyboard(state: PickerStep): InlineKeyboard {
  const spec = PICKERS[state.step];
  return toggleKeyboard(spec.source, state.picker.selected, spec.prefix);
}

export interface Screen {
  text: string;
  markup?: InlineKeyboard;
}

export function photosProgress(count: number): string {
  return `Добавлено ${count}/${MAX_PHOTOS}. Отправьте ещё или нажмите «Готово».`;
}

/** What the user sees when a step becomes current. */
export function wizardScreen(state: WizardState, localTime: string): Screen {
  switch (state.step) {
    case "name":
      return { text: "🍵 Название чая?" };
    case "year":
      return { text: "📅 Год сбора? Можно пропустить.", markup: skipKeyboard("year") };
    case "region":
      return { text: "🗺️ Регион? Можно пропустить.", markup: skipKeyboard("region") };
    case "category":
      return state.awaitingCustom
        ? { text: "Введи категорию текстом:" }
        : { text: "🏷️ Категория?", markup: categoryKeyboard() };
    case "grams":
      return { text: "⚖️ Граммовка? Можно пропустить.", markup: skipKeyboard("grams") };
    case "temp":
      return { text: "🌡️ Температура, °C? Можно пропустить.", markup: skipKeyboard("temp") };
    case "tasted_at":
      return {
        text: `⏰ Время дегустации? Сейчас ${localTime}. Введи HH:MM, нажми «Текущее время» или пропусти.`,
        markup: timeKeyboard()
      };
    case "gear":
      return { text: "🍶 Посуда дегустации? Можно пропустить.", markup: skipKeyboard("gear") };
    case "inf_seconds":
      return { text: `🫖 Пролив ${state.draft.infusions.length + 1}. Время, сек?` };
    case "inf_color":
      return { text: "Цвет настоя пролива? Можно пропустить.", markup: skipKeyboard("color") };
    case "inf_special":
      return { text: "✨ Особенные ноты пролива? (можно пропустить)", markup: skipKeyboard("special") };
    case "inf_body":
      return state.awaitingCustom
        ? { text: "Введи тело настоя текстом:" }
        : { text: "Тело настоя?", markup: bodyKeyboard() };
    case "inf_more":
      return { text: "Добавить ещё пролив или завершаем?", markup: moreInfusionsKeyboard() };
    case "rating":
      return { text: "Оценка сорта 0..10?", markup: ratingKeyboard("rate") };
    case "summary":
      return { text: "📝 Заметка по дегустации? (можно пропустить)", markup: skipKeyboard("summary") };
    case "photos":
      return {
        text: `📷 Добавьте фото (до ${MAX_PHOTOS}). ${photosProgress(state.photos.length)}`,
        markup: photosKeyboard()
      };
    case "aroma_dry":
    case "aroma_warmed":
    case "inf_taste":
    case "inf_aftertaste":
    case "effects":
    case "scenarios":
      return state.picker.awaitingCustom
        ? { text: PICKERS[state.step].customPrompt }
        : { text: PICKERS[state.step].prompt, markup: pickerKeyboard(state) };
  }
}
