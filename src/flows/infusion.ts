import { parseSecondsLenient } from "../lib/parsers.js";
import { BODY_PRESETS } from "../vocabulary.js";
import { emptyPicker } from "./session.js";
import type { InfusedDraft, InfusionRecord, WizardAt, WizardState } from "./session.js";

export type Transition = { next: WizardState; text?: string } | { hint: string };

type InfusionTextStep = WizardAt<"inf_seconds" | "inf_color" | "inf_special" | "inf_body" | "inf_more">;

export function startInfusion(draft: InfusedDraft): WizardAt<"inf_seconds"> {
  return { step: "inf_seconds", draft };
}

export function appendInfusion(state: WizardAt<"inf_aftertaste">, aftertaste: string | null): WizardAt<"inf_more"> {
  const record: InfusionRecord = {
    ...state.current,
    n: state.draft.infusions.length + 1,
    aftertaste
  };
  return { step: "inf_more", draft: { ...state.draft, infusions: [...state.draft.infusions, record] } };
}

export function finishInfusions(state: WizardAt<"inf_more">): WizardAt<"effects"> {
  return { step: "effects", draft: state.draft, picker: emptyPicker() };
}

export function skipColor(state: WizardAt<"inf_color">): WizardAt<"inf_taste"> {
  return { step: "inf_taste", draft: state.draft, current: { ...state.current, liquorColor: null }, picker: emptyPicker() };
}

export function skipSpecial(state: WizardAt<"inf_special">): WizardAt<"inf_body"> {
  return {
    step: "inf_body",
    draft: state.draft,
    current: { ...state.current, specialNotes: null },
    awaitingCustom: false
  };
}

/** `body:<preset>` or `body:other`. */
export function pickBody(state: WizardAt<"inf_body">, value: string): Transition {
  if (value === "other") {
    return { next: { ...state, awaitingCustom: true } };
  }

  if (!BODY_PRESETS.some((preset) => preset === value)) {
    return { hint: "Выбери тело кнопкой или нажми «Другое»." };
  }

  return { next: toAftertaste(state, value) };
}

export function infusionText(state: InfusionTextStep, text: string): Transition {
  switch (state.step) {
    case "inf_seconds":
      return {
        next: { step: "inf_color", draft: state.draft, current: { seconds: parseSecondsLenient(text) } }
      };
    case "inf_color":
      return {
        next: {
          step: "inf_taste",
          draft: state.draft,
          current: { ...state.current, liquorColor: text || null },
          picker: emptyPicker()
        }
      };
    case "inf_special":
      return {
        next: {
          step: "inf_body",
          draft: state.draft,
          current: { ...state.current, specialNotes: text || null },
          awaitingCustom: false
        }
      };
    case "inf_body":
      if (!state.awaitingCustom) {
        return { hint: "Выбери тело кнопкой или нажми «Другое»." };
      }
      if (!text) {
        return { hint: "Введи тело настоя текстом:" };
      }
      return { next: toAftertaste(state, text) };
    case "inf_more":
      return { hint: "Нажми «Ещё пролив» или «Завершить»." };
  }
}

function toAftertaste(state: WizardAt<"inf_body">, body: string): WizardAt<"inf_aftertaste"> {
  return {
    step: "inf_aftertaste",
    draft: state.draft,
    current: { ...state.current, body },
    picker: emptyPicker()
  };
}
