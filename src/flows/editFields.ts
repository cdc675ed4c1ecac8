import {
  parseCsvStrict,
  parseGramsStrict,
  parseTemperatureStrict,
  parseTimeStrict,
  parseYearStrict
} from "../lib/parsers.js";
import type { ParseResult } from "../lib/parsers.js";
import type { EditableColumn } from "../types.js";

export const TEXT_FIELD_KEYS = [
  "name",
  "year",
  "region",
  "grams",
  "temp_c",
  "tasted_at",
  "gear",
  "aroma_dry",
  "aroma_warmed",
  "effects",
  "scenarios",
  "summary"
] as const;

export type TextFieldKey = (typeof TEXT_FIELD_KEYS)[number];
export type FieldKey = TextFieldKey | "category" | "rating";

export const CLEAR_SENTINEL = "-";

interface TextFieldSpec {
  prompt: string;
  allowClear: boolean;
  column: EditableColumn;
  parse: (text: string) => ParseResult<string | number>;
}

const asText = (text: string): ParseResult<string> => ({ ok: true, value: text });

export const FIELD_LABELS: Record<FieldKey, string> = {
  name: "Название",
  year: "Год",
  region: "Регион",
  category: "Категория",
  grams: "Граммовка",
  temp_c: "Температура",
  tasted_at: "Время",
  gear: "Посуда",
  aroma_dry: "Аромат (сухой)",
  aroma_warmed: "Аромат (прогретый)",
  effects: "Ощущения",
  scenarios: "Сценарии",
  rating: "Оценка",
  summary: "Заметка"
};

export const TEXT_FIELDS: Record<TextFieldKey, TextFieldSpec> = {
  name: { prompt: "Пришли новое название.", allowClear: false, column: "name", parse: asText },
  year: {
    prompt: "Пришли год (4 цифры) или «-» чтобы очистить.",
    allowClear: true,
    column: "year",
    parse: parseYearStrict
  },
  region: { prompt: "Пришли регион или «-» чтобы очистить.", allowClear: true, column: "region", parse: asText },
  grams: { prompt: "Пришли граммовку (число) или «-».", allowClear: true, column: "grams", parse: parseGramsStrict },
  temp_c: {
    prompt: "Пришли температуру (°C) или «-».",
    allowClear: true,
    column: "temp_c",
    parse: parseTemperatureStrict
  },
  tasted_at: {
    prompt: "Пришли время в формате HH:MM или «-».",
    allowClear: true,
    column: "tasted_at",
    parse: parseTimeStrict
  },
  gear: { prompt: "Пришли посуду или «-».", allowClear: true, column: "gear", parse: asText },
  aroma_dry: { prompt: "Пришли аромат сухого листа или «-».", allowClear: true, column: "aroma_dry", parse: asText },
  aroma_warmed: {
    prompt: "Пришли аромат прогретого/промытого листа или «-».",
    allowClear: true,
    column: "aroma_warmed",
    parse: asText
  },
  effects: {
    prompt: "Пришли ощущения через запятую или «-».",
    allowClear: true,
    column: "effects_csv",
    parse: parseCsvStrict
  },
  scenarios: {
    prompt: "Пришли сценарии через запятую или «-».",
    allowClear: true,
    column: "scenarios_csv",
    parse: parseCsvStrict
  },
  summary: { prompt: "Пришли заметку или «-».", allowClear: true, column: "summary", parse: asText }
};

export type PreparedEdit =
  | { ok: true; column: EditableColumn; value: string | number | null }
  | { ok: false; message: string };

export function isTextFieldKey(value: string): value is TextFieldKey {
  return TEXT_FIELD_KEYS.some((key) => key === value);
}

/**
 * Validates one free-text edit. Errors carry the message to send back,
 * prefixed with the reason when the input was malformed.
 */
export function prepareTextEdit(field: TextFieldKey, raw: string): PreparedEdit {
  const spec = TEXT_FIELDS[field];
  const text = raw.trim();

  if (!text) {
    return { ok: false, message: spec.prompt };
  }

  if (text === CLEAR_SENTINEL) {
    return spec.allowClear ? { ok: true, column: spec.column, value: null } : { ok: false, message: spec.prompt };
  }

  const parsed = spec.parse(text);
  if (!parsed.ok) {
    return { ok: false, message: `${parsed.error} ${spec.prompt}` };
  }

  return { ok: true, column: spec.column, value: parsed.value };
}
