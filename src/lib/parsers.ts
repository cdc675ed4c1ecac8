import { normalizeCsvText } from "./format.js";

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

// Creation wizard: unparseable input becomes null and the step still advances.

export function parseYearLenient(input: string): number | null {
  const text = input.trim();
  return /^\d{4}$/.test(text) ? Number(text) : null;
}

export function parseGramsLenient(input: string): number | null {
  return parseDecimal(input);
}

export function parseTemperatureLenient(input: string): number | null {
  const value = parseDecimal(input);
  return value === null ? null : Math.trunc(value);
}

export function parseSecondsLenient(input: string): number | null {
  const text = input.trim();
  return /^\d+$/.test(text) ? Number(text) : null;
}

export function parseTimeLenient(input: string): string | null {
  return parseTimeOfDay(input);
}

export function parseRatingLenient(input: string): number {
  const text = input.trim();
  if (!/^\d+$/.test(text)) {
    return 0;
  }

  return Math.max(0, Math.min(10, Number(text)));
}

// Edit flow: the same fields are validated strictly.

export function parseYearStrict(input: string): ParseResult<number> {
  const year = parseYearLenient(input);
  return year === null ? { ok: false, error: "Год должен состоять из 4 цифр." } : { ok: true, value: year };
}

export function parseGramsStrict(input: string): ParseResult<number> {
  const grams = parseDecimal(input);
  return grams === null ? { ok: false, error: "Не удалось распознать число." } : { ok: true, value: grams };
}

export function parseTemperatureStrict(input: string): ParseResult<number> {
  const text = input.trim();
  return /^-?\d+$/.test(text)
    ? { ok: true, value: Number(text) }
    : { ok: false, error: "Используй целое число." };
}

export function parseTimeStrict(input: string): ParseResult<string> {
  const time = parseTimeOfDay(input);
  return time === null
    ? { ok: false, error: "Время должно быть в формате HH:MM." }
    : { ok: true, value: time };
}

export function parseCsvStrict(input: string): ParseResult<string> {
  const normalized = normalizeCsvText(input);
  return normalized ? { ok: true, value: normalized } : { ok: false, error: "Список пуст." };
}

export function parseTimeOfDay(input: string): string | null {
  const match = input.trim().match(TIME_PATTERN);
  if (!match) {
    return null;
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    return null;
  }

  return `${hours.toString().padStart(2, "0")}:${match[2]}`;
}

/** `+3`, `-5.5`, `UTC+3` → minutes east of UTC. */
export function parseUtcOffset(input: string): number | null {
  const text = input.replace(/utc/gi, "").replace(/\s+/g, "").replace(",", ".");
  if (!/^[+-]?\d+(\.\d+)?$/.test(text)) {
    return null;
  }

  const minutes = Math.round(Number(text) * 60);
  if (minutes < -12 * 60 || minutes > 14 * 60) {
    return null;
  }

  return minutes;
}

export type TastingRef = { kind: "id"; id: number } | { kind: "seq"; seqNo: number };

/** `#12` addresses a sequence number, a bare number an internal id. */
export function parseTastingRef(input: string): TastingRef | null {
  const token = input.trim();
  if (token.startsWith("#")) {
    const seq = token.slice(1);
    return /^\d+$/.test(seq) ? { kind: "seq", seqNo: Number(seq) } : null;
  }

  return /^\d+$/.test(token) ? { kind: "id", id: Number(token) } : null;
}

function parseDecimal(input: string): number | null {
  const text = input.replace(",", ".").trim();
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(text)) {
    return null;
  }

  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}
