export const MESSAGE_LIMIT = 4096;
export const CAPTION_LIMIT = 1024;

export function nowIso(): string {
  return new Date().toISOString();
}

/** Local wall-clock `HH:MM` for a UTC offset in minutes; seconds are dropped. */
export function formatLocalTime(offsetMin: number, now: Date = new Date()): string {
  const local = new Date(now.getTime() + offsetMin * 60_000);
  const hours = local.getUTCHours().toString().padStart(2, "0");
  const minutes = local.getUTCMinutes().toString().padStart(2, "0");
  return `${hours}:${minutes}`;
}

export function formatUtcOffset(offsetMin: number): string {
  const hours = offsetMin / 60;
  const sign = hours >= 0 ? "+" : "";
  return `UTC${sign}${Number(hours.toFixed(2))}`;
}

export function splitTelegramMessage(text: string, max = MESSAGE_LIMIT): string[] {
  if (text.length <= max) return [text];

  const parts: string[] = [];
  let remaining = text;

  while (remaining.length > max) {
    const slice = remaining.slice(0, max);
    const lastBreak = Math.max(slice.lastIndexOf("\n\n"), slice.lastIndexOf("\n"));
    const splitAt = lastBreak > max / 8 ? lastBreak : max;

    parts.push(remaining.slice(0, splitAt).trim());
    remaining = remaining.slice(splitAt).trim();
  }

  if (remaining.length > 0) {
    parts.push(remaining);
  }

  return parts;
}

export function normalizeCsvText(raw: string): string {
  return raw
    .split(",")
    .map((piece) => piece.trim())
    .filter(Boolean)
    .join(", ");
}
