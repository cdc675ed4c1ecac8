import type { Infusion, InfusionInput, Tasting } from "../types.js";

type CardInfusion = Pick<Infusion, keyof InfusionInput>;

export function tastingTitle(tasting: Pick<Tasting, "name" | "category" | "year" | "region">): string {
  const parts = [tasting.name, tasting.category, tasting.year === null ? null : String(tasting.year), tasting.region];
  return parts.filter((part): part is string => Boolean(part)).join(" · ");
}

/** One line of a search result list. */
export function shortRow(tasting: Tasting): string {
  return `#${tasting.seqNo} [${tasting.category ?? "—"}] ${tasting.name}`;
}

export function buildCardText(tasting: Tasting, infusions: readonly CardInfusion[], photoCount = 0): string {
  const lines = [`#${tasting.seqNo} ${tastingTitle(tasting)}`, `⭐ Оценка: ${tasting.rating}`];

  if (tasting.grams !== null) lines.push(`⚖️ Граммовка: ${tasting.grams} г`);
  if (tasting.tempC !== null) lines.push(`🌡️ Температура: ${tasting.tempC} °C`);
  if (tasting.tastedAt) lines.push(`⏰ Время дегустации: ${tasting.tastedAt}`);
  if (tasting.gear) lines.push(`🍶 Посуда: ${tasting.gear}`);

  if (tasting.aromaDry || tasting.aromaWarmed) {
    lines.push("🌬️ Ароматы:");
    if (tasting.aromaDry) lines.push(`  ▫️ сухой лист: ${tasting.aromaDry}`);
    if (tasting.aromaWarmed) lines.push(`  ▫️ прогретый/промытый лист: ${tasting.aromaWarmed}`);
  }

  if (tasting.effectsCsv) lines.push(`🧘 Ощущения: ${tasting.effectsCsv}`);
  if (tasting.scenariosCsv) lines.push(`🎯 Сценарии: ${tasting.scenariosCsv}`);
  if (tasting.summary) lines.push(`📝 Заметка: ${tasting.summary}`);
  if (photoCount > 0) lines.push(`📷 Фото: ${photoCount} шт.`);

  if (infusions.length > 0) {
    lines.push("🫖 Проливы:");
    for (const infusion of infusions) {
      lines.push(
        [
          `  #${infusion.n}: ${infusion.seconds ?? "-"} сек`,
          `цвет: ${infusion.liquorColor || "-"}`,
          `вкус: ${infusion.taste || "-"}`,
          `ноты: ${infusion.specialNotes || "-"}`,
          `тело: ${infusion.body || "-"}`,
          `послевкусие: ${infusion.aftertaste || "-"}`
        ].join("; ")
      );
    }
  }

  return lines.join("\n");
}
