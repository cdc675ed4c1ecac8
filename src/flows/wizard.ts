import { formatLocalTime } from "../lib/format.js";
import {
  parseGramsLenient,
  parseRatingLenient,
  parseTemperatureLenient,
  parseTimeLenient,
  parseYearLenient
} from "../lib/parsers.js";
import { MAX_PHOTOS, TastingCreateError, createTasting } from "../services/tastings.js";
import type { Tasting, TastingInput } from "../types.js";
import { OTHER_CATEGORY, isKnownCategory, joinSelection, toggleItem, validateCustomCategory } from "../vocabulary.js";
import { sendTastingCard } from "./cards.js";
import { STALE_STEP } from "./context.js";
import type { FlowContext, FlowDeps } from "./context.js";
import {
  appendInfusion,
  finishInfusions,
  infusionText,
  pickBody,
  skipColor,
  skipSpecial,
  startInfusion
} from "./infusion.js";
import type { Transition } from "./infusion.js";
import { emptyPicker } from "./session.js";
import type { SummaryDraft, WizardState } from "./session.js";
import { PICKERS, isPickerStep, pickerKeyboard, pickerStepByPrefix, photosProgress, wizardScreen } from "./wizardScreens.js";
import type { PickerStep } from "./wizardScreens.js";

const WIZARD_CALLBACK = /^(cat|skip|time|ad|aw|taste|aft|eff|scn|body|rate|photos):|^(more_inf|finish_inf)$/;

const PICK_FROM_LIST = "Выбери вариант из списка или нажми «Другое», чтобы ввести свой вариант.";
const CUSTOM_ADDED = "Добавил. Можешь выбрать ещё и нажать «Готово».";
const PHOTO_LIMIT_NOTICE = `Можно добавить максимум ${MAX_PHOTOS} фото, лишние я не сохранил.`;

export function isWizardCallback(data: string): boolean {
  return WIZARD_CALLBACK.test(data);
}

export async function startWizard(deps: FlowDeps, ctx: FlowContext): Promise<void> {
  await deps.albums.drain(ctx.userId, false);
  deps.db.ensureUser(ctx.userId);
  await show(deps, ctx, { step: "name" });
  deps.events.log(ctx.userId, ctx.chatId, "new_tasting_started");
}

export async function handleWizardText(
  deps: FlowDeps,
  ctx: FlowContext,
  state: WizardState,
  text: string
): Promise<void> {
  const transition = wizardText(state, text);
  if ("hint" in transition) {
    await ctx.io.send(transition.hint);
    return;
  }

  await show(deps, ctx, transition.next, transition.text);
}

export async function handleWizardCallback(
  deps: FlowDeps,
  ctx: FlowContext,
  state: WizardState | null,
  data: string
): Promise<void> {
  if (!state) {
    await ctx.io.acknowledge(STALE_STEP, true);
    return;
  }

  const separator = data.indexOf(":");
  const head = separator === -1 ? data : data.slice(0, separator);
  const tail = separator === -1 ? "" : data.slice(separator + 1);

  if (head === "photos" && tail === "done") {
    await commitWizard(deps, ctx, true);
    return;
  }
  if (data === "skip:photos") {
    await commitWizard(deps, ctx, false);
    return;
  }

  const pickerStep = pickerStepByPrefix(head);
  if (pickerStep) {
    if (!isPickerStep(state) || state.step !== pickerStep) {
      await ctx.io.acknowledge(STALE_STEP, true);
      return;
    }
    await handlePickerPress(deps, ctx, state, tail);
    return;
  }

  const transition = wizardCallback(state, head, tail, localTime(deps, ctx.userId));
  if (!transition) {
    await ctx.io.acknowledge(STALE_STEP, true);
    return;
  }
  if ("hint" in transition) {
    await ctx.io.acknowledge(transition.hint);
    return;
  }

  await show(deps, ctx, transition.next, transition.text);
}

export async function handleWizardPhoto(
  deps: FlowDeps,
  ctx: FlowContext,
  state: WizardState,
  fileId: string,
  mediaGroupId?: string
): Promise<void> {
  if (state.step !== "photos") {
    await ctx.io.send("Фото добавляются в конце, после заметки. Ответь на текущий вопрос.");
    return;
  }

  if (state.photos.length >= MAX_PHOTOS) {
    await ctx.io.send(`Можно добавить максимум ${MAX_PHOTOS} фото. Нажми «Готово» или «Пропустить».`);
    return;
  }

  if (mediaGroupId) {
    deps.albums.add(ctx.userId, mediaGroupId, fileId, (fileIds) => acceptAlbum(deps, ctx, fileIds));
    return;
  }

  const photos = [...state.photos, fileId];
  deps.sessions.save(ctx.userId, { kind: "wizard", wizard: { ...state, photos } });
  await ctx.io.send(photosProgress(photos.length));
}

/** Next state for typed input; lenient fields store null instead of re-asking. */
export function wizardText(state: WizardState, raw: string): Transition {
  const text = raw.trim();

  switch (state.step) {
    case "name":
      return text ? { next: { step: "year", draft: { name: text } } } : { hint: "🍵 Название чая?" };
    case "year":
      return { next: { step: "region", draft: { ...state.draft, year: parseYearLenient(text) } } };
    case "region":
      return {
        next: { step: "category", draft: { ...state.draft, region: text || null }, awaitingCustom: false }
      };
    case "category": {
      if (!state.awaitingCustom) {
        return { hint: "Выбери категорию кнопкой или нажми «Другое»." };
      }
      const category = validateCustomCategory(text);
      if (!category.ok) {
        return { hint: category.error };
      }
      return { next: { step: "grams", draft: { ...state.draft, category: category.value } } };
    }
    case "grams":
      return { next: { step: "temp", draft: { ...state.draft, grams: parseGramsLenient(text) } } };
    case "temp":
      return { next: { step: "tasted_at", draft: { ...state.draft, tempC: parseTemperatureLenient(text) } } };
    case "tasted_at":
      return { next: { step: "gear", draft: { ...state.draft, tastedAt: parseTimeLenient(text) } } };
    case "gear":
      return { next: { step: "aroma_dry", draft: { ...state.draft, gear: text || null }, picker: emptyPicker() } };
    case "aroma_dry":
    case "aroma_warmed":
    case "inf_taste":
    case "inf_aftertaste":
    case "effects":
    case "scenarios":
      return pickerText(state, text);
    case "inf_seconds":
    case "inf_color":
    case "inf_special":
    case "inf_body":
    case "inf_more":
      return infusionText(state, text);
    case "rating":
      return { next: { step: "summary", draft: { ...state.draft, rating: parseRatingLenient(text) } } };
    case "summary":
      return { next: { step: "photos", draft: { ...state.draft, summary: text || null }, photos: [] } };
    case "photos":
      return { hint: "Пришли фото (или жми «Готово» / «Пропустить»)." };
  }
}

/** Button presses other than pickers and photo commits; null when the press does not match the step. */
export function wizardCallback(state: WizardState, head: string, tail: string, now: string): Transition | null {
  if (head === "skip") {
    const next = skipStep(state, tail);
    return next ? { next } : null;
  }

  if (head === "cat" && state.step === "category") {
    if (tail === OTHER_CATEGORY) {
      return { next: { ...state, awaitingCustom: true } };
    }
    if (!isKnownCategory(tail)) {
      return { hint: "Неизвестная категория." };
    }
    return { next: { step: "grams", draft: { ...state.draft, category: tail } } };
  }

  if (head === "time" && tail === "now" && state.step === "tasted_at") {
    return { next: { step: "gear", draft: { ...state.draft, tastedAt: now } } };
  }

  if (head === "body" && state.step === "inf_body") {
    return pickBody(state, tail);
  }

  if (head === "more_inf" && state.step === "inf_more") {
    return { next: startInfusion(state.draft) };
  }

  if (head === "finish_inf" && state.step === "inf_more") {
    return { next: finishInfusions(state) };
  }

  if (head === "rate" && state.step === "rating") {
    if (!/^\d+$/.test(tail) || Number(tail) > 10) {
      return { hint: "Оценка от 0 до 10." };
    }
    return { next: { step: "summary", draft: { ...state.draft, rating: Number(tail) } } };
  }

  return null;
}

export function skipStep(state: WizardState, tag: string): WizardState | null {
  switch (`${state.step}|${tag}`) {
    case "year|year":
    case "region|region":
    case "grams|grams":
    case "temp|temp":
    case "tasted_at|tasted_at":
    case "gear|gear":
    case "inf_color|color":
    case "inf_special|special":
    case "summary|summary":
      return skipCurrent(state);
    default:
      return null;
  }
}

function skipCurrent(state: WizardState): WizardState | null {
  switch (state.step) {
    case "year":
      return { step: "region", draft: { ...state.draft, year: null } };
    case "region":
      return { step: "category", draft: { ...state.draft, region: null }, awaitingCustom: false };
    case "grams":
      return { step: "temp", draft: { ...state.draft, grams: null } };
    case "temp":
      return { step: "tasted_at", draft: { ...state.draft, tempC: null } };
    case "tasted_at":
      return { step: "gear", draft: { ...state.draft, tastedAt: null } };
    case "gear":
      return { step: "aroma_dry", draft: { ...state.draft, gear: null }, picker: emptyPicker() };
    case "inf_color":
      return skipColor(state);
    case "inf_special":
      return skipSpecial(state);
    case "summary":
      return { step: "photos", draft: { ...state.draft, summary: null }, photos: [] };
    default:
      return null;
  }
}

export function completePicker(state: PickerStep, selected: string[]): WizardState {
  const value = joinSelection(selected);

  switch (state.step) {
    case "aroma_dry":
      return { step: "aroma_warmed", draft: { ...state.draft, aromaDry: value }, picker: emptyPicker() };
    case "aroma_warmed":
      return startInfusion({ ...state.draft, aromaWarmed: value, infusions: [] });
    case "inf_taste":
      return {
        step: "inf_special",
        draft: state.draft,
        current: { ...state.current, taste: value }
      };
    case "inf_aftertaste":
      return appendInfusion(state, value);
    case "effects":
      return { step: "scenarios", draft: { ...state.draft, effects: selected }, picker: emptyPicker() };
    case "scenarios":
      return { step: "rating", draft: { ...state.draft, scenarios: selected } };
  }
}

function pickerText(state: PickerStep, text: string): Transition {
  const spec = PICKERS[state.step];
  // Taste also takes a typed description without pressing "Другое" first.
  if (!state.picker.awaitingCustom && state.step !== "inf_taste") {
    return { hint: PICK_FROM_LIST };
  }
  if (!text) {
    return { hint: spec.customPrompt };
  }

  const selected = state.picker.selected.includes(text) ? state.picker.selected : [...state.picker.selected, text];
  if (spec.customFinishes) {
    return { next: completePicker(state, selected) };
  }

  return { next: { ...state, picker: { selected, awaitingCustom: false } }, text: CUSTOM_ADDED };
}

async function handlePickerPress(deps: FlowDeps, ctx: FlowContext, state: PickerStep, tail: string): Promise<void> {
  if (tail === "done") {
    await show(deps, ctx, completePicker(state, state.picker.selected));
    return;
  }

  if (tail === "other") {
    await show(deps, ctx, { ...state, picker: { ...state.picker, awaitingCustom: true } });
    return;
  }

  const item = /^\d+$/.test(tail) ? PICKERS[state.step].source[Number(tail)] : undefined;
  if (item === undefined) {
    await ctx.io.acknowledge();
    return;
  }

  const next: PickerStep = { ...state, picker: { ...state.picker, selected: toggleItem(state.picker.selected, item) } };
  deps.sessions.save(ctx.userId, { kind: "wizard", wizard: next });
  await ctx.io.setMarkup(pickerKeyboard(next));
  await ctx.io.acknowledge();
}

async function show(deps: FlowDeps, ctx: FlowContext, next: WizardState, text?: string): Promise<void> {
  if (next.step === "photos") {
    await deps.albums.drain(ctx.userId, false);
  }

  deps.sessions.save(ctx.userId, { kind: "wizard", wizard: next });
  const screen = wizardScreen(next, localTime(deps, ctx.userId));
  await ctx.io.respond(text ?? screen.text, screen.markup);
}

function localTime(deps: FlowDeps, userId: number): string {
  const offset = deps.db.getUser(userId)?.tzOffsetMin ?? 0;
  return formatLocalTime(offset, deps.now());
}

async function acceptAlbum(deps: FlowDeps, ctx: FlowContext, fileIds: string[]): Promise<void> {
  const session = deps.sessions.load(ctx.userId);
  const state = session?.kind === "wizard" ? session.wizard : null;
  if (!state || state.step !== "photos") {
    deps.logger.debug({ userId: ctx.userId }, "Album arrived outside the photo step");
    return;
  }

  const capacity = Math.max(MAX_PHOTOS - state.photos.length, 0);
  const accepted = fileIds.slice(0, capacity);
  const photos = [...state.photos, ...accepted];

  if (accepted.length > 0) {
    deps.sessions.save(ctx.userId, { kind: "wizard", wizard: { ...state, photos } });
  }

  if (accepted.length === 0) {
    await ctx.io.send(PHOTO_LIMIT_NOTICE);
  } else if (accepted.length < fileIds.length) {
    await ctx.io.send(`Из-за лимита ${MAX_PHOTOS} фото сохранил только часть альбома.`);
  }
  await ctx.io.send(photosProgress(photos.length));
}

async function commitWizard(deps: FlowDeps, ctx: FlowContext, keepPhotos: boolean): Promise<void> {
  await deps.albums.drain(ctx.userId, keepPhotos);

  const session = deps.sessions.load(ctx.userId);
  const state = session?.kind === "wizard" ? session.wizard : null;
  if (!state || state.step !== "photos") {
    await ctx.io.acknowledge(STALE_STEP, true);
    return;
  }

  const photos = keepPhotos ? state.photos.slice(0, MAX_PHOTOS) : [];
  let tasting: Tasting;
  try {
    tasting = createTasting(deps.db, toTastingInput(ctx.userId, state.draft), state.draft.infusions, photos, deps.logger);
  } catch (error) {
    if (!(error instanceof TastingCreateError)) {
      throw error;
    }
    deps.logger.error({ err: error, userId: ctx.userId }, "Tasting was not saved");
    await ctx.io.acknowledge();
    await ctx.io.send("Не удалось сохранить запись. Нажми «Готово» ещё раз.");
    return;
  }

  deps.sessions.clear(ctx.userId);
  await ctx.io.acknowledge();
  await ctx.io.setMarkup(null);
  await sendTastingCard(deps, ctx, tasting, state.draft.infusions, photos);

  deps.events.log(ctx.userId, ctx.chatId, "tasting_saved", {
    tasting_id: tasting.id,
    seq_no: tasting.seqNo,
    infusions: state.draft.infusions.length,
    photos: photos.length
  });
}

export function toTastingInput(userId: number, draft: SummaryDraft): TastingInput {
  return {
    userId,
    name: draft.name,
    year: draft.year,
    region: draft.region,
    category: draft.category,
    grams: draft.grams,
    tempC: draft.tempC,
    tastedAt: draft.tastedAt,
    gear: draft.gear,
    aromaDry: draft.aromaDry,
    aromaWarmed: draft.aromaWarmed,
    effectsCsv: joinSelection(draft.effects),
    scenariosCsv: joinSelection(draft.scenarios),
    rating: draft.rating,
    summary: draft.summary
  };
}
