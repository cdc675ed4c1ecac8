import { parseTastingRef } from "../lib/parsers.js";
import type { EditableColumn, Tasting } from "../types.js";
import {
  confirmDeleteKeyboard,
  editCategoryKeyboard,
  editFieldsKeyboard,
  homeKeyboard,
  ratingKeyboard
} from "../ui/keyboards.js";
import { CATEGORIES, OTHER_CATEGORY, validateCustomCategory } from "../vocabulary.js";
import type { AppDatabase } from "../db.js";
import { STALE_STEP } from "./context.js";
import type { FlowContext, FlowDeps } from "./context.js";
import { FIELD_LABELS, TEXT_FIELDS, isTextFieldKey, prepareTextEdit } from "./editFields.js";
import type { FieldKey } from "./editFields.js";
import { showMainMenu } from "./menu.js";
import type { Session, SessionOf } from "./session.js";

export const EDIT_CONTEXT_LOST = "Контекст редактирования потерян.";
const NO_ACCESS = "Нет доступа к этой записи.";
const NOT_FOUND = "Запись не найдена.";

export function editMenuText(seqNo: number): string {
  return `Редактирование #${seqNo}. Выбери поле.`;
}

/**
 * `12` is an internal id, `#12` a sequence number; both scoped to the owner.
 * Only the first word of the argument is read.
 */
export function resolveTasting(db: AppDatabase, userId: number, ref: string): Tasting | null {
  const [first = ""] = ref.trim().split(/\s+/);
  const parsed = parseTastingRef(first);
  if (!parsed) {
    return null;
  }

  return parsed.kind === "id" ? db.getTastingForOwner(parsed.id, userId) : db.getTastingBySeq(userId, parsed.seqNo);
}

/**
 * Returns the edit session when its record still belongs to the user.
 * An old edit button pressed during another flow only gets a stale notice.
 * Otherwise shows the lost-context notice once; later events stay silent
 * until a new session replaces `edit_lost`.
 */
export async function ensureEditContext(
  deps: FlowDeps,
  ctx: FlowContext,
  session: Session | null
): Promise<SessionOf<"edit"> | null> {
  if (session?.kind === "edit_lost") {
    return null;
  }

  if (session?.kind === "wizard" || session?.kind === "search") {
    await ctx.io.acknowledge(STALE_STEP, true);
    return null;
  }

  if (session?.kind === "edit" && deps.db.getTastingForOwner(session.tastingId, ctx.userId)) {
    return session;
  }

  deps.logger.warn(
    { userId: ctx.userId, tastingId: session?.kind === "edit" ? session.tastingId : null },
    "Edit context invalid"
  );
  await notifyEditContextLost(deps, ctx);
  return null;
}

export async function notifyEditContextLost(deps: FlowDeps, ctx: FlowContext): Promise<void> {
  deps.sessions.save(ctx.userId, { kind: "edit_lost" });
  await ctx.io.send(EDIT_CONTEXT_LOST, homeKeyboard());
}

/** `edit:<id>` from a card. */
export async function handleEditStart(deps: FlowDeps, ctx: FlowContext, tastingId: number): Promise<void> {
  const tasting = deps.db.getTastingForOwner(tastingId, ctx.userId);
  if (!tasting) {
    await ctx.io.send(NO_ACCESS);
    return;
  }

  await beginEdit(deps, ctx, tasting);
}

export async function handleEditCommand(deps: FlowDeps, ctx: FlowContext, arg: string): Promise<void> {
  if (!arg.trim()) {
    await ctx.io.send("Использование: /edit <id или #номер>");
    return;
  }

  const tasting = resolveTasting(deps.db, ctx.userId, arg);
  if (!tasting) {
    await ctx.io.send(NOT_FOUND);
    return;
  }

  await beginEdit(deps, ctx, tasting);
}

/** `efld:<field>` or `efld:cancel`. */
export async function handleEditField(
  deps: FlowDeps,
  ctx: FlowContext,
  session: Session | null,
  field: string
): Promise<void> {
  const edit = await ensureEditContext(deps, ctx, session);
  if (!edit) {
    return;
  }

  if (field === "cancel") {
    deps.sessions.clear(ctx.userId);
    await ctx.io.send("Редактирование отменено.");
    await showMainMenu(ctx);
    return;
  }

  if (field === "category") {
    deps.sessions.save(ctx.userId, { ...edit, mode: { type: "category" } });
    await ctx.io.send("Выбери категорию:", editCategoryKeyboard());
    return;
  }

  if (field === "rating") {
    deps.sessions.save(ctx.userId, { ...edit, mode: { type: "rating" } });
    await ctx.io.send("Выбери оценку:", ratingKeyboard("erat"));
    return;
  }

  if (!isTextFieldKey(field)) {
    return;
  }

  deps.sessions.save(ctx.userId, { ...edit, mode: { type: "text", field } });
  await ctx.io.send(TEXT_FIELDS[field].prompt);
}

/** `ecat:<category>`, `ecat:__other__`, `ecat:__back__`. */
export async function handleEditCategory(
  deps: FlowDeps,
  ctx: FlowContext,
  session: Session | null,
  value: string
): Promise<void> {
  const edit = await ensureEditContext(deps, ctx, session);
  if (!edit) {
    return;
  }

  if (value === "__back__") {
    await showFieldMenu(deps, ctx, edit);
    return;
  }

  if (value === "__other__") {
    deps.sessions.save(ctx.userId, { ...edit, mode: { type: "category_text" } });
    await ctx.io.send("Пришли категорию текстом.");
    return;
  }

  if (value === OTHER_CATEGORY || !CATEGORIES.some((category) => category === value)) {
    return;
  }

  await applyEdit(deps, ctx, edit, "category", "category", value);
}

/** `erat:<0..10>` */
export async function handleEditRating(
  deps: FlowDeps,
  ctx: FlowContext,
  session: Session | null,
  raw: string
): Promise<void> {
  if (!/^\d+$/.test(raw) || Number(raw) > 10) {
    return;
  }

  const edit = await ensureEditContext(deps, ctx, session);
  if (!edit) {
    return;
  }

  await applyEdit(deps, ctx, edit, "rating", "rating", Number(raw));
}

export async function handleEditText(
  deps: FlowDeps,
  ctx: FlowContext,
  session: SessionOf<"edit"> | SessionOf<"edit_lost">,
  text: string
): Promise<void> {
  const edit = await ensureEditContext(deps, ctx, session);
  if (!edit) {
    return;
  }

  switch (edit.mode.type) {
    case "choosing":
      await ctx.io.send("Выбери поле кнопкой.", editFieldsKeyboard());
      return;
    case "category":
      await ctx.io.send("Выбери категорию кнопкой или нажми «Другое (ввести)».", editCategoryKeyboard());
      return;
    case "rating":
      await ctx.io.send("Выбери оценку кнопкой.", ratingKeyboard("erat"));
      return;
    case "category_text": {
      const category = validateCustomCategory(text);
      if (!category.ok) {
        await ctx.io.send(category.error);
        return;
      }
      await applyEdit(deps, ctx, edit, "category", "category", category.value);
      return;
    }
    case "text": {
      const prepared = prepareTextEdit(edit.mode.field, text);
      if (!prepared.ok) {
        await ctx.io.send(prepared.message);
        return;
      }
      await applyEdit(deps, ctx, edit, edit.mode.field, prepared.column, prepared.value);
      return;
    }
  }
}

/** `del:<id>` from a card. */
export async function handleDeleteAsk(deps: FlowDeps, ctx: FlowContext, tastingId: number): Promise<void> {
  const tasting = deps.db.getTastingForOwner(tastingId, ctx.userId);
  if (!tasting) {
    await ctx.io.send(NO_ACCESS);
    return;
  }

  await askDelete(ctx, tasting);
}

export async function handleDeleteCommand(deps: FlowDeps, ctx: FlowContext, arg: string): Promise<void> {
  if (!arg.trim()) {
    await ctx.io.send("Использование: /delete <id или #номер>");
    return;
  }

  const tasting = resolveTasting(deps.db, ctx.userId, arg);
  if (!tasting) {
    await ctx.io.send(NOT_FOUND);
    return;
  }

  await askDelete(ctx, tasting);
}

/** `delok:<id>` */
export async function handleDeleteConfirm(deps: FlowDeps, ctx: FlowContext, tastingId: number): Promise<void> {
  const tasting = deps.db.getTastingForOwner(tastingId, ctx.userId);
  if (!tasting || !deps.db.deleteTasting(tasting.id, ctx.userId)) {
    await ctx.io.send(NO_ACCESS);
    return;
  }

  await ctx.io.setMarkup(null);
  await ctx.io.send(`Удалил #${tasting.seqNo}.`);
  deps.events.log(ctx.userId, ctx.chatId, "tasting_deleted", { tasting_id: tasting.id, seq_no: tasting.seqNo });
}

/** `delno:<id>` */
export async function handleDeleteCancel(ctx: FlowContext): Promise<void> {
  await ctx.io.setMarkup(null);
  await ctx.io.send("Ок, не удаляю.");
}

async function beginEdit(deps: FlowDeps, ctx: FlowContext, tasting: Tasting): Promise<void> {
  await deps.albums.drain(ctx.userId, false);
  await showFieldMenu(deps, ctx, {
    kind: "edit",
    tastingId: tasting.id,
    seqNo: tasting.seqNo,
    mode: { type: "choosing" }
  });
}

async function showFieldMenu(deps: FlowDeps, ctx: FlowContext, edit: SessionOf<"edit">): Promise<void> {
  deps.sessions.save(ctx.userId, { ...edit, mode: { type: "choosing" } });
  await ctx.io.send(editMenuText(edit.seqNo), editFieldsKeyboard());
}

async function applyEdit(
  deps: FlowDeps,
  ctx: FlowContext,
  edit: SessionOf<"edit">,
  field: FieldKey,
  column: EditableColumn,
  value: string | number | null
): Promise<void> {
  const updated = deps.db.updateTastingField(edit.tastingId, ctx.userId, column, value);
  if (!updated) {
    deps.logger.warn({ userId: ctx.userId, tastingId: edit.tastingId, field }, "Edit update touched no rows");
    await notifyEditContextLost(deps, ctx);
    return;
  }

  await ctx.io.send(`Обновил ${FIELD_LABELS[field]}.`);
  await showFieldMenu(deps, ctx, edit);
  deps.events.log(ctx.userId, ctx.chatId, "tasting_edited", { tasting_id: edit.tastingId, field });
}

async function askDelete(ctx: FlowContext, tasting: Tasting): Promise<void> {
  await ctx.io.send(`Удалить #${tasting.seqNo}?`, confirmDeleteKeyboard(tasting.id));
}
