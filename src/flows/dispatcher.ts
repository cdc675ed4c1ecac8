import { formatUtcOffset } from "../lib/format.js";
import { parseUtcOffset } from "../lib/parsers.js";
import {
  MENU_FIND,
  MENU_HELP,
  MENU_LAST,
  MENU_NEW,
  MENU_RESET,
  homeKeyboard,
  mainMenuKeyboard,
  replyMenuKeyboard,
  searchMenuKeyboard
} from "../ui/keyboards.js";
import { openCard, showPhotos } from "./cards.js";
import type { FlowContext, FlowDeps } from "./context.js";
import {
  handleDeleteAsk,
  handleDeleteCancel,
  handleDeleteCommand,
  handleDeleteConfirm,
  handleEditCategory,
  handleEditCommand,
  handleEditField,
  handleEditRating,
  handleEditStart,
  handleEditText,
  notifyEditContextLost
} from "./edit.js";
import { HELP_TEXT, showMainMenu } from "./menu.js";
import {
  handleCategoryPick,
  handleMore,
  handleRatingPick,
  handleSearchMenu,
  handleSearchText,
  showLast,
  showSearchMenu
} from "./search.js";
import { handleWizardCallback, handleWizardPhoto, handleWizardText, isWizardCallback, startWizard } from "./wizard.js";

export const BOT_COMMANDS = [
  { command: "start", description: "Меню" },
  { command: "new", description: "Новая дегустация" },
  { command: "find", description: "Поиск" },
  { command: "last", description: "Последние 5" },
  { command: "tz", description: "Часовой пояс" },
  { command: "reset", description: "Сброс и меню" },
  { command: "help", description: "Помощь" },
  { command: "health", description: "Проверка БД" },
  { command: "dbinfo", description: "Информация о БД" }
] as const;

const ADMIN_COMMANDS = new Set(["whoami", "health", "dbinfo", "stats"]);
const UNEXPECTED_ERROR = "Что-то пошло не так. Начни заново через меню.";

type Handler = () => Promise<void>;

export async function handleCommand(deps: FlowDeps, ctx: FlowContext, command: string, arg: string): Promise<void> {
  await guard(deps, ctx, { command }, async () => {
    if (ADMIN_COMMANDS.has(command)) {
      await handleAdminCommand(deps, ctx, command);
      return;
    }

    switch (command) {
      case "start":
        deps.events.log(ctx.userId, ctx.chatId, "start");
        await showMainMenu(ctx);
        return;
      case "new":
        await startWizard(deps, ctx);
        return;
      case "find":
        await showSearchMenu(deps, ctx);
        return;
      case "last":
        await showLast(deps, ctx);
        return;
      case "tz":
        await handleTimezone(deps, ctx, arg);
        return;
      case "edit":
        await handleEditCommand(deps, ctx, arg);
        return;
      case "delete":
        await handleDeleteCommand(deps, ctx, arg);
        return;
      case "help":
        await ctx.io.send(HELP_TEXT);
        return;
      case "cancel":
      case "reset":
        await resetSession(deps, ctx);
        return;
      case "menu":
        await ctx.io.send("Включил кнопки под полем ввода.", replyMenuKeyboard());
        return;
      case "hide":
        await ctx.io.send("Скрываю кнопки.", { remove_keyboard: true });
        return;
      default:
        deps.logger.debug({ command }, "Unknown command");
    }
  });
}

export async function handleText(deps: FlowDeps, ctx: FlowContext, raw: string): Promise<void> {
  await guard(deps, ctx, { update: "text" }, async () => {
    const text = raw.trim();
    const menuAction = replyButtonAction(deps, ctx, text);
    if (menuAction) {
      await menuAction();
      return;
    }

    const session = deps.sessions.load(ctx.userId);
    switch (session?.kind) {
      case "wizard":
        await handleWizardText(deps, ctx, session.wizard, text);
        return;
      case "search":
        await handleSearchText(deps, ctx, session, text);
        return;
      case "edit":
      case "edit_lost":
        await handleEditText(deps, ctx, session, text);
        return;
      case undefined:
        await showMainMenu(ctx);
    }
  });
}

export async function handlePhoto(
  deps: FlowDeps,
  ctx: FlowContext,
  fileId: string,
  mediaGroupId?: string
): Promise<void> {
  await guard(deps, ctx, { update: "photo" }, async () => {
    const session = deps.sessions.load(ctx.userId);
    if (session?.kind !== "wizard") {
      deps.logger.debug({ userId: ctx.userId }, "Photo outside the wizard ignored");
      return;
    }

    await handleWizardPhoto(deps, ctx, session.wizard, fileId, mediaGroupId);
  });
}

export async function handleCallback(deps: FlowDeps, ctx: FlowContext, data: string): Promise<void> {
  await guard(deps, ctx, { callback: data }, async () => {
    const separator = data.indexOf(":");
    const head = separator === -1 ? data : data.slice(0, separator);
    const tail = separator === -1 ? "" : data.slice(separator + 1);
    const id = /^\d+$/.test(tail) ? Number(tail) : null;

    switch (head) {
      case "new":
        await ctx.io.acknowledge();
        await startWizard(deps, ctx);
        return;
      case "find":
        await showSearchMenu(deps, ctx);
        return;
      case "help":
        await ctx.io.send(HELP_TEXT, searchMenuKeyboard());
        return;
      case "back":
        await showMainMenu(ctx);
        return;
      case "nav":
        deps.sessions.clear(ctx.userId);
        await showMainMenu(ctx);
        return;
      case "s_name":
      case "s_cat":
      case "s_year":
      case "s_rating":
      case "s_last":
        await handleSearchMenu(deps, ctx, head);
        return;
      case "scat":
        await handleCategoryPick(deps, ctx, tail);
        return;
      case "frate":
        await handleRatingPick(deps, ctx, tail);
        return;
      case "more":
        await handleMore(deps, ctx, data);
        return;
      case "efld":
        await handleEditField(deps, ctx, deps.sessions.load(ctx.userId), tail);
        return;
      case "ecat":
        await handleEditCategory(deps, ctx, deps.sessions.load(ctx.userId), tail);
        return;
      case "erat":
        await handleEditRating(deps, ctx, deps.sessions.load(ctx.userId), tail);
        return;
      case "delno":
        await handleDeleteCancel(ctx);
        return;
    }

    if (id !== null) {
      switch (head) {
        case "open":
          await openCard(deps, ctx, id);
          return;
        case "pics":
          await showPhotos(deps, ctx, id);
          return;
        case "edit":
          await handleEditStart(deps, ctx, id);
          return;
        case "del":
          await handleDeleteAsk(deps, ctx, id);
          return;
        case "delok":
          await handleDeleteConfirm(deps, ctx, id);
          return;
      }
    }

    if (isWizardCallback(data)) {
      const session = deps.sessions.load(ctx.userId);
      await handleWizardCallback(deps, ctx, session?.kind === "wizard" ? session.wizard : null, data);
      return;
    }

    deps.logger.debug({ data }, "Unhandled callback");
    await ctx.io.acknowledge();
  });
}

export async function handleTimezone(deps: FlowDeps, ctx: FlowContext, arg: string): Promise<void> {
  if (!arg.trim()) {
    const user = deps.db.ensureUser(ctx.userId);
    await ctx.io.send(
      `Твой локальный сдвиг (UTC): ${formatUtcOffset(user.tzOffsetMin)}\n\nЧтобы поменять:\n/tz +3\n/tz -5.5`
    );
    return;
  }

  const offset = parseUtcOffset(arg);
  if (offset === null) {
    await ctx.io.send("Не понял формат. Пример: /tz +3 или /tz -5.5");
    return;
  }

  deps.db.setUserTimezone(ctx.userId, offset);
  await ctx.io.send(`Запомнил ${formatUtcOffset(offset)}. Теперь буду подставлять твоё локальное время.`);
}

async function handleAdminCommand(deps: FlowDeps, ctx: FlowContext, command: string): Promise<void> {
  if (!deps.adminIds.has(ctx.userId)) {
    deps.logger.debug({ userId: ctx.userId, command }, "Admin command from non-admin ignored");
    return;
  }

  switch (command) {
    case "whoami":
      await ctx.io.send(`you_id=${ctx.userId}\nis_admin=${deps.adminIds.has(ctx.userId)}`);
      return;
    case "health":
      await ctx.io.send(databaseHealth(deps));
      return;
    case "dbinfo":
      await ctx.io.send(
        `DB: sqlite | file=${deps.db.location}\nAPP_ENV=${deps.runtime.appEnv} | TZ=${deps.runtime.timeZone}`
      );
      return;
    case "stats": {
      const stats = deps.events.today(deps.now());
      await ctx.io.send(
        `Сегодня:\n• DAU: ${stats.activeUsers}\n• Начали дегустаций: ${stats.started}\n• Сохранили: ${stats.saved}`
      );
      return;
    }
  }
}

function databaseHealth(deps: FlowDeps): string {
  try {
    return deps.db.ping() ? "DB: OK" : "DB: FAIL — ping returned no row";
  } catch (error) {
    deps.logger.error({ err: error }, "Database ping failed");
    const reason = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    return `DB: FAIL — ${reason}`;
  }
}

function replyButtonAction(deps: FlowDeps, ctx: FlowContext, text: string): Handler | null {
  switch (text) {
    case MENU_NEW:
      return () => startWizard(deps, ctx);
    case MENU_FIND:
      return () => showSearchMenu(deps, ctx);
    case MENU_LAST:
      return () => showLast(deps, ctx);
    case MENU_HELP:
      return () => ctx.io.send(HELP_TEXT);
    case MENU_RESET:
      return () => resetSession(deps, ctx);
    default:
      return null;
  }
}

async function resetSession(deps: FlowDeps, ctx: FlowContext): Promise<void> {
  await deps.albums.drain(ctx.userId, false);
  deps.sessions.clear(ctx.userId);
  await ctx.io.send("Ок, сбросил. Возвращаю в меню.", mainMenuKeyboard());
}

/** Logs a failed step and leaves the user a way back to the menu. */
async function guard(deps: FlowDeps, ctx: FlowContext, bindings: Record<string, string>, run: Handler): Promise<void> {
  try {
    await run();
  } catch (error) {
    deps.logger.error({ err: error, userId: ctx.userId, ...bindings }, "Flow step failed");

    const session = deps.sessions.load(ctx.userId);
    if (session?.kind === "edit") {
      await notifyEditContextLost(deps, ctx);
    } else {
      await ctx.io.send(UNEXPECTED_ERROR, homeKeyboard());
    }
    await ctx.io.acknowledge();
  }
}
