import { mainMenuKeyboard } from "../ui/keyboards.js";
import type { FlowContext } from "./context.js";

export const MAIN_MENU_TEXT = "Привет! Что делаем — создать новую запись или найти уже созданную?";

export const HELP_TEXT = [
  "/start — меню",
  "/new — новая дегустация",
  "/find — поиск (по названию, категории, году, рейтингу, последние 5)",
  "/last — последние 5",
  "/tz — часовой пояс",
  "/menu — включить кнопки под вводом (сквозное меню)",
  "/hide — скрыть кнопки",
  "/reset — сброс и возврат в меню",
  "/cancel — сброс текущего действия",
  "/edit <id или #N> — редактировать запись",
  "/delete <id или #N> — удалить запись"
].join("\n");

export async function showMainMenu(ctx: FlowContext): Promise<void> {
  await ctx.io.send(MAIN_MENU_TEXT, mainMenuKeyboard());
}
