import { Bot } from "grammy";
import type { Context } from "grammy";
import type { AppConfig } from "./config.js";
import type { FlowContext, FlowDeps } from "./flows/context.js";
import { BOT_COMMANDS, handleCallback, handleCommand, handlePhoto, handleText } from "./flows/dispatcher.js";
import { CallbackResponder, MessageResponder } from "./transport.js";

type BotDeps = {
  config: Pick<AppConfig, "telegramToken">;
  flows: FlowDeps;
};

const COMMAND_PATTERN = /^\/([A-Za-z_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/;

export function createTelegramBot(deps: BotDeps): Bot<Context> {
  const bot = new Bot<Context>(deps.config.telegramToken);
  const { flows } = deps;
  const logger = flows.logger.child({ module: "bot" });

  bot.use(async (ctx, next) => {
    if (ctx.from) {
      flows.db.ensureUser(ctx.from.id);
    }

    await next();
  });

  bot.on("message:text", async (ctx) => {
    const context = messageContext(ctx);
    if (!context) {
      return;
    }

    const command = ctx.message.text.match(COMMAND_PATTERN);

    if (command) {
      const [, name = "", arg = ""] = command;
      await handleCommand(flows, context, name.toLowerCase(), arg.trim());
      return;
    }

    await handleText(flows, context, ctx.message.text);
  });

  bot.on("message:photo", async (ctx) => {
    const context = messageContext(ctx);
    const largest = ctx.message.photo[ctx.message.photo.length - 1];
    if (!context || !largest) {
      return;
    }

    await handlePhoto(flows, context, largest.file_id, ctx.message.media_group_id);
  });

  bot.on("callback_query:data", async (ctx) => {
    const io = new CallbackResponder(ctx, logger);
    const context: FlowContext = {
      userId: ctx.from.id,
      chatId: ctx.chat?.id ?? ctx.from.id,
      io
    };

    try {
      await handleCallback(flows, context, ctx.callbackQuery.data);
    } finally {
      await io.settle();
    }
  });

  bot.catch((error) => {
    logger.error({ err: error.error, updateId: error.ctx.update.update_id }, "Unhandled bot error");
  });

  return bot;
}

export async function registerCommands(bot: Bot<Context>): Promise<void> {
  await bot.api.setMyCommands(BOT_COMMANDS.map((item) => ({ ...item })));
}

function messageContext(ctx: Context): FlowContext | null {
  if (!ctx.from || !ctx.chat) {
    return null;
  }

  return {
    userId: ctx.from.id,
    chatId: ctx.chat.id,
    io: new MessageResponder(ctx)
  };
}
