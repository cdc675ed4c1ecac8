import { GrammyError, InlineKeyboard, InputMediaBuilder, Keyboard } from "grammy";
import type { Context } from "grammy";
import type { ReplyKeyboardRemove } from "grammy/types";
import { CAPTION_LIMIT } from "./lib/format.js";
import type { Logger } from "./lib/logger.js";

export type ReplyMarkup = InlineKeyboard | Keyboard | ReplyKeyboardRemove;

/**
 * What a flow can do to the chat it is answering. Flows never touch the
 * grammY context directly, so the same handler serves a typed message and
 * a button press.
 */
export interface Responder {
  /** Shows a screen: a new message, or the pressed message edited in place. */
  respond(text: string, markup?: InlineKeyboard): Promise<void>;
  /** Always sends a new message. */
  send(text: string, markup?: ReplyMarkup): Promise<void>;
  /** Replaces the keyboard of the pressed message; no-op for typed input. */
  setMarkup(markup: InlineKeyboard | null): Promise<void>;
  /** Answers the pending button press, optionally with a toast or alert. */
  acknowledge(notice?: string, alert?: boolean): Promise<void>;
  sendAlbum(fileIds: string[], caption?: string): Promise<void>;
  sendPhoto(fileId: string, caption?: string): Promise<void>;
}

export class MessageResponder implements Responder {
  constructor(protected readonly ctx: Context) {}

  async respond(text: string, markup?: InlineKeyboard): Promise<void> {
    await this.send(text, markup);
  }

  async send(text: string, markup?: ReplyMarkup): Promise<void> {
    await this.ctx.reply(text, markup ? { reply_markup: markup } : undefined);
  }

  async setMarkup(_markup: InlineKeyboard | null): Promise<void> {}

  async acknowledge(_notice?: string, _alert?: boolean): Promise<void> {}

  async sendAlbum(fileIds: string[], caption?: string): Promise<void> {
    const media = fileIds.map((fileId, index) =>
      InputMediaBuilder.photo(fileId, index === 0 && caption ? { caption } : {})
    );
    await this.ctx.replyWithMediaGroup(media);
  }

  async sendPhoto(fileId: string, caption?: string): Promise<void> {
    await this.ctx.replyWithPhoto(fileId, caption ? { caption } : undefined);
  }
}

export class CallbackResponder extends MessageResponder {
  private acknowledged = false;

  constructor(
    ctx: Context,
    private readonly logger: Logger
  ) {
    super(ctx);
  }

  override async respond(text: string, markup?: InlineKeyboard): Promise<void> {
    const message = this.ctx.callbackQuery?.message;
    if (!message || message.date === 0) {
      await this.send(text, markup);
      return;
    }

    const hasCaption = "photo" in message && message.photo !== undefined;
    try {
      if (hasCaption) {
        if (text.length > CAPTION_LIMIT) {
          await this.send(text, markup);
          return;
        }
        await this.ctx.editMessageCaption({ caption: text, reply_markup: markup });
      } else {
        await this.ctx.editMessageText(text, { reply_markup: markup });
      }
    } catch (error) {
      if (!(error instanceof GrammyError)) {
        throw error;
      }
      if (error.description.includes("message is not modified")) {
        return;
      }

      this.logger.warn({ err: error }, "Edit in place failed, sending a new message");
      await this.send(text, markup);
    }
  }

  override async setMarkup(markup: InlineKeyboard | null): Promise<void> {
    try {
      await this.ctx.editMessageReplyMarkup({ reply_markup: markup ?? new InlineKeyboard() });
    } catch (error) {
      if (!(error instanceof GrammyError)) {
        throw error;
      }
      this.logger.debug({ err: error }, "Keyboard update skipped");
    }
  }

  override async acknowledge(notice?: string, alert = false): Promise<void> {
    if (this.acknowledged) {
      return;
    }

    this.acknowledged = true;
    await this.ctx.answerCallbackQuery(notice ? { text: notice, show_alert: alert } : undefined);
  }

  /** Answers the press if no handler did; Telegram keeps a spinner otherwise. */
  async settle(): Promise<void> {
    if (!this.acknowledged) {
      await this.acknowledge();
    }
  }
}
