import type { InlineKeyboard } from "grammy";
import { CAPTION_LIMIT, splitTelegramMessage } from "../lib/format.js";
import { MAX_PHOTOS } from "../services/tastings.js";
import type { Infusion, InfusionInput, Tasting } from "../types.js";
import { buildCardText } from "../ui/card.js";
import { cardActionsKeyboard } from "../ui/keyboards.js";
import type { FlowContext, FlowDeps } from "./context.js";

/**
 * Sends a card with up to three photos. The card rides as the album caption
 * when it fits; otherwise it follows the photos as text chunks. The action
 * keyboard goes on the first text message, or on a trailing "Действия:".
 */
export async function sendCardWithMedia(
  deps: FlowDeps,
  ctx: FlowContext,
  tastingId: number,
  cardText: string,
  photoIds: readonly string[],
  markup?: InlineKeyboard
): Promise<void> {
  const photos = photoIds.slice(0, MAX_PHOTOS);
  let markupSent = false;

  const sendText = async (text: string): Promise<void> => {
    for (const chunk of splitTelegramMessage(text)) {
      if (markup && !markupSent) {
        await ctx.io.send(chunk, markup);
        markupSent = true;
      } else {
        await ctx.io.send(chunk);
      }
    }
  };

  const ensureActions = async (): Promise<void> => {
    if (markup && !markupSent) {
      await ctx.io.send("Действия:", markup);
      markupSent = true;
    }
  };

  try {
    if (photos.length > 0) {
      const useCaption = cardText.length > 0 && cardText.length <= CAPTION_LIMIT;
      const caption = useCaption ? cardText : undefined;
      const [single] = photos;
      if (photos.length === 1 && single) {
        await ctx.io.sendPhoto(single, caption);
      } else {
        await ctx.io.sendAlbum(photos, caption);
      }
      if (!useCaption) {
        await sendText(cardText);
      }
    } else {
      await sendText(cardText);
    }
    await ensureActions();
  } catch (error) {
    deps.logger.error({ err: error, tastingId }, "Failed to send card media");
    await sendText(cardText);
    await ensureActions();

    for (const fileId of photos) {
      try {
        await ctx.io.sendPhoto(fileId);
      } catch (photoError) {
        deps.logger.error({ err: photoError, tastingId, fileId }, "Fallback photo send failed");
      }
    }
  }
}

export async function sendTastingCard(
  deps: FlowDeps,
  ctx: FlowContext,
  tasting: Tasting,
  infusions: ReadonlyArray<Pick<Infusion, keyof InfusionInput>>,
  photoIds: readonly string[],
  photoCount = photoIds.length
): Promise<void> {
  const text = buildCardText(tasting, infusions, photoCount);
  await sendCardWithMedia(deps, ctx, tasting.id, text, photoIds, cardActionsKeyboard(tasting.id, photoCount));
}

export async function openCard(deps: FlowDeps, ctx: FlowContext, tastingId: number): Promise<void> {
  const tasting = deps.db.getTastingForOwner(tastingId, ctx.userId);
  if (!tasting) {
    await ctx.io.acknowledge();
    await ctx.io.send("Запись не найдена.");
    return;
  }

  await ctx.io.acknowledge();
  const infusions = deps.db.listInfusions(tasting.id);
  const photoIds = deps.db.listPhotoIds(tasting.id, MAX_PHOTOS);
  const photoCount = deps.db.countPhotos(tasting.id);

  await sendTastingCard(deps, ctx, tasting, infusions, photoIds, photoCount);
  deps.events.log(ctx.userId, ctx.chatId, "card_opened", { tasting_id: tasting.id });
}

export async function showPhotos(deps: FlowDeps, ctx: FlowContext, tastingId: number): Promise<void> {
  const tasting = deps.db.getTastingForOwner(tastingId, ctx.userId);
  if (!tasting) {
    await ctx.io.acknowledge("Фото не найдены.");
    return;
  }

  const photoIds = deps.db.listPhotoIds(tasting.id, MAX_PHOTOS);
  const [first] = photoIds;
  if (!first) {
    await ctx.io.acknowledge("Фото нет.");
    return;
  }

  await ctx.io.acknowledge();
  if (photoIds.length === 1) {
    await ctx.io.sendPhoto(first);
  } else {
    await ctx.io.sendAlbum(photoIds);
  }
}
