import { Bot, BotConfig, Context, GrammyError, InlineKeyboard, Keyboard } from "grammy";
import { sequentialize } from "@grammyjs/runner";
import { ConversationEngine } from "./engine";
import { logger } from "./logger";
import { InboundEvent, KeyboardDescription, Reply } from "./types";

export function renderKeyboard(
  description: KeyboardDescription,
): Keyboard | InlineKeyboard {
  if (description.type === "menu") {
    const menu = new Keyboard();
    description.rows.forEach((row, i) => {
      if (i > 0) menu.row();
      row.forEach((label) => menu.text(label));
    });
    return menu.resized();
  }

  const inline = new InlineKeyboard();
  description.rows.forEach((row, i) => {
    if (i > 0) inline.row();
    row.forEach((button) => inline.text(button.label, button.payload));
  });
  return inline;
}

export function toInboundEvent(ctx: Context): InboundEvent | undefined {
  const from = ctx.from;
  if (!from) return undefined;

  const data = ctx.callbackQuery?.data;
  if (data !== undefined) {
    return { senderId: from.id, senderName: from.first_name, kind: "callback", payload: data };
  }

  const text = ctx.message?.text;
  if (text !== undefined) {
    return { senderId: from.id, senderName: from.first_name, kind: "message", payload: text };
  }
  return undefined;
}

async function deliver(ctx: Context, reply: Reply) {
  if (reply.kind === "dismiss") {
    try {
      await ctx.deleteMessage();
    } catch (err) {
      // Telegram refuses to delete messages older than 48 hours
      if (!(err instanceof GrammyError)) throw err;
      logger.warn("could not delete message", { description: err.description });
    }
    return;
  }

  await ctx.api.sendMessage(reply.recipientId, reply.text, {
    reply_markup: reply.keyboard ? renderKeyboard(reply.keyboard) : undefined,
  });
}

export type EventHandler = Pick<ConversationEngine, "handle">;

export function createBot(
  token: string,
  engine: EventHandler,
  config?: BotConfig<Context>,
) {
  const bot = new Bot(token, config);

  // one update at a time per user; different users still run in parallel
  bot.use(sequentialize((ctx: Context) => ctx.from?.id.toString()));

  bot.on(["message:text", "callback_query:data"], async (ctx) => {
    if (ctx.callbackQuery) {
      await ctx.answerCallbackQuery();
    }

    const event = toInboundEvent(ctx);
    if (!event) return;

    const replies = await engine.handle(event);
    for (const reply of replies) {
      await deliver(ctx, reply);
    }
  });

  bot.catch((err) => {
    logger.error("Bot Error", {
      updateId: err.ctx.update.update_id,
      err: err.error,
    });
  });

  return bot;
}
