import { Markup, Telegraf } from 'telegraf';
import { callbackQuery, message } from 'telegraf/filters';
import type { User as TelegramUser } from 'telegraf/types';

import { TransportError } from '@core/errors/infra.errors.js';

import type {
  ChatTransport,
  ChatUser,
  InlineKeyboard,
  ReplyKeyboard,
  UpdateHandler,
} from '@services/chat/chat.transport.js';

import { logger } from '@utils/logger.js';

function toChatUser(from: TelegramUser): ChatUser {
  return {
    id: from.id,
    username: from.username,
    firstName: from.first_name,
    lastName: from.last_name,
    languageCode: from.language_code,
  };
}

function replyMarkup(keyboard: ReplyKeyboard) {
  return Markup.keyboard(
    keyboard.map((row) =>
      row.map((b) => (b.requestContact ? Markup.button.contactRequest(b.text) : Markup.button.text(b.text))),
    ),
  ).resize();
}

function inlineMarkup(keyboard: InlineKeyboard) {
  return Markup.inlineKeyboard(keyboard.map((row) => row.map((b) => Markup.button.callback(b.text, b.data))));
}

/** Telegram Bot API over long polling. */
export class TelegrafTransport implements ChatTransport {
  private readonly bot: Telegraf;

  constructor(token: string, bot?: Telegraf) {
    this.bot = bot ?? new Telegraf(token);
  }

  async start(handler: UpdateHandler): Promise<void> {
    this.bot.on(message('text'), async (ctx) => {
      if (!ctx.from) return;
      await handler({ kind: 'message', chatId: ctx.chat.id, from: toChatUser(ctx.from), text: ctx.message.text });
    });
    this.bot.on(message('contact'), async (ctx) => {
      if (!ctx.from) return;
      await handler({
        kind: 'message',
        chatId: ctx.chat.id,
        from: toChatUser(ctx.from),
        contactPhone: ctx.message.contact.phone_number,
      });
    });
    this.bot.on(callbackQuery('data'), async (ctx) => {
      const query = ctx.callbackQuery;
      await handler({
        kind: 'callback',
        id: query.id,
        chatId: ctx.chat?.id ?? query.from.id,
        messageId: query.message?.message_id ?? 0,
        from: toChatUser(query.from),
        data: query.data,
      });
    });
    this.bot.catch((err) => {
      logger.error('[telegram] middleware error', { err });
    });

    logger.info('[telegram] polling started');
    try {
      await this.bot.launch({ dropPendingUpdates: false });
    } catch (err) {
      throw new TransportError('Telegram polling failed', err);
    }
    logger.info('[telegram] polling stopped');
  }

  stop(reason = 'shutdown'): void {
    try {
      this.bot.stop(reason);
    } catch (err) {
      logger.warn('[telegram] stop failed', { err });
    }
  }

  async sendText(chatId: number, text: string): Promise<void> {
    await this.call('sendMessage', () => this.bot.telegram.sendMessage(chatId, text));
  }

  async sendReplyKeyboard(chatId: number, text: string, keyboard: ReplyKeyboard): Promise<void> {
    await this.call('sendMessage', () => this.bot.telegram.sendMessage(chatId, text, replyMarkup(keyboard)));
  }

  async sendInlineKeyboard(chatId: number, text: string, keyboard: InlineKeyboard): Promise<void> {
    await this.call('sendMessage', () => this.bot.telegram.sendMessage(chatId, text, inlineMarkup(keyboard)));
  }

  async editMessage(chatId: number, messageId: number, text: string, keyboard?: InlineKeyboard): Promise<void> {
    await this.call('editMessageText', () =>
      this.bot.telegram.editMessageText(chatId, messageId, undefined, text, keyboard ? inlineMarkup(keyboard) : undefined),
    );
  }

  async answerCallback(callbackId: string, text?: string): Promise<void> {
    await this.call('answerCbQuery', () => this.bot.telegram.answerCbQuery(callbackId, text));
  }

  async sendDocument(chatId: number, filePath: string, caption?: string): Promise<void> {
    await this.call('sendDocument', () => this.bot.telegram.sendDocument(chatId, { source: filePath }, { caption }));
  }

  private async call(method: string, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      throw new TransportError(`Telegram ${method} failed`, err);
    }
  }
}
