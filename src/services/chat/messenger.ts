import { logger } from '@utils/logger.js';
import { incrementCounter } from '@utils/metrics.js';

import type { ChatTransport, InlineKeyboard, ReplyKeyboard } from './chat.transport.js';

/** Transport facade whose sends never throw: failures are logged and counted. */
export class Messenger {
  constructor(private readonly transport: ChatTransport) {}

  text(chatId: number, text: string): Promise<boolean> {
    return this.guard('send_text', chatId, () => this.transport.sendText(chatId, text));
  }

  reply(chatId: number, text: string, keyboard: ReplyKeyboard): Promise<boolean> {
    return this.guard('send_reply_keyboard', chatId, () => this.transport.sendReplyKeyboard(chatId, text, keyboard));
  }

  inline(chatId: number, text: string, keyboard: InlineKeyboard): Promise<boolean> {
    return this.guard('send_inline_keyboard', chatId, () => this.transport.sendInlineKeyboard(chatId, text, keyboard));
  }

  edit(chatId: number, messageId: number, text: string, keyboard?: InlineKeyboard): Promise<boolean> {
    return this.guard('edit_message', chatId, () => this.transport.editMessage(chatId, messageId, text, keyboard));
  }

  answer(callbackId: string, text?: string): Promise<boolean> {
    return this.guard('answer_callback', 0, () => this.transport.answerCallback(callbackId, text));
  }

  document(chatId: number, filePath: string, caption?: string): Promise<boolean> {
    return this.guard('send_document', chatId, () => this.transport.sendDocument(chatId, filePath, caption));
  }

  /** Resolves false when the send failed. */
  private async guard(operation: string, chatId: number, fn: () => Promise<void>): Promise<boolean> {
    try {
      await fn();
      return true;
    } catch (err) {
      incrementCounter('send_errors');
      logger.warn('[chat] send failed', { operation, chatId, err });
      return false;
    }
  }
}
