export interface ChatUser {
  id: number;
  username?: string;
  firstName?: string;
  lastName?: string;
  languageCode?: string;
}

export type ChatUpdate =
  | { kind: 'message'; chatId: number; from: ChatUser; text?: string; contactPhone?: string }
  | { kind: 'callback'; id: string; chatId: number; messageId: number; from: ChatUser; data: string };

export interface InlineButton {
  text: string;
  data: string;
}

export type InlineKeyboard = InlineButton[][];

export interface ReplyButton {
  text: string;
  requestContact?: boolean;
}

export type ReplyKeyboard = ReplyButton[][];

export type UpdateHandler = (update: ChatUpdate) => Promise<void>;

/** Outbound and inbound primitives of the messaging platform. */
export interface ChatTransport {
  /** Starts receiving updates; resolves when receiving stops. */
  start(handler: UpdateHandler): Promise<void>;
  stop(reason?: string): void;
  sendText(chatId: number, text: string): Promise<void>;
  sendReplyKeyboard(chatId: number, text: string, keyboard: ReplyKeyboard): Promise<void>;
  sendInlineKeyboard(chatId: number, text: string, keyboard: InlineKeyboard): Promise<void>;
  editMessage(chatId: number, messageId: number, text: string, keyboard?: InlineKeyboard): Promise<void>;
  answerCallback(callbackId: string, text?: string): Promise<void>;
  sendDocument(chatId: number, filePath: string, caption?: string): Promise<void>;
}
