/**
 * Telegram Bot API shapes used for notification delivery
 */

export interface TelegramClientOptions {
  botToken: string;
  apiUrl: string;
  timeoutMs: number;
}

export interface SendMessageRequest {
  chat_id: string;
  text: string;
  parse_mode: 'HTML';
  disable_web_page_preview: boolean;
}

export interface TelegramApiResponse<T> {
  ok: boolean;
  result?: T;
  description?: string;
  error_code?: number;
}

export interface TelegramMessage {
  message_id: number;
  date: number;
}

export interface TelegramUser {
  id: number;
  is_bot: boolean;
  username?: string;
}

export interface TelegramSendResult {
  messageId: number;
}
