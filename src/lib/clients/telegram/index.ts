export { TelegramClient } from './TelegramClient';
export type { TelegramClientOptions, TelegramSendResult } from './types';
