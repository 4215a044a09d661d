import axios, { AxiosInstance } from 'axios';
import { CircuitBreaker } from '../../utils/circuit-breaker';
import { ExternalAPIError, errorMessage, toError } from '../../utils/errors';
import logger from '../../utils/logger';
import { externalApiCalls, externalApiDuration } from '../../utils/metrics';
import { RetryOptions, RetryStrategy } from '../../utils/retry';
import type {
  SendMessageRequest,
  TelegramApiResponse,
  TelegramClientOptions,
  TelegramMessage,
  TelegramSendResult,
  TelegramUser,
} from './types';

/**
 * Telegram Bot API client for sending notifications
 */
export class TelegramClient {
  private readonly http: AxiosInstance;
  private readonly retry: RetryStrategy;
  private readonly breaker: CircuitBreaker;
  private readonly botToken: string;

  constructor(options: TelegramClientOptions, retryOptions: RetryOptions = {}) {
    this.botToken = options.botToken;

    this.http = axios.create({
      baseURL: `${options.apiUrl.replace(/\/+$/, '')}/bot${options.botToken}`,
      timeout: options.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
      },
    });

    // Retry on network errors, rate limiting and 5xx responses
    this.retry = new RetryStrategy({
      maxAttempts: 3,
      baseDelayMs: 1000,
      maxDelayMs: 10000,
      shouldRetry: (error) => {
        if (axios.isAxiosError(error)) {
          const status = error.response?.status;
          return !status || status === 429 || status >= 500;
        }
        return false;
      },
      ...retryOptions,
    });

    this.breaker = new CircuitBreaker({
      name: 'telegram',
      failureThreshold: 5,
      openDurationMs: 60000,
    });
  }

  /**
   * Send an HTML-formatted message to a chat
   */
  async sendMessage(chatId: string, text: string): Promise<TelegramSendResult> {
    if (!this.isConfigured()) {
      throw new ExternalAPIError('Telegram', 'Bot token is not configured');
    }

    const timer = externalApiDuration.startTimer({ service: 'telegram', endpoint: 'sendMessage' });

    try {
      const payload: SendMessageRequest = {
        chat_id: chatId,
        text,
        parse_mode: 'HTML',
        disable_web_page_preview: true,
      };

      const message = await this.breaker.execute(() =>
        this.retry.execute(async () => {
          const response = await this.http.post<TelegramApiResponse<TelegramMessage>>(
            '/sendMessage',
            payload
          );
          return unwrap(response.data);
        }, 'telegram.sendMessage')
      );

      timer();
      externalApiCalls.inc({ service: 'telegram', status: 'success' });
      logger.debug('Telegram message sent', { chatId, messageId: message.message_id });

      return { messageId: message.message_id };
    } catch (error) {
      timer();
      externalApiCalls.inc({ service: 'telegram', status: 'error' });

      logger.error('Failed to send Telegram message', { chatId, error: errorMessage(error) });

      throw new ExternalAPIError('Telegram', 'Failed to send message', toError(error));
    }
  }

  /**
   * Verify the bot token against the API
   */
  async getMe(): Promise<TelegramUser> {
    const response = await this.http.get<TelegramApiResponse<TelegramUser>>('/getMe');
    return unwrap(response.data);
  }

  isConfigured(): boolean {
    return this.botToken.length > 0;
  }

  getCircuitState(): string {
    return this.breaker.getState();
  }
}

function unwrap<T>(body: TelegramApiResponse<T>): T {
  if (!body.ok || body.result === undefined) {
    throw new Error(body.description ?? 'Telegram API returned ok=false');
  }
  return body.result;
}
