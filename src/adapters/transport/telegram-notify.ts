import { Api, GrammyError, HttpError } from 'grammy';
import type { TransportPort } from '../../ports/index.js';
import type { DeliveryItem, Logger, TransportResult } from '../../types/index.js';
import type { CircuitBreaker } from '../../core/circuit-breaker.js';
import { errorMessage } from '../../core/errors.js';

/**
 * The slice of the Bot API this transport uses.
 */
export interface TelegramSender {
  sendMessage(
    chatId: number,
    text: string,
    other?: { link_preview_options?: { is_disabled?: boolean } },
    signal?: AbortSignal
  ): Promise<unknown>;
}

export interface TelegramNotifyConfig {
  /** Bot token from BotFather */
  botToken: string;
}

/**
 * Bot API client behind the sender interface.
 * grammY types abort signals with its own shim, so cancellation is left to
 * the client timeout and the breaker's deadline.
 */
export function createBotApiSender(botToken: string, timeoutSeconds = 30): TelegramSender {
  const api = new Api(botToken, { timeoutSeconds });
  return {
    sendMessage: (chatId, text, other) => api.sendMessage(chatId, text, other),
  };
}

/**
 * Whether a failed Bot API call is worth repeating.
 * 429 (rate limit) and 5xx are; other API errors (bad chat id, bot
 * blocked) are not. Network errors always are.
 */
export function isRetryableTelegramError(error: unknown): boolean {
  if (error instanceof GrammyError) {
    return error.error_code === 429 || error.error_code >= 500;
  }
  return true;
}

/**
 * Sends notification items to Telegram chats through the grammY Bot API
 * client. The item destination is the chat id.
 */
export class TelegramNotify implements TransportPort {
  readonly name = 'telegram';
  private readonly api: TelegramSender;
  private readonly breaker: CircuitBreaker;
  private readonly logger: Logger;

  constructor(
    config: TelegramNotifyConfig,
    breaker: CircuitBreaker,
    logger: Logger,
    api?: TelegramSender
  ) {
    this.api = api ?? createBotApiSender(config.botToken);
    this.breaker = breaker;
    this.logger = logger.child({ component: 'telegram' });
  }

  async send(item: DeliveryItem, signal: AbortSignal): Promise<TransportResult> {
    if (item.kind !== 'notification') {
      return { ok: false, retryable: false, error: `telegram cannot deliver ${item.kind} items` };
    }

    const chatId = Number.parseInt(item.destination, 10);
    if (Number.isNaN(chatId)) {
      return { ok: false, retryable: false, error: `Invalid chat ID: ${item.destination}` };
    }

    try {
      // Permanent API errors come back as values so they don't trip the breaker
      return await this.breaker.execute(async (timeoutSignal): Promise<TransportResult> => {
        try {
          await this.api.sendMessage(
            chatId,
            item.payload.text,
            { link_preview_options: { is_disabled: false } },
            AbortSignal.any([signal, timeoutSignal])
          );
          this.logger.debug({ chatId, textLength: item.payload.text.length }, 'Message sent');
          return { ok: true };
        } catch (error) {
          if (!isRetryableTelegramError(error)) {
            return { ok: false, retryable: false, error: describe(error) };
          }
          throw error;
        }
      });
    } catch (error) {
      this.logger.warn({ chatId, error: describe(error) }, 'Telegram send failed');
      return { ok: false, retryable: true, error: describe(error) };
    }
  }
}

function describe(error: unknown): string {
  if (error instanceof GrammyError) {
    return `Telegram API error ${String(error.error_code)}: ${error.description}`;
  }
  if (error instanceof HttpError) {
    return `Telegram network error: ${errorMessage(error.error)}`;
  }
  return errorMessage(error);
}
