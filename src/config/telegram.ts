/**
 * Telegram Chat Client
 *
 * Wraps telegraf's Telegram API client behind the ChatClient interface used
 * by the alert dispatcher. One instance is built at startup and closed at
 * shutdown; sends after close() are rejected.
 */

import { Telegram } from 'telegraf';
import { DispatchError } from '../models/errors/api-error';
import { logger } from '../utils/logger';

export interface ChatClient {
  /** The signal aborts the underlying request */
  sendMessage(chatId: string, text: string, signal?: AbortSignal): Promise<void>;
  close(): Promise<void>;
}

export class TelegramChatClient implements ChatClient {
  private readonly telegram: Telegram;
  private closed = false;

  constructor(botToken: string) {
    this.telegram = new Telegram(botToken);
  }

  async sendMessage(chatId: string, text: string, signal?: AbortSignal): Promise<void> {
    if (this.closed) {
      throw new DispatchError('Telegram client is closed');
    }

    await this.telegram.callApi(
      'sendMessage',
      {
        chat_id: chatId,
        text,
        parse_mode: 'Markdown',
        link_preview_options: { is_disabled: true },
      },
      { signal }
    );
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    logger.info('Telegram client closed');
  }
}

export function createTelegramClient(botToken: string): ChatClient {
  const client = new TelegramChatClient(botToken);
  logger.info('Telegram client initialized');
  return client;
}
