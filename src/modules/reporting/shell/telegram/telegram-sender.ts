/**
 * Telegram Bot API adapter for ReportSender (grammy).
 */

import { Api, GrammyError, HttpError, InputFile } from 'grammy';
import { err, ok, type Result } from 'neverthrow';

import { createDeliveryError, type DeliveryError } from '../../core/errors.js';

import type { ReportSender } from '../../core/ports.js';
import type { Logger } from 'pino';

/**
 * The Bot API methods the sender calls. grammy's `Api` satisfies it.
 */
export interface TelegramClient {
  sendMessage(
    chatId: string,
    text: string,
    other: { parse_mode: 'HTML'; link_preview_options: { is_disabled: boolean } }
  ): Promise<unknown>;
  sendPhoto(
    chatId: string,
    photo: InputFile,
    other: { caption?: string; parse_mode: 'HTML' }
  ): Promise<unknown>;
  sendDocument(
    chatId: string,
    document: InputFile,
    other: { caption?: string; parse_mode: 'HTML' }
  ): Promise<unknown>;
}

export interface TelegramSenderOptions {
  client: TelegramClient;
  chatId: string;
  logger: Logger;
}

export const toDeliveryError = (method: string, error: unknown): DeliveryError => {
  if (error instanceof GrammyError) {
    return createDeliveryError(
      `Telegram ${method} rejected: ${error.description}`,
      error.error_code,
      error
    );
  }
  if (error instanceof HttpError) {
    return createDeliveryError(`Telegram ${method} failed: network error`, undefined, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return createDeliveryError(`Telegram ${method} failed: ${message}`, undefined, error);
};

const captionOption = (caption: string | undefined) =>
  caption === undefined ? {} : { caption };

export const makeTelegramSender = (options: TelegramSenderOptions): ReportSender => {
  const { client, chatId, logger } = options;

  const attempt = async (
    method: string,
    call: () => Promise<unknown>
  ): Promise<Result<void, DeliveryError>> => {
    try {
      await call();
      return ok(undefined);
    } catch (error) {
      const deliveryError = toDeliveryError(method, error);
      logger.error(
        { err: error, method, statusCode: deliveryError.statusCode },
        deliveryError.message
      );
      return err(deliveryError);
    }
  };

  return {
    sendMessage(html) {
      return attempt('sendMessage', () =>
        client.sendMessage(chatId, html, {
          parse_mode: 'HTML',
          link_preview_options: { is_disabled: true },
        })
      );
    },

    sendPhoto(filePath, caption) {
      return attempt('sendPhoto', () =>
        client.sendPhoto(chatId, new InputFile(filePath), {
          ...captionOption(caption),
          parse_mode: 'HTML',
        })
      );
    },

    sendDocument(filePath, caption) {
      return attempt('sendDocument', () =>
        client.sendDocument(chatId, new InputFile(filePath), {
          ...captionOption(caption),
          parse_mode: 'HTML',
        })
      );
    },
  };
};

/**
 * Sender for the configured bot and chat.
 */
export const createTelegramSender = (config: {
  botToken: string;
  chatId: string;
  logger: Logger;
}): ReportSender =>
  makeTelegramSender({
    client: new Api(config.botToken),
    chatId: config.chatId,
    logger: config.logger,
  });
