/**
 * Sends a message of any length as consecutive chat messages.
 */

import { err, ok, type Result } from 'neverthrow';

import { splitMessage } from '../split-message.js';

import type { DeliveryError } from '../errors.js';
import type { ReportSender } from '../ports.js';
import type { Logger } from 'pino';

export interface DeliverMessageDeps {
  sender: ReportSender;
  logger: Logger;
}

/**
 * Stops at the first part that fails; earlier parts stay delivered.
 *
 * @returns the number of parts sent
 */
export const deliverMessage = async (
  deps: DeliverMessageDeps,
  html: string
): Promise<Result<number, DeliveryError>> => {
  const parts = splitMessage(html);

  for (const [index, part] of parts.entries()) {
    const result = await deps.sender.sendMessage(part);
    if (result.isErr()) return err(result.error);
    deps.logger.debug(
      { part: index + 1, parts: parts.length, length: part.length },
      'Sent message part'
    );
  }

  return ok(parts.length);
};
