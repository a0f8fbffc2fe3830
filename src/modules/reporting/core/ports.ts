/**
 * Reporting Module - Ports
 */

import type { DeliveryError, SnapshotError } from './errors.js';
import type { ReportSnapshot } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Delivers report content to the report chat.
 */
export interface ReportSender {
  /** HTML message; must fit in one Telegram message */
  sendMessage(html: string): Promise<Result<void, DeliveryError>>;
  sendPhoto(filePath: string, caption?: string): Promise<Result<void, DeliveryError>>;
  sendDocument(filePath: string, caption?: string): Promise<Result<void, DeliveryError>>;
}

/**
 * Last real-time report figures.
 */
export interface SnapshotStore {
  /** `null` when no report has been sent yet */
  load(): Promise<Result<ReportSnapshot | null, SnapshotError>>;
  save(snapshot: ReportSnapshot): Promise<Result<void, SnapshotError>>;
}
