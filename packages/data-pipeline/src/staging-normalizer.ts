import { parseUtcTimestamp, type RawMessageRecord } from '@medwarehouse/core';
import type { DateKeyResolver } from './date-dimension-resolver.ts';
import {
  MEDICAL_KEYWORDS,
  NO_TEXT_SENTINEL,
  containsAnyKeyword,
  detectProduct,
} from './rules.ts';
import { messageKey } from './surrogate-key.ts';
import { cleanText } from './text-cleaner.ts';
import type { StagingMessage } from './types.ts';

export interface NormalizeRawMessagesOptions {
  resolveDateKey: DateKeyResolver;
}

export interface StagingResult {
  messages: StagingMessage[];
  /** Rows without a channel or a usable timestamp. */
  droppedRows: number;
  /** Rows whose channel name collides with an earlier row once normalized. */
  duplicateRows: number;
}

export function normalizeChannelName(channelName: string): string {
  return channelName.trim().toLowerCase();
}

export function normalizeMessageText(text: string | null): string {
  if (text === null || text === '') {
    return NO_TEXT_SENTINEL;
  }
  const cleaned = cleanText(text);
  return cleaned === '' ? NO_TEXT_SENTINEL : cleaned;
}

export function normalizeRawMessage(
  row: RawMessageRecord,
  options: NormalizeRawMessagesOptions,
): StagingMessage | null {
  if (row.channelName === null) {
    return null;
  }
  const messageDate = parseUtcTimestamp(row.messageDate);
  if (messageDate === null) {
    return null;
  }

  const channelName = normalizeChannelName(row.channelName);
  const messageText = normalizeMessageText(row.messageText);
  const messageDateIso = messageDate.toISOString();

  return {
    messageId: row.messageId,
    messageKey: messageKey(row.messageId, channelName),
    channelName,
    messageDate: messageDateIso,
    messageDay: messageDateIso.slice(0, 10),
    messageHour: messageDate.getUTCHours(),
    dateKey: options.resolveDateKey(messageDateIso),
    messageText,
    messageLength: Array.from(messageText).length,
    hasMedia: row.hasMedia ?? false,
    imagePath: row.imagePath,
    views: row.views ?? 0,
    forwards: row.forwards ?? 0,
    scrapedAt: row.scrapedAt,
    rawPayload: row.rawPayload,
    hasMedicalKeywords: containsAnyKeyword(messageText, MEDICAL_KEYWORDS),
    detectedProduct: detectProduct(messageText),
  };
}

export function normalizeRawMessages(
  rows: readonly RawMessageRecord[],
  options: NormalizeRawMessagesOptions,
): StagingResult {
  const messages: StagingMessage[] = [];
  const seenKeys = new Set<string>();
  let droppedRows = 0;
  let duplicateRows = 0;

  for (const row of rows) {
    const staged = normalizeRawMessage(row, options);
    if (staged === null) {
      droppedRows += 1;
      continue;
    }
    if (seenKeys.has(staged.messageKey)) {
      duplicateRows += 1;
      continue;
    }
    seenKeys.add(staged.messageKey);
    messages.push(staged);
  }

  return { messages, droppedRows, duplicateRows };
}
