import type { ChannelDimensionRow, MessageFactRow } from '@medwarehouse/core';
import { AppError, err, ok, type Result } from '@medwarehouse/shared';
import {
  AVAILABILITY_KEYWORDS,
  PRICE_KEYWORDS,
  containsAnyKeyword,
  extractPriceAmount,
  percentage,
} from './rules.ts';
import type { StagingMessage } from './types.ts';

/** forwards / views * 100, rounded to 2 decimals; 0 when there are no views. */
export function computeForwardRate(views: number, forwards: number): number {
  return percentage(forwards, views);
}

export function buildMessageFact(message: StagingMessage, channelKey: string): MessageFactRow {
  return {
    messageId: message.messageId,
    messageKey: message.messageKey,
    channelKey,
    dateKey: message.dateKey,
    messageDate: message.messageDate,
    messageText: message.messageText,
    messageLength: message.messageLength,
    views: message.views,
    forwards: message.forwards,
    hasMedia: message.hasMedia,
    imagePath: message.imagePath,
    hasMedicalKeywords: message.hasMedicalKeywords,
    detectedProduct: message.detectedProduct,
    messageHour: message.messageHour,
    totalEngagement: message.views + message.forwards,
    forwardRate: computeForwardRate(message.views, message.forwards),
    mentionsPrice: containsAnyKeyword(message.messageText, PRICE_KEYWORDS),
    mentionsAvailability: containsAnyKeyword(message.messageText, AVAILABILITY_KEYWORDS),
    extractedPriceAmount: extractPriceAmount(message.messageText),
    scrapedAt: message.scrapedAt,
  };
}

/**
 * One fact per staging row. Facts reference channels by key only; a staging
 * channel with no dimension row is a data-quality fault and fails the build.
 */
export function buildMessageFacts(
  messages: readonly StagingMessage[],
  channels: readonly ChannelDimensionRow[],
): Result<MessageFactRow[], AppError> {
  const channelKeysByName = new Map<string, string>();
  for (const channel of channels) {
    channelKeysByName.set(channel.channelName, channel.channelKey);
  }

  const facts: MessageFactRow[] = [];
  const unresolved = new Set<string>();
  for (const message of messages) {
    const channelKey = channelKeysByName.get(message.channelName);
    if (channelKey === undefined) {
      unresolved.add(message.channelName);
      continue;
    }
    facts.push(buildMessageFact(message, channelKey));
  }

  if (unresolved.size > 0) {
    return err(
      AppError.create(
        'PIPELINE_CHANNEL_KEY_UNRESOLVED',
        'Staging messages reference channels missing from the channel dimension.',
        'error',
        { channelNames: [...unresolved].sort() },
      ),
    );
  }

  return ok(facts);
}
