import { describe, expect, it } from 'vitest';
import { aggregateChannels } from './channel-aggregator.ts';
import { buildMessageFacts, computeForwardRate } from './fact-builder.ts';
import { stagingMessage } from './testing/records.ts';

describe('buildMessageFacts', () => {
  it('derives price, availability and engagement fields', () => {
    const messages = [stagingMessage()];
    const result = buildMessageFacts(messages, aggregateChannels(messages));

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value).toEqual([
      {
        messageId: 101,
        messageKey: 'message-key-101',
        channelKey: 'be6e24fc21931b449f1e7b20708dd862',
        dateKey: 20250301,
        messageDate: '2025-03-01T08:15:00.000Z',
        messageText: 'Paracetamol 50 birr available now',
        messageLength: 33,
        views: 200,
        forwards: 10,
        hasMedia: false,
        imagePath: null,
        hasMedicalKeywords: true,
        detectedProduct: 'paracetamol',
        messageHour: 8,
        totalEngagement: 210,
        forwardRate: 5,
        mentionsPrice: true,
        mentionsAvailability: true,
        extractedPriceAmount: 50,
        scrapedAt: '2025-03-03T00:00:00.000Z',
      },
    ]);
  });

  it('sets forward rate to zero when a message has no views', () => {
    const messages = [stagingMessage({ views: 0, forwards: 4 })];
    const result = buildMessageFacts(messages, aggregateChannels(messages));

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value[0]?.forwardRate).toBe(0);
    expect(result.value[0]?.totalEngagement).toBe(4);
  });

  it('leaves price fields empty for placeholder text', () => {
    const messages = [stagingMessage({ messageText: 'NO_TEXT', messageLength: 7 })];
    const result = buildMessageFacts(messages, aggregateChannels(messages));

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value[0]?.mentionsPrice).toBe(false);
    expect(result.value[0]?.mentionsAvailability).toBe(false);
    expect(result.value[0]?.extractedPriceAmount).toBeNull();
  });

  it('fails when a channel has no dimension row', () => {
    const known = stagingMessage();
    const orphan = stagingMessage({ messageId: 102, messageKey: 'message-key-102', channelName: 'chemed_telegram' });
    const result = buildMessageFacts([known, orphan], aggregateChannels([known]));

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe('PIPELINE_CHANNEL_KEY_UNRESOLVED');
    expect(result.error.context).toEqual({ channelNames: ['chemed_telegram'] });
  });
});

describe('computeForwardRate', () => {
  it('rounds to two decimals', () => {
    expect(computeForwardRate(300, 7)).toBe(2.33);
  });
});
