import type { RawDetectionRecord, RawMessageRecord } from '@medwarehouse/core';
import type { StagingMessage } from '../types.ts';

export function rawMessage(overrides: Partial<RawMessageRecord> = {}): RawMessageRecord {
  return {
    messageId: 101,
    channelName: 'addis_pharm_store',
    messageDate: '2025-03-01T08:15:00.000Z',
    messageText: 'Paracetamol 50 birr available now',
    hasMedia: false,
    imagePath: null,
    views: 200,
    forwards: 10,
    scrapedAt: '2025-03-03T00:00:00.000Z',
    rawPayload: '{}',
    ...overrides,
  };
}

export function rawDetection(overrides: Partial<RawDetectionRecord> = {}): RawDetectionRecord {
  return {
    messageId: 101,
    channelName: 'addis_pharm_store',
    imagePath: 'images/addis_pharm_store/101.jpg',
    detectedObjects: JSON.stringify([
      { class_name: 'bottle', confidence: 0.9 },
      { class_name: 'cup', confidence: 0.8 },
    ]),
    detectionCount: 2,
    imageCategory: 'product',
    processingDate: '2025-03-04T00:00:00.000Z',
    ...overrides,
  };
}

export function stagingMessage(overrides: Partial<StagingMessage> = {}): StagingMessage {
  return {
    messageId: 101,
    messageKey: 'message-key-101',
    channelName: 'addis_pharm_store',
    messageDate: '2025-03-01T08:15:00.000Z',
    messageDay: '2025-03-01',
    messageHour: 8,
    dateKey: 20250301,
    messageText: 'Paracetamol 50 birr available now',
    messageLength: 33,
    hasMedia: false,
    imagePath: null,
    views: 200,
    forwards: 10,
    scrapedAt: '2025-03-03T00:00:00.000Z',
    rawPayload: '{}',
    hasMedicalKeywords: true,
    detectedProduct: 'paracetamol',
    ...overrides,
  };
}
