import type { ChannelDimensionRow, DetectionFactRow, MessageFactRow } from '../marts/types.ts';

// Row builders shared by the core integration tests.

export function channelRow(overrides: Partial<ChannelDimensionRow> = {}): ChannelDimensionRow {
  return {
    channelKey: 'channel-key-1',
    channelName: 'addis_pharm_store',
    channelDisplayName: 'Addis Pharmacy',
    channelType: 'Pharmaceutical',
    totalPosts: 2,
    firstPostDate: '2025-03-01T08:00:00.000Z',
    lastPostDate: '2025-03-02T09:00:00.000Z',
    avgViews: 150,
    avgForwards: 5,
    totalMediaPosts: 1,
    avgMessageLength: 20,
    mediaPercentage: 50,
    engagementRate: 7750,
    daysActive: 2,
    postsPerDay: 1,
    activityLevel: 'Low',
    ...overrides,
  };
}

export function messageRow(overrides: Partial<MessageFactRow> = {}): MessageFactRow {
  return {
    messageId: 101,
    messageKey: 'message-key-101',
    channelKey: 'channel-key-1',
    dateKey: 20250301,
    messageDate: '2025-03-01T08:00:00.000Z',
    messageText: 'Paracetamol 50 birr available now',
    messageLength: 33,
    views: 200,
    forwards: 10,
    hasMedia: true,
    imagePath: 'images/addis_pharm_store/101.jpg',
    hasMedicalKeywords: true,
    detectedProduct: 'paracetamol',
    messageHour: 8,
    totalEngagement: 210,
    forwardRate: 5,
    mentionsPrice: true,
    mentionsAvailability: true,
    extractedPriceAmount: 50,
    scrapedAt: '2025-03-03T00:00:00.000Z',
    ...overrides,
  };
}

export function detectionRow(overrides: Partial<DetectionFactRow> = {}): DetectionFactRow {
  return {
    detectionKey: 'detection-key-101',
    messageId: 101,
    channelName: 'addis_pharm_store',
    imagePath: 'images/addis_pharm_store/101.jpg',
    detectionCount: 2,
    imageCategory: 'product',
    processingDate: '2025-03-04T00:00:00.000Z',
    hasPerson: false,
    hasContainer: true,
    hasMedicalTool: false,
    objectCount: 2,
    avgConfidence: 0.9,
    detectedObjectsList: 'bottle, cup',
    messageKey: 'message-key-101',
    channelKey: 'channel-key-1',
    dateKey: 20250301,
    views: 200,
    forwards: 10,
    totalEngagement: 210,
    forwardRate: 5,
    detailedCategory: 'product_display',
    ...overrides,
  };
}
