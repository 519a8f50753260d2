export type ChannelType = 'Pharmaceutical' | 'Cosmetics' | 'Medical' | 'Other';
export type ActivityLevel = 'Very High' | 'High' | 'Medium' | 'Low';
export type DetailedImageCategory =
  | 'promotional'
  | 'product_display'
  | 'lifestyle'
  | 'medical_tools'
  | 'other';

export interface ChannelDimensionRow {
  channelKey: string;
  channelName: string;
  channelDisplayName: string;
  channelType: ChannelType;
  totalPosts: number;
  firstPostDate: string;
  lastPostDate: string;
  avgViews: number;
  avgForwards: number;
  totalMediaPosts: number;
  avgMessageLength: number;
  mediaPercentage: number;
  engagementRate: number;
  daysActive: number;
  postsPerDay: number;
  activityLevel: ActivityLevel;
}

export interface MessageFactRow {
  messageId: number;
  messageKey: string;
  channelKey: string;
  dateKey: number | null;
  messageDate: string;
  messageText: string;
  messageLength: number;
  views: number;
  forwards: number;
  hasMedia: boolean;
  imagePath: string | null;
  hasMedicalKeywords: boolean;
  detectedProduct: string | null;
  messageHour: number;
  totalEngagement: number;
  forwardRate: number;
  mentionsPrice: boolean;
  mentionsAvailability: boolean;
  extractedPriceAmount: number | null;
  scrapedAt: string | null;
}

export interface DetectionFactRow {
  detectionKey: string;
  messageId: number;
  channelName: string;
  imagePath: string;
  detectionCount: number;
  imageCategory: string | null;
  processingDate: string | null;
  hasPerson: boolean;
  hasContainer: boolean;
  hasMedicalTool: boolean;
  objectCount: number;
  avgConfidence: number | null;
  detectedObjectsList: string | null;
  messageKey: string | null;
  channelKey: string | null;
  dateKey: number | null;
  views: number | null;
  forwards: number | null;
  totalEngagement: number | null;
  forwardRate: number;
  detailedCategory: DetailedImageCategory;
}

export interface MartTables {
  channels: readonly ChannelDimensionRow[];
  messages: readonly MessageFactRow[];
  detections: readonly DetectionFactRow[];
}
