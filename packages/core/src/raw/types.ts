export interface RawMessageRecord {
  messageId: number;
  channelName: string | null;
  messageDate: string | null;
  messageText: string | null;
  hasMedia: boolean | null;
  imagePath: string | null;
  views: number | null;
  forwards: number | null;
  scrapedAt: string | null;
  /** Original scraped payload, serialized as JSON. */
  rawPayload: string;
}

export interface RawDetectionRecord {
  messageId: number | null;
  channelName: string | null;
  imagePath: string;
  /** JSON text of `[{ class_name, confidence }]`, parsed only by the enricher. */
  detectedObjects: string;
  detectionCount: number;
  imageCategory: string | null;
  processingDate: string | null;
}

export interface RawSnapshot {
  messages: RawMessageRecord[];
  detections: RawDetectionRecord[];
}
