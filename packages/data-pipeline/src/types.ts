export interface StagingMessage {
  messageId: number;
  messageKey: string;
  channelName: string;
  messageDate: string;
  /** UTC calendar day of `messageDate`, `YYYY-MM-DD`. */
  messageDay: string;
  messageHour: number;
  dateKey: number | null;
  messageText: string;
  messageLength: number;
  hasMedia: boolean;
  imagePath: string | null;
  views: number;
  forwards: number;
  scrapedAt: string | null;
  rawPayload: string;
  hasMedicalKeywords: boolean;
  detectedProduct: string | null;
}
