import fs from 'node:fs';
import path from 'node:path';
import type { RawDetectionRecord, RawMessageRecord } from '@medwarehouse/core';
import { AppError, err, ok, toError, type Result } from '@medwarehouse/shared';
import { z } from 'zod/v4';

export const ScrapedMessageSchema = z.looseObject({
  message_id: z.number().int(),
  channel_name: z.string().nullish(),
  message_date: z.string().nullish(),
  message_text: z.string().nullish(),
  has_media: z.boolean().nullish(),
  image_path: z.string().nullish(),
  views: z.number().int().nonnegative().nullish(),
  forwards: z.number().int().nonnegative().nullish(),
  scraped_at: z.string().nullish(),
});

export type ScrapedMessage = z.infer<typeof ScrapedMessageSchema>;

export const DetectionResultSchema = z.looseObject({
  message_id: z.number().int().nullish(),
  channel_name: z.string().nullish(),
  image_path: z.string().min(1),
  detections: z.array(z.unknown()).optional(),
  detected_objects: z.array(z.unknown()).optional(),
  detection_count: z.number().int().nonnegative().optional(),
  image_category: z.string().nullish(),
  processing_time: z.string().nullish(),
  processing_date: z.string().nullish(),
});

export type DetectionResult = z.infer<typeof DetectionResultSchema>;

export interface RawLoadWarning {
  filePath: string;
  /** Array position of the rejected entry; null when the whole file was rejected. */
  index: number | null;
  error: AppError;
}

export interface RawLoadResult<T> {
  records: T[];
  files: number;
  warnings: RawLoadWarning[];
}

function readJsonArray(filePath: string): Result<unknown[], AppError> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (cause) {
    return err(
      AppError.create('RAW_FILE_UNREADABLE', 'Raw file could not be read as JSON.', 'warning', { filePath }, toError(cause)),
    );
  }
  if (!Array.isArray(decoded)) {
    return err(AppError.warning('RAW_FILE_INVALID', 'Raw file must contain a JSON array.', { filePath }));
  }
  return ok(decoded);
}

function parseEntries<E, T>(
  filePath: string,
  schema: z.ZodType<E>,
  toRecord: (entry: E, original: unknown) => T,
  result: RawLoadResult<T>,
): void {
  const entries = readJsonArray(filePath);
  result.files += 1;
  if (!entries.ok) {
    result.warnings.push({ filePath, index: null, error: entries.error });
    return;
  }

  entries.value.forEach((entry, index) => {
    const parsed = schema.safeParse(entry);
    if (!parsed.success) {
      result.warnings.push({
        filePath,
        index,
        error: AppError.warning('RAW_ENTRY_INVALID', 'Raw entry has an unexpected shape.', {
          filePath,
          index,
          issues: parsed.error.issues,
        }),
      });
      return;
    }
    result.records.push(toRecord(parsed.data, entry));
  });
}

export function toRawMessageRecord(message: ScrapedMessage, original: unknown): RawMessageRecord {
  return {
    messageId: message.message_id,
    channelName: message.channel_name ?? null,
    messageDate: message.message_date ?? null,
    messageText: message.message_text ?? null,
    hasMedia: message.has_media ?? null,
    imagePath: message.image_path ?? null,
    views: message.views ?? null,
    forwards: message.forwards ?? null,
    scrapedAt: message.scraped_at ?? null,
    rawPayload: JSON.stringify(original),
  };
}

export function toRawDetectionRecord(result: DetectionResult): RawDetectionRecord {
  return {
    messageId: result.message_id ?? null,
    channelName: result.channel_name ?? null,
    imagePath: result.image_path,
    detectedObjects: JSON.stringify(result.detections ?? result.detected_objects ?? []),
    detectionCount: result.detection_count ?? 0,
    imageCategory: result.image_category ?? null,
    processingDate: result.processing_time ?? result.processing_date ?? null,
  };
}

/** Every `*.json` file below `dir`, in path order, each holding an array of scraped messages. */
export function loadScrapedMessageFiles(dir: string): Result<RawLoadResult<RawMessageRecord>, AppError> {
  let entries: string[];
  try {
    entries = fs.readdirSync(dir, { recursive: true, encoding: 'utf8' });
  } catch (cause) {
    return err(AppError.fromCause('RAW_DIRECTORY_UNREADABLE', 'Raw message directory could not be listed.', cause, { dir }));
  }

  const result: RawLoadResult<RawMessageRecord> = { records: [], files: 0, warnings: [] };
  const jsonFiles = entries
    .filter((entry) => entry.endsWith('.json'))
    .map((entry) => path.join(dir, entry))
    .sort();
  for (const filePath of jsonFiles) {
    parseEntries(filePath, ScrapedMessageSchema, toRawMessageRecord, result);
  }
  return ok(result);
}

export function loadDetectionResultsFile(filePath: string): RawLoadResult<RawDetectionRecord> {
  const result: RawLoadResult<RawDetectionRecord> = { records: [], files: 0, warnings: [] };
  parseEntries(filePath, DetectionResultSchema, toRawDetectionRecord, result);
  return result;
}
