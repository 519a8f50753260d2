import type Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@medwarehouse/shared';
import { z } from 'zod/v4';
import type { RawDetectionRecord, RawMessageRecord, RawSnapshot } from './types.ts';

export interface RawRepository {
  upsertRawMessages: (rows: readonly RawMessageRecord[]) => Result<number, AppError>;
  upsertRawDetections: (rows: readonly RawDetectionRecord[]) => Result<number, AppError>;
  readRawMessages: () => Result<RawMessageRecord[], AppError>;
  readRawDetections: () => Result<RawDetectionRecord[], AppError>;
  readRawSnapshot: () => Result<RawSnapshot, AppError>;
}

const SqliteBoolSchema = z.number().int().min(0).max(1).transform((value) => value === 1);

const RawMessageRowSchema = z.object({
  messageId: z.number().int(),
  channelName: z.string().nullable(),
  messageDate: z.string().nullable(),
  messageText: z.string().nullable(),
  hasMedia: SqliteBoolSchema.nullable(),
  imagePath: z.string().nullable(),
  views: z.number().int().nullable(),
  forwards: z.number().int().nullable(),
  scrapedAt: z.string().nullable(),
  rawPayload: z.string(),
});

const RawDetectionRowSchema = z.object({
  messageId: z.number().int().nullable(),
  channelName: z.string().nullable(),
  imagePath: z.string(),
  detectedObjects: z.string(),
  detectionCount: z.number().int(),
  imageCategory: z.string().nullable(),
  processingDate: z.string().nullable(),
});

function toSqliteBool(value: boolean | null): number | null {
  if (value === null) {
    return null;
  }
  return value ? 1 : 0;
}

function parseRows<T>(
  rows: readonly unknown[],
  schema: z.ZodType<T>,
  table: string,
): Result<T[], AppError> {
  const parsedRows: T[] = [];
  for (let index = 0; index < rows.length; index += 1) {
    const parsed = schema.safeParse(rows[index]);
    if (!parsed.success) {
      return err(
        AppError.create(
          'RAW_ROW_INVALID',
          'Raw layer row has an unexpected shape.',
          'error',
          { table, rowIndex: index, issues: parsed.error.issues },
        ),
      );
    }
    parsedRows.push(parsed.data);
  }
  return ok(parsedRows);
}

export function createRawRepository(db: Database.Database): RawRepository {
  const upsertMessageStmt = db.prepare<{
    messageId: number;
    channelName: string | null;
    messageDate: string | null;
    messageText: string | null;
    hasMedia: number | null;
    imagePath: string | null;
    views: number | null;
    forwards: number | null;
    scrapedAt: string | null;
    rawPayload: string;
  }>(
    `
      INSERT INTO raw_telegram_messages (
        message_id,
        channel_name,
        message_date,
        message_text,
        has_media,
        image_path,
        views,
        forwards,
        scraped_at,
        raw_data
      )
      VALUES (
        @messageId,
        @channelName,
        @messageDate,
        @messageText,
        @hasMedia,
        @imagePath,
        @views,
        @forwards,
        @scrapedAt,
        @rawPayload
      )
      ON CONFLICT(message_id, channel_name) DO UPDATE SET
        message_text = excluded.message_text,
        views = excluded.views,
        forwards = excluded.forwards,
        scraped_at = excluded.scraped_at,
        raw_data = excluded.raw_data
    `,
  );

  const upsertDetectionStmt = db.prepare<RawDetectionRecord>(
    `
      INSERT INTO raw_image_detections (
        message_id,
        channel_name,
        image_path,
        detected_objects,
        detection_count,
        image_category,
        processing_date
      )
      VALUES (
        @messageId,
        @channelName,
        @imagePath,
        @detectedObjects,
        @detectionCount,
        @imageCategory,
        @processingDate
      )
      ON CONFLICT(message_id, channel_name, image_path) DO UPDATE SET
        detected_objects = excluded.detected_objects,
        detection_count = excluded.detection_count,
        image_category = excluded.image_category,
        processing_date = excluded.processing_date
    `,
  );

  const readMessagesStmt = db.prepare<[], unknown>(
    `
      SELECT
        message_id AS messageId,
        channel_name AS channelName,
        message_date AS messageDate,
        message_text AS messageText,
        has_media AS hasMedia,
        image_path AS imagePath,
        views,
        forwards,
        scraped_at AS scrapedAt,
        raw_data AS rawPayload
      FROM raw_telegram_messages
      ORDER BY message_id ASC, channel_name ASC, id ASC
    `,
  );

  const readDetectionsStmt = db.prepare<[], unknown>(
    `
      SELECT
        message_id AS messageId,
        channel_name AS channelName,
        image_path AS imagePath,
        detected_objects AS detectedObjects,
        detection_count AS detectionCount,
        image_category AS imageCategory,
        processing_date AS processingDate
      FROM raw_image_detections
      ORDER BY message_id ASC, channel_name ASC, image_path ASC, id ASC
    `,
  );

  const upsertMessagesTx = db.transaction((rows: readonly RawMessageRecord[]) => {
    for (const row of rows) {
      upsertMessageStmt.run({
        ...row,
        hasMedia: toSqliteBool(row.hasMedia),
      });
    }
  });

  const upsertDetectionsTx = db.transaction((rows: readonly RawDetectionRecord[]) => {
    for (const row of rows) {
      upsertDetectionStmt.run(row);
    }
  });

  const readRawMessages = (): Result<RawMessageRecord[], AppError> => {
    try {
      return parseRows(readMessagesStmt.all(), RawMessageRowSchema, 'raw_telegram_messages');
    } catch (cause) {
      return err(AppError.fromCause('RAW_READ_FAILED', 'Could not read raw messages.', cause));
    }
  };

  const readRawDetections = (): Result<RawDetectionRecord[], AppError> => {
    try {
      return parseRows(readDetectionsStmt.all(), RawDetectionRowSchema, 'raw_image_detections');
    } catch (cause) {
      return err(AppError.fromCause('RAW_READ_FAILED', 'Could not read raw detections.', cause));
    }
  };

  return {
    upsertRawMessages: (rows) => {
      try {
        upsertMessagesTx(rows);
        return ok(rows.length);
      } catch (cause) {
        return err(
          AppError.fromCause('RAW_WRITE_FAILED', 'Could not write raw messages.', cause, {
            rowCount: rows.length,
          }),
        );
      }
    },
    upsertRawDetections: (rows) => {
      try {
        upsertDetectionsTx(rows);
        return ok(rows.length);
      } catch (cause) {
        return err(
          AppError.fromCause('RAW_WRITE_FAILED', 'Could not write raw detections.', cause, {
            rowCount: rows.length,
          }),
        );
      }
    },
    readRawMessages,
    readRawDetections,
    readRawSnapshot: () => {
      // Both reads share one read transaction so they see the same snapshot.
      const readSnapshotTx = db.transaction(() => ({
        messages: readRawMessages(),
        detections: readRawDetections(),
      }));
      const snapshot = readSnapshotTx();
      if (!snapshot.messages.ok) {
        return snapshot.messages;
      }
      if (!snapshot.detections.ok) {
        return snapshot.detections;
      }
      return ok({ messages: snapshot.messages.value, detections: snapshot.detections.value });
    },
  };
}
