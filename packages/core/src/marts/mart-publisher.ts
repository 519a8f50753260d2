import { createHash } from 'node:crypto';
import type Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@medwarehouse/shared';
import {
  BUILD_TABLE_SUFFIX,
  MART_INDEXES_DDL,
  MART_TABLE_NAMES,
  channelDimensionDdl,
  detectionFactDdl,
  messageFactDdl,
} from './schema.ts';
import type { ChannelDimensionRow, DetectionFactRow, MartTables, MessageFactRow } from './types.ts';

export interface PublishMartsInput extends MartTables {
  runId: number;
  publishedAt: string;
  /**
   * Runs inside the publish transaction after the publication row is written.
   * An Err rolls back the whole publish and is returned as is.
   */
  beforeCommit?: (version: number) => Result<void, AppError>;
}

export interface MartPublication {
  version: number;
  runId: number;
  publishedAt: string;
  channelRows: number;
  messageRows: number;
  detectionRows: number;
  contentHash: string;
}

type BindRow = Record<string, string | number | null>;

interface MartTableDefinition<Row> {
  table: string;
  ddl: (table: string) => string;
  columns: readonly string[];
  toBindRow: (row: Row) => BindRow;
}

function toSqliteBool(value: boolean): number {
  return value ? 1 : 0;
}

const CHANNEL_TABLE: MartTableDefinition<ChannelDimensionRow> = {
  table: MART_TABLE_NAMES.channels,
  ddl: channelDimensionDdl,
  columns: [
    'channel_key',
    'channel_name',
    'channel_display_name',
    'channel_type',
    'total_posts',
    'first_post_date',
    'last_post_date',
    'avg_views',
    'avg_forwards',
    'total_media_posts',
    'avg_message_length',
    'media_percentage',
    'engagement_rate',
    'days_active',
    'posts_per_day',
    'activity_level',
  ],
  toBindRow: (row) => ({
    channel_key: row.channelKey,
    channel_name: row.channelName,
    channel_display_name: row.channelDisplayName,
    channel_type: row.channelType,
    total_posts: row.totalPosts,
    first_post_date: row.firstPostDate,
    last_post_date: row.lastPostDate,
    avg_views: row.avgViews,
    avg_forwards: row.avgForwards,
    total_media_posts: row.totalMediaPosts,
    avg_message_length: row.avgMessageLength,
    media_percentage: row.mediaPercentage,
    engagement_rate: row.engagementRate,
    days_active: row.daysActive,
    posts_per_day: row.postsPerDay,
    activity_level: row.activityLevel,
  }),
};

const MESSAGE_TABLE: MartTableDefinition<MessageFactRow> = {
  table: MART_TABLE_NAMES.messages,
  ddl: messageFactDdl,
  columns: [
    'message_key',
    'message_id',
    'channel_key',
    'date_key',
    'message_date',
    'message_text',
    'message_length',
    'views',
    'forwards',
    'has_media',
    'image_path',
    'has_medical_keywords',
    'detected_product',
    'message_hour',
    'total_engagement',
    'forward_rate',
    'mentions_price',
    'mentions_availability',
    'extracted_price_amount',
    'scraped_at',
  ],
  toBindRow: (row) => ({
    message_key: row.messageKey,
    message_id: row.messageId,
    channel_key: row.channelKey,
    date_key: row.dateKey,
    message_date: row.messageDate,
    message_text: row.messageText,
    message_length: row.messageLength,
    views: row.views,
    forwards: row.forwards,
    has_media: toSqliteBool(row.hasMedia),
    image_path: row.imagePath,
    has_medical_keywords: toSqliteBool(row.hasMedicalKeywords),
    detected_product: row.detectedProduct,
    message_hour: row.messageHour,
    total_engagement: row.totalEngagement,
    forward_rate: row.forwardRate,
    mentions_price: toSqliteBool(row.mentionsPrice),
    mentions_availability: toSqliteBool(row.mentionsAvailability),
    extracted_price_amount: row.extractedPriceAmount,
    scraped_at: row.scrapedAt,
  }),
};

const DETECTION_TABLE: MartTableDefinition<DetectionFactRow> = {
  table: MART_TABLE_NAMES.detections,
  ddl: detectionFactDdl,
  columns: [
    'detection_key',
    'message_id',
    'channel_name',
    'image_path',
    'detection_count',
    'image_category',
    'processing_date',
    'has_person',
    'has_container',
    'has_medical_tool',
    'object_count',
    'avg_confidence',
    'detected_objects_list',
    'message_key',
    'channel_key',
    'date_key',
    'views',
    'forwards',
    'total_engagement',
    'forward_rate',
    'detailed_category',
  ],
  toBindRow: (row) => ({
    detection_key: row.detectionKey,
    message_id: row.messageId,
    channel_name: row.channelName,
    image_path: row.imagePath,
    detection_count: row.detectionCount,
    image_category: row.imageCategory,
    processing_date: row.processingDate,
    has_person: toSqliteBool(row.hasPerson),
    has_container: toSqliteBool(row.hasContainer),
    has_medical_tool: toSqliteBool(row.hasMedicalTool),
    object_count: row.objectCount,
    avg_confidence: row.avgConfidence,
    detected_objects_list: row.detectedObjectsList,
    message_key: row.messageKey,
    channel_key: row.channelKey,
    date_key: row.dateKey,
    views: row.views,
    forwards: row.forwards,
    total_engagement: row.totalEngagement,
    forward_rate: row.forwardRate,
    detailed_category: row.detailedCategory,
  }),
};

function stableNormalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => stableNormalize(item));
  }
  if (value && typeof value === 'object') {
    const entries = Object.entries(value);
    entries.sort(([left], [right]) => left.localeCompare(right));
    const normalized: Record<string, unknown> = {};
    for (const [key, item] of entries) {
      normalized[key] = stableNormalize(item);
    }
    return normalized;
  }
  return value;
}

export function computeMartContentHash(tables: MartTables): string {
  const serialized = JSON.stringify(
    stableNormalize({
      channels: tables.channels,
      messages: tables.messages,
      detections: tables.detections,
    }),
  );
  return createHash('sha256').update(serialized).digest('hex');
}

class BeforeCommitRejected extends Error {
  constructor(readonly appError: AppError) {
    super(appError.message);
  }
}

function buildAndSwap<Row>(db: Database.Database, definition: MartTableDefinition<Row>, rows: readonly Row[]): void {
  const buildTable = `${definition.table}${BUILD_TABLE_SUFFIX}`;
  db.exec(`DROP TABLE IF EXISTS ${buildTable}`);
  db.exec(definition.ddl(buildTable));

  const insertStmt = db.prepare<BindRow>(
    `
      INSERT INTO ${buildTable} (${definition.columns.join(', ')})
      VALUES (${definition.columns.map((column) => `@${column}`).join(', ')})
    `,
  );
  for (const row of rows) {
    insertStmt.run(definition.toBindRow(row));
  }

  db.exec(`DROP TABLE IF EXISTS ${definition.table}`);
  db.exec(`ALTER TABLE ${buildTable} RENAME TO ${definition.table}`);
}

/**
 * Replaces all three mart tables and appends a publication version. Every
 * table is built under a `__build` name and renamed into place inside a single
 * transaction, so readers see either the previous version or the new one.
 */
export function publishMarts(
  db: Database.Database,
  input: PublishMartsInput,
): Result<MartPublication, AppError> {
  const contentHash = computeMartContentHash(input);

  try {
    const publishTx = db.transaction((): number => {
      buildAndSwap(db, CHANNEL_TABLE, input.channels);
      buildAndSwap(db, MESSAGE_TABLE, input.messages);
      buildAndSwap(db, DETECTION_TABLE, input.detections);
      db.exec(MART_INDEXES_DDL);

      const inserted = db
        .prepare<{
          runId: number;
          publishedAt: string;
          channelRows: number;
          messageRows: number;
          detectionRows: number;
          contentHash: string;
        }>(
          `
            INSERT INTO mart_publications (
              run_id,
              published_at,
              channel_rows,
              message_rows,
              detection_rows,
              content_hash
            )
            VALUES (
              @runId,
              @publishedAt,
              @channelRows,
              @messageRows,
              @detectionRows,
              @contentHash
            )
          `,
        )
        .run({
          runId: input.runId,
          publishedAt: input.publishedAt,
          channelRows: input.channels.length,
          messageRows: input.messages.length,
          detectionRows: input.detections.length,
          contentHash,
        });
      const version = Number(inserted.lastInsertRowid);
      const hookResult = input.beforeCommit?.(version) ?? ok(undefined);
      if (!hookResult.ok) {
        throw new BeforeCommitRejected(hookResult.error);
      }
      return version;
    });

    const version = publishTx();
    return ok({
      version,
      runId: input.runId,
      publishedAt: input.publishedAt,
      channelRows: input.channels.length,
      messageRows: input.messages.length,
      detectionRows: input.detections.length,
      contentHash,
    });
  } catch (cause) {
    if (cause instanceof BeforeCommitRejected) {
      return err(cause.appError);
    }
    return err(
      AppError.fromCause('MART_PUBLISH_FAILED', 'Could not publish mart tables; previous version kept.', cause, {
        runId: input.runId,
        channelRows: input.channels.length,
        messageRows: input.messages.length,
        detectionRows: input.detections.length,
      }),
    );
  }
}
