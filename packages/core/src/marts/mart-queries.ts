import type Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@medwarehouse/shared';
import { z } from 'zod/v4';
import type { MartPublication } from './mart-publisher.ts';
import type { ChannelDimensionRow, DetectionFactRow, MessageFactRow } from './types.ts';

export interface ProductMention {
  productName: string;
  mentionCount: number;
  percentage: number;
}

export interface MartQueries {
  listChannels: () => Result<ChannelDimensionRow[], AppError>;
  listMessageFacts: () => Result<MessageFactRow[], AppError>;
  listDetectionFacts: () => Result<DetectionFactRow[], AppError>;
  getLatestPublication: () => Result<MartPublication | null, AppError>;
  getTopProducts: (limit: number) => Result<ProductMention[], AppError>;
}

const DEFAULT_TOP_PRODUCTS_LIMIT = 10;

const SqliteBoolSchema = z.number().int().min(0).max(1).transform((value) => value === 1);

const ChannelDimensionRowSchema = z.object({
  channelKey: z.string(),
  channelName: z.string(),
  channelDisplayName: z.string(),
  channelType: z.enum(['Pharmaceutical', 'Cosmetics', 'Medical', 'Other']),
  totalPosts: z.number().int().nonnegative(),
  firstPostDate: z.string(),
  lastPostDate: z.string(),
  avgViews: z.number(),
  avgForwards: z.number(),
  totalMediaPosts: z.number().int().nonnegative(),
  avgMessageLength: z.number(),
  mediaPercentage: z.number().min(0).max(100),
  engagementRate: z.number().nonnegative(),
  daysActive: z.number().int().positive(),
  postsPerDay: z.number().nonnegative(),
  activityLevel: z.enum(['Very High', 'High', 'Medium', 'Low']),
});

const MessageFactRowSchema = z.object({
  messageId: z.number().int(),
  messageKey: z.string(),
  channelKey: z.string(),
  dateKey: z.number().int().nullable(),
  messageDate: z.string(),
  messageText: z.string(),
  messageLength: z.number().int().nonnegative(),
  views: z.number().int(),
  forwards: z.number().int(),
  hasMedia: SqliteBoolSchema,
  imagePath: z.string().nullable(),
  hasMedicalKeywords: SqliteBoolSchema,
  detectedProduct: z.string().nullable(),
  messageHour: z.number().int().min(0).max(23),
  totalEngagement: z.number().int(),
  forwardRate: z.number(),
  mentionsPrice: SqliteBoolSchema,
  mentionsAvailability: SqliteBoolSchema,
  extractedPriceAmount: z.number().nullable(),
  scrapedAt: z.string().nullable(),
});

const DetectionFactRowSchema = z.object({
  detectionKey: z.string(),
  messageId: z.number().int(),
  channelName: z.string(),
  imagePath: z.string(),
  detectionCount: z.number().int().positive(),
  imageCategory: z.string().nullable(),
  processingDate: z.string().nullable(),
  hasPerson: SqliteBoolSchema,
  hasContainer: SqliteBoolSchema,
  hasMedicalTool: SqliteBoolSchema,
  objectCount: z.number().int().nonnegative(),
  avgConfidence: z.number().nullable(),
  detectedObjectsList: z.string().nullable(),
  messageKey: z.string().nullable(),
  channelKey: z.string().nullable(),
  dateKey: z.number().int().nullable(),
  views: z.number().int().nullable(),
  forwards: z.number().int().nullable(),
  totalEngagement: z.number().int().nullable(),
  forwardRate: z.number(),
  detailedCategory: z.enum(['promotional', 'product_display', 'lifestyle', 'medical_tools', 'other']),
});

const MartPublicationSchema = z.object({
  version: z.number().int().positive(),
  runId: z.number().int().positive(),
  publishedAt: z.string(),
  channelRows: z.number().int().nonnegative(),
  messageRows: z.number().int().nonnegative(),
  detectionRows: z.number().int().nonnegative(),
  contentHash: z.string(),
});

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
          'MART_ROW_INVALID',
          'Mart row in DB is invalid.',
          'error',
          { table, rowIndex: index, issues: parsed.error.issues },
        ),
      );
    }
    parsedRows.push(parsed.data);
  }
  return ok(parsedRows);
}

function roundTo2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

// Statements are prepared per call: every publish drops and renames the mart tables.
export function createMartQueries(db: Database.Database): MartQueries {
  const readAll = <T>(sql: string, schema: z.ZodType<T>, table: string): Result<T[], AppError> => {
    try {
      return parseRows(db.prepare<[], unknown>(sql).all(), schema, table);
    } catch (cause) {
      return err(AppError.fromCause('MART_READ_FAILED', 'Could not read mart table.', cause, { table }));
    }
  };

  return {
    listChannels: () =>
      readAll(
        `
          SELECT
            channel_key AS channelKey,
            channel_name AS channelName,
            channel_display_name AS channelDisplayName,
            channel_type AS channelType,
            total_posts AS totalPosts,
            first_post_date AS firstPostDate,
            last_post_date AS lastPostDate,
            avg_views AS avgViews,
            avg_forwards AS avgForwards,
            total_media_posts AS totalMediaPosts,
            avg_message_length AS avgMessageLength,
            media_percentage AS mediaPercentage,
            engagement_rate AS engagementRate,
            days_active AS daysActive,
            posts_per_day AS postsPerDay,
            activity_level AS activityLevel
          FROM dim_channels
          ORDER BY channel_name ASC
        `,
        ChannelDimensionRowSchema,
        'dim_channels',
      ),
    listMessageFacts: () =>
      readAll(
        `
          SELECT
            message_id AS messageId,
            message_key AS messageKey,
            channel_key AS channelKey,
            date_key AS dateKey,
            message_date AS messageDate,
            message_text AS messageText,
            message_length AS messageLength,
            views,
            forwards,
            has_media AS hasMedia,
            image_path AS imagePath,
            has_medical_keywords AS hasMedicalKeywords,
            detected_product AS detectedProduct,
            message_hour AS messageHour,
            total_engagement AS totalEngagement,
            forward_rate AS forwardRate,
            mentions_price AS mentionsPrice,
            mentions_availability AS mentionsAvailability,
            extracted_price_amount AS extractedPriceAmount,
            scraped_at AS scrapedAt
          FROM fct_messages
          ORDER BY message_key ASC
        `,
        MessageFactRowSchema,
        'fct_messages',
      ),
    listDetectionFacts: () =>
      readAll(
        `
          SELECT
            detection_key AS detectionKey,
            message_id AS messageId,
            channel_name AS channelName,
            image_path AS imagePath,
            detection_count AS detectionCount,
            image_category AS imageCategory,
            processing_date AS processingDate,
            has_person AS hasPerson,
            has_container AS hasContainer,
            has_medical_tool AS hasMedicalTool,
            object_count AS objectCount,
            avg_confidence AS avgConfidence,
            detected_objects_list AS detectedObjectsList,
            message_key AS messageKey,
            channel_key AS channelKey,
            date_key AS dateKey,
            views,
            forwards,
            total_engagement AS totalEngagement,
            forward_rate AS forwardRate,
            detailed_category AS detailedCategory
          FROM fct_image_detections
          ORDER BY detection_key ASC
        `,
        DetectionFactRowSchema,
        'fct_image_detections',
      ),
    getLatestPublication: () => {
      const rowsResult = readAll(
        `
          SELECT
            version,
            run_id AS runId,
            published_at AS publishedAt,
            channel_rows AS channelRows,
            message_rows AS messageRows,
            detection_rows AS detectionRows,
            content_hash AS contentHash
          FROM mart_publications
          ORDER BY version DESC
          LIMIT 1
        `,
        MartPublicationSchema,
        'mart_publications',
      );
      if (!rowsResult.ok) {
        return rowsResult;
      }
      return ok(rowsResult.value[0] ?? null);
    },
    getTopProducts: (limit) => {
      const safeLimit = Number.isFinite(limit)
        ? Math.min(100, Math.max(1, Math.floor(limit)))
        : DEFAULT_TOP_PRODUCTS_LIMIT;
      const rowsResult = readAll(
        `
          SELECT
            detected_product AS productName,
            COUNT(*) AS mentionCount,
            (SELECT COUNT(*) FROM fct_messages WHERE detected_product IS NOT NULL) AS totalMentions
          FROM fct_messages
          WHERE detected_product IS NOT NULL
          GROUP BY detected_product
          ORDER BY mentionCount DESC, productName ASC
          LIMIT ${String(safeLimit)}
        `,
        z.object({
          productName: z.string(),
          mentionCount: z.number().int().positive(),
          totalMentions: z.number().int().positive(),
        }),
        'fct_messages',
      );
      if (!rowsResult.ok) {
        return rowsResult;
      }
      return ok(
        rowsResult.value.map((row) => ({
          productName: row.productName,
          mentionCount: row.mentionCount,
          percentage: roundTo2((row.mentionCount / row.totalMentions) * 100),
        })),
      );
    },
  };
}
