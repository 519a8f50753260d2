export const MART_TABLE_NAMES = {
  channels: 'dim_channels',
  messages: 'fct_messages',
  detections: 'fct_image_detections',
} as const;

export type MartTableName = (typeof MART_TABLE_NAMES)[keyof typeof MART_TABLE_NAMES];

export const BUILD_TABLE_SUFFIX = '__build';

// Marts carry no REFERENCES clauses: tables are dropped and renamed on every
// publish, and key integrity is checked by the fact builder instead.
export function channelDimensionDdl(table: string): string {
  return `
    CREATE TABLE ${table} (
      channel_key TEXT PRIMARY KEY,
      channel_name TEXT NOT NULL UNIQUE,
      channel_display_name TEXT NOT NULL,
      channel_type TEXT NOT NULL,
      total_posts INTEGER NOT NULL CHECK (total_posts >= 0),
      first_post_date TEXT NOT NULL,
      last_post_date TEXT NOT NULL,
      avg_views REAL NOT NULL,
      avg_forwards REAL NOT NULL,
      total_media_posts INTEGER NOT NULL,
      avg_message_length REAL NOT NULL,
      media_percentage REAL NOT NULL CHECK (media_percentage BETWEEN 0 AND 100),
      engagement_rate REAL NOT NULL CHECK (engagement_rate >= 0),
      days_active INTEGER NOT NULL,
      posts_per_day REAL NOT NULL,
      activity_level TEXT NOT NULL
    );
  `;
}

export function messageFactDdl(table: string): string {
  return `
    CREATE TABLE ${table} (
      message_key TEXT PRIMARY KEY,
      message_id INTEGER NOT NULL,
      channel_key TEXT NOT NULL,
      date_key INTEGER,
      message_date TEXT NOT NULL,
      message_text TEXT NOT NULL,
      message_length INTEGER NOT NULL CHECK (message_length >= 0),
      views INTEGER NOT NULL,
      forwards INTEGER NOT NULL,
      has_media INTEGER NOT NULL CHECK (has_media IN (0, 1)),
      image_path TEXT,
      has_medical_keywords INTEGER NOT NULL CHECK (has_medical_keywords IN (0, 1)),
      detected_product TEXT,
      message_hour INTEGER NOT NULL CHECK (message_hour BETWEEN 0 AND 23),
      total_engagement INTEGER NOT NULL,
      forward_rate REAL NOT NULL,
      mentions_price INTEGER NOT NULL CHECK (mentions_price IN (0, 1)),
      mentions_availability INTEGER NOT NULL CHECK (mentions_availability IN (0, 1)),
      extracted_price_amount REAL,
      scraped_at TEXT
    );
  `;
}

export function detectionFactDdl(table: string): string {
  return `
    CREATE TABLE ${table} (
      detection_key TEXT PRIMARY KEY,
      message_id INTEGER NOT NULL,
      channel_name TEXT NOT NULL,
      image_path TEXT NOT NULL,
      detection_count INTEGER NOT NULL CHECK (detection_count > 0),
      image_category TEXT,
      processing_date TEXT,
      has_person INTEGER NOT NULL CHECK (has_person IN (0, 1)),
      has_container INTEGER NOT NULL CHECK (has_container IN (0, 1)),
      has_medical_tool INTEGER NOT NULL CHECK (has_medical_tool IN (0, 1)),
      object_count INTEGER NOT NULL,
      avg_confidence REAL,
      detected_objects_list TEXT,
      message_key TEXT,
      channel_key TEXT,
      date_key INTEGER,
      views INTEGER,
      forwards INTEGER,
      total_engagement INTEGER,
      forward_rate REAL NOT NULL,
      detailed_category TEXT NOT NULL
    );
  `;
}

export const MART_INDEXES_DDL = `
  CREATE INDEX IF NOT EXISTS idx_fct_messages_channel_date
    ON fct_messages(channel_key, date_key);

  CREATE INDEX IF NOT EXISTS idx_fct_messages_product
    ON fct_messages(detected_product);

  CREATE INDEX IF NOT EXISTS idx_fct_image_detections_message
    ON fct_image_detections(message_key);

  CREATE INDEX IF NOT EXISTS idx_fct_image_detections_category
    ON fct_image_detections(detailed_category);
`;
