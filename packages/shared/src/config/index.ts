import { z } from 'zod/v4';
import { AppError } from '../errors/app-error.ts';
import { LOG_LEVELS, type LogLevel } from '../logger/index.ts';
import { err, ok, type Result } from '../types/result.ts';

export const DEFAULT_DB_PATH = 'data/warehouse.db';
export const DEFAULT_RAW_MESSAGES_DIR = 'data/raw/telegram_messages';
export const DEFAULT_DATE_DIM_START = '2024-01-01';
export const DEFAULT_DATE_DIM_END = '2026-12-31';

const WarehouseEnvSchema = z
  .object({
    WAREHOUSE_DB_PATH: z.string().min(1).default(DEFAULT_DB_PATH),
    WAREHOUSE_RAW_MESSAGES_DIR: z.string().min(1).default(DEFAULT_RAW_MESSAGES_DIR),
    WAREHOUSE_DETECTIONS_PATH: z.string().min(1).optional(),
    WAREHOUSE_DATE_DIM_START: z.iso.date().default(DEFAULT_DATE_DIM_START),
    WAREHOUSE_DATE_DIM_END: z.iso.date().default(DEFAULT_DATE_DIM_END),
    WAREHOUSE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  })
  .refine((value) => value.WAREHOUSE_DATE_DIM_START <= value.WAREHOUSE_DATE_DIM_END, {
    message: 'WAREHOUSE_DATE_DIM_START must not be after WAREHOUSE_DATE_DIM_END',
    path: ['WAREHOUSE_DATE_DIM_START'],
  });

export interface WarehouseConfig {
  dbPath: string;
  rawMessagesDir: string;
  detectionsPath: string | null;
  dateDimension: {
    startDate: string;
    endDate: string;
  };
  logLevel: LogLevel;
}

export type EnvSource = Record<string, string | undefined>;

function dropBlankValues(env: EnvSource): EnvSource {
  const cleaned: EnvSource = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

export function loadWarehouseConfig(env: EnvSource = process.env): Result<WarehouseConfig, AppError> {
  const parsed = WarehouseEnvSchema.safeParse(dropBlankValues(env));
  if (!parsed.success) {
    return err(
      AppError.create(
        'CONFIG_INVALID',
        'Warehouse configuration is invalid.',
        'fatal',
        { issues: parsed.error.issues },
      ),
    );
  }

  return ok({
    dbPath: parsed.data.WAREHOUSE_DB_PATH,
    rawMessagesDir: parsed.data.WAREHOUSE_RAW_MESSAGES_DIR,
    detectionsPath: parsed.data.WAREHOUSE_DETECTIONS_PATH ?? null,
    dateDimension: {
      startDate: parsed.data.WAREHOUSE_DATE_DIM_START,
      endDate: parsed.data.WAREHOUSE_DATE_DIM_END,
    },
    logLevel: parsed.data.WAREHOUSE_LOG_LEVEL,
  });
}
