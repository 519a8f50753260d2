import { describe, expect, it } from 'vitest';
import { loadWarehouseConfig } from './index.ts';

describe('loadWarehouseConfig', () => {
  it('applies defaults for an empty environment', () => {
    const result = loadWarehouseConfig({});

    expect(result).toEqual({
      ok: true,
      value: {
        dbPath: 'data/warehouse.db',
        rawMessagesDir: 'data/raw/telegram_messages',
        detectionsPath: null,
        dateDimension: {
          startDate: '2024-01-01',
          endDate: '2026-12-31',
        },
        logLevel: 'info',
      },
    });
  });

  it('reads explicit values and treats blank ones as unset', () => {
    const result = loadWarehouseConfig({
      WAREHOUSE_DB_PATH: '/tmp/test-warehouse.db',
      WAREHOUSE_DETECTIONS_PATH: '  ',
      WAREHOUSE_DATE_DIM_START: '2025-01-01',
      WAREHOUSE_DATE_DIM_END: '2025-12-31',
      WAREHOUSE_LOG_LEVEL: 'debug',
    });

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value.dbPath).toBe('/tmp/test-warehouse.db');
    expect(result.value.detectionsPath).toBeNull();
    expect(result.value.dateDimension).toEqual({ startDate: '2025-01-01', endDate: '2025-12-31' });
    expect(result.value.logLevel).toBe('debug');
  });

  it('rejects an unknown log level', () => {
    const result = loadWarehouseConfig({ WAREHOUSE_LOG_LEVEL: 'verbose' });

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe('CONFIG_INVALID');
    expect(result.error.severity).toBe('fatal');
  });

  it('rejects a calendar range that ends before it starts', () => {
    const result = loadWarehouseConfig({
      WAREHOUSE_DATE_DIM_START: '2026-01-01',
      WAREHOUSE_DATE_DIM_END: '2025-01-01',
    });

    expect(result.ok).toBe(false);
  });

  it('rejects a malformed date', () => {
    const result = loadWarehouseConfig({ WAREHOUSE_DATE_DIM_END: '2026-13-45' });
    expect(result.ok).toBe(false);
  });
});
