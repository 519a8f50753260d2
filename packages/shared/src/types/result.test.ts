import { describe, it, expect } from 'vitest';
import { ok, err } from './result.ts';

describe('Result type', () => {
  describe('ok() / err()', () => {
    it('creates an Ok result carrying rows', () => {
      const result = ok([{ channelName: 'addis_pharm_store' }]);
      expect(result.ok).toBe(true);
      expect(result.value).toEqual([{ channelName: 'addis_pharm_store' }]);
    });

    it('creates an Err result', () => {
      const result = err('raw table missing');
      expect(result.ok).toBe(false);
      expect(result.error).toBe('raw table missing');
    });
  });
});
