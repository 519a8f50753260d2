import { describe, expect, it } from 'vitest';
import { channelKey, detectionKey, generateSurrogateKey, messageKey } from './surrogate-key.ts';

describe('generateSurrogateKey', () => {
  it('hashes values joined with a dash', () => {
    expect(generateSurrogateKey([101, 'addis_pharm_store'])).toBe('414bb9a340a9f4ec038d275fbab01e5d');
    expect(generateSurrogateKey([7, true])).toBe('fc29a491efac701a17fb4945139cc271');
  });

  it('encodes null with a fixed marker', () => {
    expect(generateSurrogateKey([null, 'x'])).toBe('22936c4891eee70345529d5f010c0e77');
  });

  it('is a pure function of its inputs', () => {
    expect(messageKey(101, 'addis_pharm_store')).toBe(messageKey(101, 'addis_pharm_store'));
    expect(messageKey(101, 'addis_pharm_store')).not.toBe(messageKey(102, 'addis_pharm_store'));
  });
});

describe('key helpers', () => {
  it('derive message, channel and detection keys', () => {
    expect(messageKey(101, 'addis_pharm_store')).toBe('414bb9a340a9f4ec038d275fbab01e5d');
    expect(channelKey('addis_pharm_store')).toBe('be6e24fc21931b449f1e7b20708dd862');
    expect(detectionKey(101, 'addis_pharm_store', 'images/101.jpg')).toBe('b2da097833f0842b4a619c116324d86e');
  });
});
