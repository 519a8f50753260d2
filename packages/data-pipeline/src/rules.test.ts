import { describe, expect, it } from 'vitest';
import {
  AVAILABILITY_KEYWORDS,
  classifyActivityLevel,
  classifyChannelType,
  classifyDetection,
  containsAnyKeyword,
  detectProduct,
  extractPriceAmount,
  percentage,
  resolveChannelDisplayName,
} from './rules.ts';

describe('channel rules', () => {
  it('classifies channel type by the first matching rule', () => {
    expect(classifyChannelType('addis_pharm_store')).toBe('Pharmaceutical');
    expect(classifyChannelType('chemed')).toBe('Pharmaceutical');
    expect(classifyChannelType('lobelia_cosmetics')).toBe('Cosmetics');
    expect(classifyChannelType('ethio_health_news')).toBe('Medical');
    expect(classifyChannelType('daily_news')).toBe('Other');
  });

  it('resolves display names and falls back to the channel name', () => {
    expect(resolveChannelDisplayName('chemed_telegram')).toBe('CheMed');
    expect(resolveChannelDisplayName('tikvahpharma')).toBe('Tikvah Pharma');
    expect(resolveChannelDisplayName('addis_pharm_store')).toBe('Addis Pharmacy');
    expect(resolveChannelDisplayName('unknown_channel')).toBe('unknown_channel');
  });

  it('buckets activity level by total posts', () => {
    expect(classifyActivityLevel(1200)).toBe('Very High');
    expect(classifyActivityLevel(1000)).toBe('Very High');
    expect(classifyActivityLevel(999)).toBe('High');
    expect(classifyActivityLevel(500)).toBe('High');
    expect(classifyActivityLevel(100)).toBe('Medium');
    expect(classifyActivityLevel(99)).toBe('Low');
    expect(classifyActivityLevel(0)).toBe('Low');
  });
});

describe('classifyDetection', () => {
  it('keeps the fixed precedence order', () => {
    expect(classifyDetection({ hasPerson: true, hasContainer: true, hasMedicalTool: true })).toBe('promotional');
    expect(classifyDetection({ hasPerson: false, hasContainer: true, hasMedicalTool: true })).toBe('product_display');
    expect(classifyDetection({ hasPerson: true, hasContainer: false, hasMedicalTool: true })).toBe('lifestyle');
    expect(classifyDetection({ hasPerson: false, hasContainer: false, hasMedicalTool: true })).toBe('medical_tools');
    expect(classifyDetection({ hasPerson: false, hasContainer: false, hasMedicalTool: false })).toBe('other');
  });
});

describe('message text rules', () => {
  it('detects the first product in list order', () => {
    expect(detectProduct('Fresh Ibuprofen and PARACETAMOL')).toBe('paracetamol');
    expect(detectProduct('Insulin pens')).toBe('insulin');
    expect(detectProduct('Vitamins only')).toBeNull();
  });

  it('matches keywords case-insensitively', () => {
    expect(containsAnyKeyword('STOCK update', AVAILABILITY_KEYWORDS)).toBe(true);
    expect(containsAnyKeyword('sold out', AVAILABILITY_KEYWORDS)).toBe(false);
  });

  it('extracts the first price followed by a currency token', () => {
    expect(extractPriceAmount('Paracetamol 50 birr available now')).toBe(50);
    expect(extractPriceAmount('Now 120.5 ETB, was 150 birr')).toBe(120.5);
    expect(extractPriceAmount('only 300br')).toBe(300);
    expect(extractPriceAmount('Syrup 50 birrs each')).toBe(50);
    expect(extractPriceAmount('Pack of 12 bottles')).toBeNull();
    expect(extractPriceAmount('price on request')).toBeNull();
  });
});

describe('percentage', () => {
  it('rounds to two decimals and guards a zero denominator', () => {
    expect(percentage(1, 3)).toBe(33.33);
    expect(percentage(2, 3)).toBe(66.67);
    expect(percentage(5, 0)).toBe(0);
  });
});
