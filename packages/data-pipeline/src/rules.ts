import type { ActivityLevel, ChannelType, DetailedImageCategory } from '@medwarehouse/core';

// Every list below is evaluated in order; reordering changes output.

export const NO_TEXT_SENTINEL = 'NO_TEXT';

export const MEDICAL_KEYWORDS: readonly string[] = [
  'paracetamol',
  'antibiotic',
  'vaccine',
  'medicine',
  'drug',
  'pill',
  'tablet',
  'injection',
  'syrup',
];

export const PRODUCT_NAMES: readonly string[] = [
  'paracetamol',
  'ibuprofen',
  'amoxicillin',
  'ceftriaxone',
  'metformin',
  'insulin',
  'ventolin',
];

export const PRICE_KEYWORDS: readonly string[] = ['price', 'cost', 'birr', 'etb'];
export const AVAILABILITY_KEYWORDS: readonly string[] = ['stock', 'available'];

/** Leading amount followed by a currency token; the first match wins. */
export const PRICE_PATTERN = /(\d+(?:\.\d+)?)\s*(?:birr|etb|br)/i;

export interface SubstringRule<T> {
  readonly anyOf: readonly string[];
  readonly value: T;
}

export const CHANNEL_TYPE_RULES: ReadonlyArray<SubstringRule<ChannelType>> = [
  { anyOf: ['chemed', 'pharm'], value: 'Pharmaceutical' },
  { anyOf: ['cosmetic', 'lobelia'], value: 'Cosmetics' },
  { anyOf: ['medical', 'health'], value: 'Medical' },
];
export const DEFAULT_CHANNEL_TYPE: ChannelType = 'Other';

export const CHANNEL_DISPLAY_NAME_RULES: ReadonlyArray<SubstringRule<string>> = [
  { anyOf: ['chemed'], value: 'CheMed' },
  { anyOf: ['lobelia'], value: 'Lobelia Cosmetics' },
  { anyOf: ['tikvah'], value: 'Tikvah Pharma' },
  { anyOf: ['ethiopharm'], value: 'EthioPharm' },
  { anyOf: ['addis'], value: 'Addis Pharmacy' },
  { anyOf: ['ethiomed'], value: 'Ethio Medical' },
];

export const ACTIVITY_LEVEL_THRESHOLDS: ReadonlyArray<{ minPosts: number; level: ActivityLevel }> = [
  { minPosts: 1000, level: 'Very High' },
  { minPosts: 500, level: 'High' },
  { minPosts: 100, level: 'Medium' },
];
export const DEFAULT_ACTIVITY_LEVEL: ActivityLevel = 'Low';

export const PERSON_LABELS: readonly string[] = ['person'];
export const CONTAINER_LABELS: readonly string[] = ['bottle', 'cup', 'bowl'];
export const MEDICAL_TOOL_LABELS: readonly string[] = ['scissors', 'knife'];

export interface DetectionFlags {
  hasPerson: boolean;
  hasContainer: boolean;
  hasMedicalTool: boolean;
}

export const DETECTION_CATEGORY_RULES: ReadonlyArray<{
  readonly matches: (flags: DetectionFlags) => boolean;
  readonly category: DetailedImageCategory;
}> = [
  { matches: (flags) => flags.hasPerson && flags.hasContainer, category: 'promotional' },
  { matches: (flags) => flags.hasContainer && !flags.hasPerson, category: 'product_display' },
  { matches: (flags) => flags.hasPerson && !flags.hasContainer, category: 'lifestyle' },
  // Reached only without person and container, so a tool next to either never lands here.
  { matches: (flags) => flags.hasMedicalTool, category: 'medical_tools' },
];
export const DEFAULT_DETECTION_CATEGORY: DetailedImageCategory = 'other';

export function firstMatchingRule<T>(
  text: string,
  rules: ReadonlyArray<SubstringRule<T>>,
): T | null {
  for (const rule of rules) {
    if (rule.anyOf.some((needle) => text.includes(needle))) {
      return rule.value;
    }
  }
  return null;
}

export function containsAnyKeyword(text: string, keywords: readonly string[]): boolean {
  const lowered = text.toLowerCase();
  return keywords.some((keyword) => lowered.includes(keyword));
}

export function classifyChannelType(channelName: string): ChannelType {
  return firstMatchingRule(channelName, CHANNEL_TYPE_RULES) ?? DEFAULT_CHANNEL_TYPE;
}

export function resolveChannelDisplayName(channelName: string): string {
  return firstMatchingRule(channelName, CHANNEL_DISPLAY_NAME_RULES) ?? channelName;
}

export function classifyActivityLevel(totalPosts: number): ActivityLevel {
  for (const threshold of ACTIVITY_LEVEL_THRESHOLDS) {
    if (totalPosts >= threshold.minPosts) {
      return threshold.level;
    }
  }
  return DEFAULT_ACTIVITY_LEVEL;
}

export function classifyDetection(flags: DetectionFlags): DetailedImageCategory {
  for (const rule of DETECTION_CATEGORY_RULES) {
    if (rule.matches(flags)) {
      return rule.category;
    }
  }
  return DEFAULT_DETECTION_CATEGORY;
}

/** First product in list order that appears anywhere in the text, not the leftmost occurrence. */
export function detectProduct(text: string): string | null {
  const lowered = text.toLowerCase();
  for (const product of PRODUCT_NAMES) {
    if (lowered.includes(product)) {
      return product;
    }
  }
  return null;
}

export function extractPriceAmount(text: string): number | null {
  const match = PRICE_PATTERN.exec(text);
  const amount = match?.[1];
  if (amount === undefined) {
    return null;
  }
  return roundTo2(Number.parseFloat(amount));
}

export function roundTo2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/** `numerator / denominator * 100`, rounded to 2 decimals; 0 when the denominator is not positive. */
export function percentage(numerator: number, denominator: number): number {
  if (denominator <= 0) {
    return 0;
  }
  return roundTo2((numerator / denominator) * 100);
}
