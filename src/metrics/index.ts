import { MetricsRecord } from '../types/index.js';
import { sha256Hex } from '../utils/hash.js';
import { fleschKincaidGrade } from './readability.js';

export { countSyllables, fleschKincaidGrade, textStatistics } from './readability.js';
export type { TextStatistics } from './readability.js';

/**
 * Count of whitespace-delimited tokens
 */
export function computeWordCount(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

export function computeChecksum(text: string): string {
  return sha256Hex(text);
}

export function computeComplexity(text: string): number | null {
  return fleschKincaidGrade(text);
}

/**
 * All three metrics over one text value
 */
export function computeMetrics(text: string): MetricsRecord {
  return {
    wordCount: computeWordCount(text),
    checksum: computeChecksum(text),
    complexity: computeComplexity(text),
  };
}
