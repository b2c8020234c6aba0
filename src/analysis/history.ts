import { HistoryRecord, MetricsDelta, MetricsRecord, ValidationError } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { AgencyAnalyzer } from './agency-analyzer.js';

const logger = createChildLogger('history');

/**
 * Change from `start` to `end`. Complexity change is `null` unless both sides
 * have a complexity score.
 */
export function computeDelta(start: MetricsRecord, end: MetricsRecord): MetricsDelta {
  return {
    wordCountDelta: end.wordCount - start.wordCount,
    complexityDelta:
      start.complexity !== null && end.complexity !== null ? end.complexity - start.complexity : null,
  };
}

/**
 * Run one analysis per date and collect each agency's metrics by date. With
 * exactly two dates, agencies that have metrics on both also get a delta.
 */
export async function analyzeOverTime(
  analyzer: AgencyAnalyzer,
  dates: readonly string[],
  agencies?: readonly string[]
): Promise<Record<string, HistoryRecord>> {
  if (dates.length === 0) {
    throw new ValidationError('At least one date is required');
  }

  const history: Record<string, HistoryRecord> = {};

  for (const date of dates) {
    const report = await analyzer.analyze(date, agencies);

    for (const [name, metrics] of Object.entries(report.agencies)) {
      const record = history[name] ?? { agencyName: metrics.agencyName, snapshots: {} };
      record.snapshots[date] = {
        wordCount: metrics.wordCount,
        checksum: metrics.checksum,
        complexity: metrics.complexity,
      };
      history[name] = record;
    }
  }

  if (dates.length === 2) {
    const [start, end] = dates;
    for (const record of Object.values(history)) {
      const startMetrics = record.snapshots[start];
      const endMetrics = record.snapshots[end];
      if (startMetrics && endMetrics) {
        record.delta = computeDelta(startMetrics, endMetrics);
      }
    }
  }

  logger.info({ dates, agencies: Object.keys(history).length }, 'Historical comparison complete');

  return history;
}
