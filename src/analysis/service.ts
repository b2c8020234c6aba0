import { z } from 'zod';
import {
  AgencyAnalysisReport,
  Config,
  HistoryRecord,
  IsoDateSchema,
  ValidationError,
} from '../types/index.js';
import { createCachedDocumentSource } from '../sources/cached-source.js';
import { DocumentSource } from '../sources/types.js';
import { AgencyAnalyzer } from './agency-analyzer.js';
import { analyzeOverTime } from './history.js';

const HistoryDatesSchema = z.array(IsoDateSchema).min(1).max(2);

function validateDate(date: string): string {
  const result = IsoDateSchema.safeParse(date);
  if (!result.success) {
    throw new ValidationError(`Invalid date "${date}": ${result.error.issues[0]?.message}`, result.error.issues);
  }
  return result.data;
}

/**
 * Entry point for presentation layers (API, CLI)
 */
export class RegulatoryMetricsService {
  private analyzer: AgencyAnalyzer;

  constructor(source: DocumentSource) {
    this.analyzer = new AgencyAnalyzer(source);
  }

  /**
   * Sorted display names of every agency in the reference feed
   */
  async listAgencies(): Promise<string[]> {
    const index = await this.analyzer.loadIndex();
    return index.listAgencies();
  }

  async analyze(date: string, agency?: string): Promise<AgencyAnalysisReport> {
    return this.analyzer.analyze(validateDate(date), agency ? [agency] : undefined);
  }

  async sections(agency: string, date: string): Promise<Record<string, string>> {
    return this.analyzer.extractSections(agency, validateDate(date));
  }

  async history(dates: readonly string[], agency?: string): Promise<Record<string, HistoryRecord>> {
    const result = HistoryDatesSchema.safeParse(dates);
    if (!result.success) {
      throw new ValidationError('History requires one or two YYYY-MM-DD dates', result.error.issues);
    }
    return analyzeOverTime(this.analyzer, result.data, agency ? [agency] : undefined);
  }
}

export function createMetricsService(config: Config): RegulatoryMetricsService {
  return new RegulatoryMetricsService(createCachedDocumentSource(config));
}
