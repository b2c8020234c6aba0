import {
  AgencyAnalysisReport,
  AgencyMetrics,
  ParseError,
  TitleDocument,
  TitleOutcome,
} from '../types/index.js';
import { parseTitleDocument } from '../ingestion/xml-tree.js';
import { extractSections, extractText } from '../ingestion/title-parser.js';
import { computeChecksum, computeComplexity, computeWordCount } from '../metrics/index.js';
import { ReferenceIndex } from '../references/resolver.js';
import { DocumentSource } from '../sources/types.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('agency-analyzer');

type TitleLoadResult =
  | { ok: true; document: TitleDocument }
  | { ok: false; status: 'fetch_failed' | 'parse_failed'; reason: string };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Load and parse one title, fetching it on a cache miss
 */
async function loadTitle(source: DocumentSource, titleNumber: number, date: string): Promise<TitleLoadResult> {
  let raw: Buffer | null;
  try {
    raw = await source.getDocument(titleNumber, date);
    if (raw === null) {
      const fetched = await source.fetchDocument(titleNumber, date);
      if (!fetched) {
        return { ok: false, status: 'fetch_failed', reason: 'Download failed' };
      }
      raw = await source.getDocument(titleNumber, date);
    }
  } catch (error) {
    return { ok: false, status: 'fetch_failed', reason: errorMessage(error) };
  }

  if (raw === null) {
    return { ok: false, status: 'fetch_failed', reason: 'Document missing after download' };
  }

  try {
    const document = await parseTitleDocument(raw, titleNumber, date);
    return { ok: true, document };
  } catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, status: 'parse_failed', reason: error.message };
    }
    throw error;
  }
}

interface AgencyAccumulator {
  name: string;
  texts: string[];
  titlesAnalyzed: number[];
  outcomes: TitleOutcome[];
  wordCount: number;
}

/**
 * Aggregates the regulatory text each agency is responsible for into metrics
 */
export class AgencyAnalyzer {
  constructor(private source: DocumentSource) {}

  async loadIndex(): Promise<ReferenceIndex> {
    return ReferenceIndex.fromFeed(await this.source.getReferenceMetadata());
  }

  /**
   * Metrics per agency for one date. Agencies default to every agency with
   * references; agencies without any extracted text are left out.
   *
   * Titles are visited once each in ascending order, and every agency that
   * references a title reads it before the next title is loaded.
   */
  async analyze(date: string, agencies?: readonly string[]): Promise<AgencyAnalysisReport> {
    const index = await this.loadIndex();

    const names = Array.from(new Set(agencies ?? index.agenciesWithReferences()));
    names.forEach((name) => index.assertKnown(name));

    const accumulators: AgencyAccumulator[] = [];
    const readersByTitle = new Map<number, AgencyAccumulator[]>();

    for (const name of names) {
      const accumulator: AgencyAccumulator = { name, texts: [], titlesAnalyzed: [], outcomes: [], wordCount: 0 };
      accumulators.push(accumulator);
      for (const titleNumber of index.titlesFor(name)) {
        const readers = readersByTitle.get(titleNumber) ?? [];
        readers.push(accumulator);
        readersByTitle.set(titleNumber, readers);
      }
    }

    const titles = Array.from(readersByTitle.keys()).sort((a, b) => a - b);
    for (const titleNumber of titles) {
      const loaded = await loadTitle(this.source, titleNumber, date);
      for (const accumulator of readersByTitle.get(titleNumber) ?? []) {
        this.readTitle(accumulator, titleNumber, loaded, index);
      }
    }

    const report: AgencyAnalysisReport = { date, agencies: {}, outcomes: {} };
    for (const accumulator of accumulators) {
      report.outcomes[accumulator.name] = accumulator.outcomes;
      const metrics = this.toMetrics(accumulator);
      if (metrics) {
        report.agencies[accumulator.name] = metrics;
      } else {
        logger.info({ agency: accumulator.name, date }, 'No data for agency on date');
      }
    }

    logger.info(
      { date, requested: names.length, titles: titles.length, withData: Object.keys(report.agencies).length },
      'Agency analysis complete'
    );

    return report;
  }

  private readTitle(
    accumulator: AgencyAccumulator,
    titleNumber: number,
    loaded: TitleLoadResult,
    index: ReferenceIndex
  ): void {
    const name = accumulator.name;

    if (!loaded.ok) {
      logger.warn({ agency: name, titleNumber, status: loaded.status, reason: loaded.reason }, 'Skipping title');
      accumulator.outcomes.push({ titleNumber, status: loaded.status, reason: loaded.reason });
      return;
    }

    const chapters = index.chaptersFor(name, titleNumber);
    const text = extractText(loaded.document, chapters);

    logger.debug(
      {
        agency: name,
        titleNumber,
        chapters: chapters ? Array.from(chapters) : 'all',
        textLength: text.length,
      },
      'Extracted title text'
    );

    if (text.trim().length === 0) {
      accumulator.outcomes.push({ titleNumber, status: 'no_text' });
      return;
    }

    const wordCount = computeWordCount(text);
    accumulator.wordCount += wordCount;
    accumulator.texts.push(text);
    accumulator.titlesAnalyzed.push(titleNumber);
    accumulator.outcomes.push({ titleNumber, status: 'analyzed', wordCount });
  }

  private toMetrics(accumulator: AgencyAccumulator): AgencyMetrics | null {
    if (accumulator.texts.length === 0) {
      return null;
    }

    const combined = accumulator.texts.join(' ');
    const checksum = computeChecksum(combined);

    logger.debug({ agency: accumulator.name, checksum: checksum.substring(0, 12) }, 'Computed agency checksum');

    return {
      agencyName: accumulator.name,
      wordCount: accumulator.wordCount,
      checksum,
      complexity: computeComplexity(combined),
      titlesCount: accumulator.titlesAnalyzed.length,
      titlesAnalyzed: accumulator.titlesAnalyzed,
    };
  }

  /**
   * Chapter heading to chapter text for every chapter the agency is scoped to,
   * across all of its titles. Titles that cannot be loaded are skipped.
   */
  async extractSections(name: string, date: string): Promise<Record<string, string>> {
    const index = await this.loadIndex();
    index.assertKnown(name);
    const sections: Record<string, string> = {};

    for (const titleNumber of index.titlesFor(name)) {
      const loaded = await loadTitle(this.source, titleNumber, date);
      if (!loaded.ok) {
        logger.warn(
          { agency: name, titleNumber, status: loaded.status, reason: loaded.reason },
          'Skipping title'
        );
        continue;
      }

      const chapterSections = extractSections(loaded.document, index.chaptersFor(name, titleNumber));
      for (const [heading, text] of chapterSections) {
        if (text.trim().length > 0) {
          sections[heading] = text;
        }
      }
    }

    return sections;
  }
}
