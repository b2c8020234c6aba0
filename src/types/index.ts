import { z } from 'zod';

// ============================================================
// Configuration Types
// ============================================================

export const ConfigSchema = z.object({
  dataDir: z.string().min(1),
  ecfr: z.object({
    baseUrl: z.string().url(),
    timeoutMs: z.number().min(1000).max(600000),
    retries: z.number().min(1).max(10),
    retryDelayMs: z.number().min(0).max(60000),
    userAgent: z.string(),
  }),
  analysis: z.object({
    defaultDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  }),
  server: z.object({
    port: z.number().min(1).max(65535),
  }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  logPretty: z.boolean(),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Effective dates are exchanged as plain `YYYY-MM-DD` strings; they double as
 * storage keys, so they are validated rather than parsed into `Date`.
 */
export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must use the YYYY-MM-DD format')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00Z`);
    return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
  }, 'Date is not a valid calendar date');

// ============================================================
// Document Tree Types
// ============================================================

/**
 * One element with the text that precedes its first child element. Text after
 * a child element (the child's tail) is not kept.
 */
export interface ElementNode {
  label: string;
  attributes: Record<string, string>;
  text: string | null;
  children: ElementNode[];
}

/**
 * One regulation title at one effective date
 */
export interface TitleDocument {
  titleNumber: number;
  date: string;
  root: ElementNode;
}

export interface ChapterNode {
  /** Upper-cased chapter code from the `N` attribute */
  code: string;
  heading?: string;
  node: ElementNode;
}

/**
 * Chapter codes an extraction is scoped to; `null` means the whole title
 */
export type ChapterFilter = ReadonlySet<string> | null;

// ============================================================
// Reference Types
// ============================================================

export interface ReferenceEntry {
  agencyName: string;
  titleNumber: number;
  chapter: string | null;
}

export interface AgencyReferences {
  name: string;
  references: ReferenceEntry[];
}

// ============================================================
// Metrics Types
// ============================================================

export interface MetricsRecord {
  wordCount: number;
  checksum: string;
  complexity: number | null;
}

export interface AgencyMetrics extends MetricsRecord {
  agencyName: string;
  titlesCount: number;
  titlesAnalyzed: number[];
}

export type TitleOutcome =
  | { titleNumber: number; status: 'analyzed'; wordCount: number }
  | { titleNumber: number; status: 'no_text' }
  | { titleNumber: number; status: 'fetch_failed'; reason: string }
  | { titleNumber: number; status: 'parse_failed'; reason: string };

export interface AgencyAnalysisReport {
  date: string;
  agencies: Record<string, AgencyMetrics>;
  outcomes: Record<string, TitleOutcome[]>;
}

export interface MetricsDelta {
  wordCountDelta: number;
  complexityDelta: number | null;
}

export interface HistoryRecord {
  agencyName: string;
  snapshots: Record<string, MetricsRecord>;
  delta?: MetricsDelta;
}

// ============================================================
// Error Types
// ============================================================

export class MetricsError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'MetricsError';
  }
}

export class ParseError extends MetricsError {
  constructor(message: string, details?: unknown) {
    super(message, 'PARSE_ERROR', details);
    this.name = 'ParseError';
  }
}

export class FetchError extends MetricsError {
  constructor(message: string, details?: unknown) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

export class ResolutionError extends MetricsError {
  constructor(agencyName: string) {
    super(`No such agency: ${agencyName}`, 'RESOLUTION_ERROR', { agencyName });
    this.name = 'ResolutionError';
  }
}

export class MetadataError extends MetricsError {
  constructor(message: string, details?: unknown) {
    super(message, 'METADATA_ERROR', details);
    this.name = 'MetadataError';
  }
}

export class ValidationError extends MetricsError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}
