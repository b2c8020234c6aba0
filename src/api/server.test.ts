import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

// Import after mocks are set up
import { createApiServer } from './server.js';
import { RegulatoryMetricsService } from '../analysis/service.js';
import { computeChecksum, computeComplexity } from '../metrics/index.js';
import { createMockDocumentSource, documentKey } from '../../tests/helpers/mock-document-source.js';
import {
  CHAPTER_TEXT,
  FIXTURE_DATE,
  LATER_DATE,
  loadAgenciesFeed,
  loadTitleXml,
} from '../../tests/helpers/test-fixtures.js';

async function createApp(feed?: unknown): Promise<Express> {
  const { source } = createMockDocumentSource({
    feed: feed ?? (await loadAgenciesFeed()),
    stored: {
      [documentKey(2, FIXTURE_DATE)]: await loadTitleXml(2),
      [documentKey(5, FIXTURE_DATE)]: await loadTitleXml(5),
      [documentKey(7, FIXTURE_DATE)]: await loadTitleXml(7),
      [documentKey(5, LATER_DATE)]: '<ECFR><P>Records are public and free.</P></ECFR>',
    },
  });
  return createApiServer(new RegulatoryMetricsService(source), FIXTURE_DATE).app;
}

describe('API Server', () => {
  let app: Express;

  beforeEach(async () => {
    vi.clearAllMocks();
    app = await createApp();
  });

  describe('GET /health', () => {
    it('should return health status', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'healthy' });
    });
  });

  describe('GET /api/agencies', () => {
    it('should list agency names sorted', async () => {
      const response = await request(app).get('/api/agencies');

      expect(response.status).toBe(200);
      expect(response.body).toEqual([
        'Advisory Council',
        'Agriculture Department',
        'Food and Nutrition Service',
        'Office of Records',
      ]);
    });

    it('should return 502 when the reference feed is malformed', async () => {
      const badApp = await createApp({ agencies: 'oops' });

      const response = await request(badApp).get('/api/agencies');

      expect(response.status).toBe(502);
      expect(response.body.code).toBe('METADATA_ERROR');
    });
  });

  describe('GET /api/wordcount', () => {
    it('should return word counts for every agency on the default date', async () => {
      const response = await request(app).get('/api/wordcount');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        'Agriculture Department': 20,
        'Food and Nutrition Service': 12,
        'Office of Records': 6,
      });
    });

    it('should filter to one agency', async () => {
      const response = await request(app)
        .get('/api/wordcount')
        .query({ agency: 'Office of Records', date: FIXTURE_DATE });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ 'Office of Records': 6 });
    });

    it('should return an empty object when nothing is available for the date', async () => {
      const response = await request(app)
        .get('/api/wordcount')
        .query({ agency: 'Agriculture Department', date: LATER_DATE });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({});
    });

    it('should return 404 for an unknown agency', async () => {
      const response = await request(app).get('/api/wordcount').query({ agency: 'Bureau of Nothing' });

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        error: 'No such agency: Bureau of Nothing',
        code: 'RESOLUTION_ERROR',
      });
    });

    it('should return 400 for an invalid date', async () => {
      const response = await request(app).get('/api/wordcount').query({ date: '2024/07/01' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('GET /api/checksums', () => {
    it('should return the checksum of each agency text', async () => {
      const response = await request(app)
        .get('/api/checksums')
        .query({ agency: 'Food and Nutrition Service' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        'Food and Nutrition Service': computeChecksum(CHAPTER_TEXT.title7ChapterII),
      });
    });
  });

  describe('GET /api/complexity', () => {
    it('should return the grade level of each agency text', async () => {
      const response = await request(app).get('/api/complexity').query({ agency: 'Office of Records' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ 'Office of Records': computeComplexity(CHAPTER_TEXT.title5) });
    });
  });

  describe('GET /api/agency_sections', () => {
    it('should return chapter sections for an agency', async () => {
      const response = await request(app)
        .get('/api/agency_sections')
        .query({ agency: 'Food and Nutrition Service', date: FIXTURE_DATE });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        agency: 'Food and Nutrition Service',
        sections: { 'CHAPTER II—FOOD AND NUTRITION SERVICE': CHAPTER_TEXT.title7ChapterII },
      });
    });

    it('should return 400 when agency or date is missing', async () => {
      const response = await request(app).get('/api/agency_sections').query({ agency: 'Office of Records' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('agency and date are required');
    });

    it('should return 404 when the agency has no chapter sections', async () => {
      const response = await request(app)
        .get('/api/agency_sections')
        .query({ agency: 'Office of Records', date: FIXTURE_DATE });

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('No sections found for this agency.');
    });
  });

  describe('GET /api/historical', () => {
    it('should compare an agency across two dates', async () => {
      const response = await request(app).get(
        `/api/historical?agency=Office%20of%20Records&dates=${FIXTURE_DATE}&dates=${LATER_DATE}`
      );

      expect(response.status).toBe(200);
      const record = response.body['Office of Records'];
      expect(record.agencyName).toBe('Office of Records');
      expect(record.snapshots[FIXTURE_DATE].wordCount).toBe(6);
      expect(record.snapshots[LATER_DATE].wordCount).toBe(5);
      expect(record.delta.wordCountDelta).toBe(-1);
    });

    it('should return 400 without an agency', async () => {
      const response = await request(app).get(`/api/historical?dates=${FIXTURE_DATE}`);

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Agency must be specified.');
    });

    it('should return 400 without dates', async () => {
      const response = await request(app).get('/api/historical').query({ agency: 'Office of Records' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('Error handling', () => {
    it('should return 500 without internals for unexpected errors', async () => {
      const { source } = createMockDocumentSource({ feed: await loadAgenciesFeed() });
      source.getReferenceMetadata.mockRejectedValue(new Error('disk exploded'));
      const failingApp = createApiServer(new RegulatoryMetricsService(source), FIXTURE_DATE).app;

      const response = await request(failingApp).get('/api/agencies');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ error: 'Internal server error' });
    });
  });
});
