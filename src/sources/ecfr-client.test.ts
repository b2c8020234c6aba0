import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EcfrClient } from './ecfr-client.js';
import { FetchError } from '../types/index.js';

const BASE_URL = 'https://ecfr.test';

describe('EcfrClient', () => {
  const fetchMock = vi.fn();
  let client: EcfrClient;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    client = new EcfrClient({ baseUrl: BASE_URL, retries: 3, retryDelayMs: 0, timeoutMs: 5000 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should build the versioned title URL', () => {
    expect(client.titleXmlUrl(7, '2024-07-01')).toBe(
      'https://ecfr.test/api/versioner/v1/full/2024-07-01/title-7.xml'
    );
  });

  it('should download title XML as a buffer', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<ECFR/>', { status: 200 }));

    const content = await client.fetchTitleXml(7, '2024-07-01');

    expect(content.toString('utf-8')).toBe('<ECFR/>');
    expect(fetchMock).toHaveBeenCalledWith(
      'https://ecfr.test/api/versioner/v1/full/2024-07-01/title-7.xml',
      expect.objectContaining({
        headers: { 'User-Agent': 'regulatory-metrics/1.0', Accept: 'application/xml' },
      })
    );
  });

  it('should parse the agencies feed', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ agencies: [] }), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      })
    );

    expect(await client.fetchAgencies()).toEqual({ agencies: [] });
    expect(fetchMock.mock.calls[0][0]).toBe('https://ecfr.test/api/admin/v1/agencies.json');
  });

  it('should retry server errors and succeed', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('busy', { status: 503, statusText: 'Service Unavailable' }))
      .mockResolvedValueOnce(new Response('<ECFR/>', { status: 200 }));

    const content = await client.fetchTitleXml(3, '2024-07-01');

    expect(content.length).toBe(7);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should give up after the configured attempts', async () => {
    fetchMock.mockRejectedValue(new Error('connection reset'));

    await expect(client.fetchTitleXml(3, '2024-07-01')).rejects.toThrow(
      'Failed to fetch https://ecfr.test/api/versioner/v1/full/2024-07-01/title-3.xml after 3 attempts: connection reset'
    );
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('should not retry a missing title', async () => {
    fetchMock.mockResolvedValue(new Response('not found', { status: 404 }));

    await expect(client.fetchTitleXml(99, '2024-07-01')).rejects.toThrow(FetchError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should reject invalid JSON', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

    await expect(client.fetchTitlesSummary()).rejects.toThrow(FetchError);
  });
});
