import { Config, MetadataError } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { EcfrClient, createEcfrClient } from './ecfr-client.js';
import { AGENCIES_FILE, FileDocumentStore, TITLES_SUMMARY_FILE } from './file-store.js';
import { DocumentSource } from './types.js';

const logger = createChildLogger('cached-source');

/**
 * Document source backed by the local data directory, downloading from eCFR
 * on a cache miss
 */
export class CachedDocumentSource implements DocumentSource {
  private inFlight = new Map<string, Promise<boolean>>();

  constructor(
    private store: FileDocumentStore,
    private client: EcfrClient
  ) {}

  async getDocument(titleNumber: number, date: string): Promise<Buffer | null> {
    return this.store.readTitle(titleNumber, date);
  }

  /**
   * Download a title into the store. Concurrent calls for the same title and
   * date share one request.
   */
  fetchDocument(titleNumber: number, date: string): Promise<boolean> {
    const key = `${titleNumber}:${date}`;
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const request = this.download(titleNumber, date).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);
    return request;
  }

  async getReferenceMetadata(): Promise<unknown> {
    return this.loadJson(AGENCIES_FILE, () => this.client.fetchAgencies());
  }

  async getTitlesSummary(): Promise<unknown> {
    return this.loadJson(TITLES_SUMMARY_FILE, () => this.client.fetchTitlesSummary());
  }

  /**
   * Re-download the agencies feed even when a copy is stored
   */
  async refreshReferenceMetadata(): Promise<unknown> {
    const feed = await this.client.fetchAgencies();
    await this.store.writeJson(AGENCIES_FILE, feed);
    return feed;
  }

  private async download(titleNumber: number, date: string): Promise<boolean> {
    logger.info({ titleNumber, date }, 'Title XML not found locally, fetching from eCFR');
    try {
      const content = await this.client.fetchTitleXml(titleNumber, date);
      await this.store.writeTitle(titleNumber, date, content);
      return true;
    } catch (error) {
      logger.warn(
        { titleNumber, date, error: error instanceof Error ? error.message : String(error) },
        'Failed to download title XML'
      );
      return false;
    }
  }

  private async loadJson(filename: string, fetchRemote: () => Promise<unknown>): Promise<unknown> {
    try {
      const stored = await this.store.readJson(filename);
      if (stored !== null) {
        return stored;
      }

      logger.info({ filename }, 'Reference data not found locally, fetching from eCFR');
      const data = await fetchRemote();
      await this.store.writeJson(filename, data);
      return data;
    } catch (error) {
      throw new MetadataError(
        `Failed to load ${filename}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }
}

export function createCachedDocumentSource(config: Config): CachedDocumentSource {
  return new CachedDocumentSource(new FileDocumentStore(config.dataDir), createEcfrClient(config.ecfr));
}
