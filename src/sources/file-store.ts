import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('file-store');

export const AGENCIES_FILE = 'agencies.json';
export const TITLES_SUMMARY_FILE = 'titles_summary.json';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Flat directory cache: `title_{n}_{date}.xml`, `agencies.json`, `titles_summary.json`
 */
export class FileDocumentStore {
  constructor(private dataDir: string) {}

  titlePath(titleNumber: number, date: string): string {
    return join(this.dataDir, `title_${titleNumber}_${date}.xml`);
  }

  async readTitle(titleNumber: number, date: string): Promise<Buffer | null> {
    return this.readOptional(this.titlePath(titleNumber, date));
  }

  async writeTitle(titleNumber: number, date: string, content: Buffer): Promise<void> {
    await this.write(this.titlePath(titleNumber, date), content);
    logger.info({ titleNumber, date, bytes: content.length }, 'Stored title XML');
  }

  async readJson(filename: string): Promise<unknown> {
    const content = await this.readOptional(join(this.dataDir, filename));
    if (content === null) {
      return null;
    }
    const parsed: unknown = JSON.parse(content.toString('utf-8'));
    return parsed;
  }

  async writeJson(filename: string, data: unknown): Promise<void> {
    await this.write(join(this.dataDir, filename), Buffer.from(JSON.stringify(data, null, 2), 'utf-8'));
    logger.info({ filename }, 'Stored JSON data');
  }

  private async readOptional(path: string): Promise<Buffer | null> {
    try {
      return await readFile(path);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  private async write(path: string, content: Buffer): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    await writeFile(path, content);
  }
}
