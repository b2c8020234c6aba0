import {
  AgencyReferences,
  ChapterFilter,
  MetadataError,
  ReferenceEntry,
  ResolutionError,
} from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { AgencyFeed, AgencyFeedSchema, displayName, flattenAgencies } from './feed.js';

const logger = createChildLogger('reference-resolver');

/**
 * Flatten the feed into one entry per agency display name that references at
 * least one title. Entries sharing a name are merged in feed order.
 */
export function buildAgencyTitleMap(feed: AgencyFeed): Map<string, AgencyReferences> {
  const map = new Map<string, AgencyReferences>();

  for (const agency of flattenAgencies(feed.agencies)) {
    const name = displayName(agency);
    const references: ReferenceEntry[] = [];

    for (const ref of agency.cfr_references ?? []) {
      if (ref.title === undefined) {
        continue;
      }
      const chapter = ref.chapter?.trim();
      references.push({
        agencyName: name,
        titleNumber: ref.title,
        chapter: chapter ? chapter : null,
      });
    }

    if (references.length === 0) {
      continue;
    }

    const existing = map.get(name);
    if (existing) {
      existing.references.push(...references);
    } else {
      map.set(name, { name, references });
    }
  }

  return map;
}

/**
 * Agency name to title/chapter lookups, built once per analysis run
 */
export class ReferenceIndex {
  private entries: Map<string, AgencyReferences>;
  private knownNames: Set<string>;

  private constructor(entries: Map<string, AgencyReferences>, knownNames: Set<string>) {
    this.entries = entries;
    this.knownNames = knownNames;
  }

  /**
   * Validate a raw agencies feed and index it
   */
  static fromFeed(raw: unknown): ReferenceIndex {
    const result = AgencyFeedSchema.safeParse(raw);
    if (!result.success) {
      throw new MetadataError('Agency reference feed is malformed', result.error.issues);
    }

    const entries = buildAgencyTitleMap(result.data);
    const knownNames = new Set(flattenAgencies(result.data.agencies).map(displayName));

    logger.debug(
      { agencies: knownNames.size, withReferences: entries.size },
      'Built agency reference index'
    );

    return new ReferenceIndex(entries, knownNames);
  }

  /**
   * Every agency display name in the feed, sorted
   */
  listAgencies(): string[] {
    return Array.from(this.knownNames).sort();
  }

  /**
   * Agencies with at least one title reference, in feed order
   */
  agenciesWithReferences(): string[] {
    return Array.from(this.entries.keys());
  }

  hasAgency(name: string): boolean {
    return this.knownNames.has(name);
  }

  /**
   * Throws `ResolutionError` for names that are not in the feed
   */
  assertKnown(name: string): void {
    if (!this.hasAgency(name)) {
      throw new ResolutionError(name);
    }
  }

  /**
   * Distinct titles an agency references, ascending
   */
  titlesFor(name: string): number[] {
    this.assertKnown(name);
    const entry = this.entries.get(name);
    if (!entry) {
      return [];
    }
    const titles = new Set(entry.references.map((ref) => ref.titleNumber));
    return Array.from(titles).sort((a, b) => a - b);
  }

  /**
   * Chapter codes the agency is scoped to within a title. `null` means the
   * whole title: no chapter is given, or one of the references has none.
   */
  chaptersFor(name: string, titleNumber: number): ChapterFilter {
    this.assertKnown(name);
    const references = (this.entries.get(name)?.references ?? []).filter(
      (ref) => ref.titleNumber === titleNumber
    );

    if (references.length === 0 || references.some((ref) => ref.chapter === null)) {
      return null;
    }

    const chapters = new Set<string>();
    for (const ref of references) {
      if (ref.chapter !== null) {
        chapters.add(ref.chapter.toUpperCase());
      }
    }
    return chapters;
  }
}
