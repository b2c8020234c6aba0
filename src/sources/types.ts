/**
 * Storage and retrieval of raw title XML and the agency reference feed.
 * The analyzer only depends on this interface.
 */
export interface DocumentSource {
  /** Raw XML for a title at a date, or `null` when it is not stored */
  getDocument(titleNumber: number, date: string): Promise<Buffer | null>;
  /** Download and store a title; `false` when the download failed */
  fetchDocument(titleNumber: number, date: string): Promise<boolean>;
  /** The raw agencies feed, downloaded first when it is not stored */
  getReferenceMetadata(): Promise<unknown>;
}
