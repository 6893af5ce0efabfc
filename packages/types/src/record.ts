/**
 * A source document as it appears in the ingestion input file.
 */
export interface CorpusRecord {
  id?: string | number;
  content: string;
  metadata?: Record<string, unknown>;
}

export interface RecordLoadResult {
  records: CorpusRecord[];
  /** Entries read from the input file, valid or not. */
  total: number;
  /** Entries dropped for missing or too-short content. */
  dropped: number;
}
