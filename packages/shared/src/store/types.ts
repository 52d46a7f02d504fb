/**
 * Record Store Contract
 *
 * Records are documents keyed by `id` inside a named collection. Updates are
 * shallow merges; the store does not offer transactions.
 */

import type { ExtractedDataRecord, ProcessingJob, ValidationResultRecord } from '../types';

export interface CollectionRecords {
  jobs: ProcessingJob;
  extracted_data: ExtractedDataRecord;
  validation_results: ValidationResultRecord;
}

export type CollectionName = keyof CollectionRecords;

export const COLLECTIONS: readonly CollectionName[] = ['jobs', 'extracted_data', 'validation_results'];

export interface RecordStore {
  create<C extends CollectionName>(collection: C, record: CollectionRecords[C]): Promise<CollectionRecords[C]>;

  get<C extends CollectionName>(collection: C, id: string): Promise<CollectionRecords[C] | null>;

  /** Returns the merged record, or null when no record has that id */
  update<C extends CollectionName>(
    collection: C,
    id: string,
    patch: Partial<CollectionRecords[C]>
  ): Promise<CollectionRecords[C] | null>;
}
