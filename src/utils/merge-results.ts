import type {
  HMDBRecord,
  KEGGRecord,
  ResultTable,
  SourceRecord,
  UnclassifiedRecord,
} from '../types/metabolite.js';
import { classifyMetabolite } from './classify.js';

/**
 * Status column text for one source record
 */
export function formatStatus(record: SourceRecord<unknown>): string {
  switch (record.status) {
    case 'found':
      return 'Found';
    case 'partial':
      return `Partial: ${record.error.message}`;
    case 'id_not_found':
      return 'ID not found';
    case 'error':
      return `Error: ${record.error.message}`;
  }
}

/**
 * Overlay HMDB fields, then KEGG fields, onto a row for `name`.
 * KEGG wins where both carry the same key.
 */
export function mergeRecords(
  name: string,
  hmdb: HMDBRecord,
  kegg: KEGGRecord
): UnclassifiedRecord {
  const merged: UnclassifiedRecord = {
    name,
    hmdb_status: formatStatus(hmdb),
    kegg_status: formatStatus(kegg),
  };

  if (hmdb.status === 'found' || hmdb.status === 'partial') {
    Object.assign(merged, hmdb.data);
  }
  if (kegg.status === 'found' || kegg.status === 'partial') {
    Object.assign(merged, kegg.data);
  }

  return merged;
}

/**
 * Merge and classify every name. Rows keep first-seen order; a repeated
 * name takes the lookups recorded last for it.
 */
export function buildResultTable(
  names: readonly string[],
  hmdbResults: ReadonlyMap<string, HMDBRecord>,
  keggResults: ReadonlyMap<string, KEGGRecord>
): ResultTable {
  const table: ResultTable = new Map();

  for (const name of names) {
    const hmdb = hmdbResults.get(name) ?? missingRecord();
    const kegg = keggResults.get(name) ?? missingRecord();
    const merged = mergeRecords(name, hmdb, kegg);
    table.set(name, { ...merged, final_type: classifyMetabolite(merged) });
  }

  return table;
}

function missingRecord(): SourceRecord<never> {
  return { status: 'id_not_found' };
}
