import { z } from 'zod';
import type { LookupError } from './common.js';

export const MetaboliteTypeSchema = z.enum(['primary', 'secondary']);
export type MetaboliteType = z.infer<typeof MetaboliteTypeSchema>;

export const FinalTypeSchema = z.enum(['primary', 'secondary', 'unknown']);
export type FinalType = z.infer<typeof FinalTypeSchema>;

// Placeholder for taxonomy fields HMDB leaves out
export const UNKNOWN_TAXON = 'Unknown';

// Data extracted from an HMDB metabolite document
export interface HMDBData {
  hmdb_id: string;
  super_class: string;
  class: string;
  sub_class: string;
  hmdb_pathways: string[];
}

// Data extracted from KEGG flat-file and link payloads
export interface KEGGData {
  kegg_id: string;
  type?: MetaboliteType;
  description?: string;
  kegg_pathways?: string[];
}

/**
 * Outcome of looking one metabolite up in one source.
 *
 * `id_not_found` keeps the resolver's failure as `cause` when there was one,
 * so a timeout during search is still visible even though it is reported
 * the same way as an empty search result.
 */
export type SourceRecord<T> =
  | { status: 'found'; data: T }
  | { status: 'partial'; data: T; error: LookupError }
  | { status: 'id_not_found'; cause?: LookupError }
  | { status: 'error'; error: LookupError };

export type HMDBRecord = SourceRecord<HMDBData>;
export type KEGGRecord = SourceRecord<KEGGData>;

// One row of the result table
export const MergedRecordSchema = z.object({
  name: z.string(),
  hmdb_status: z.string(),
  hmdb_id: z.string().optional(),
  super_class: z.string().optional(),
  class: z.string().optional(),
  sub_class: z.string().optional(),
  hmdb_pathways: z.array(z.string()).optional(),
  kegg_status: z.string(),
  kegg_id: z.string().optional(),
  type: MetaboliteTypeSchema.optional(),
  description: z.string().optional(),
  kegg_pathways: z.array(z.string()).optional(),
  final_type: FinalTypeSchema,
});
export type MergedRecord = z.infer<typeof MergedRecordSchema>;

// Merged row before the classifier has run
export type UnclassifiedRecord = Omit<MergedRecord, 'final_type'>;

// Rows keyed by metabolite name, in first-seen input order
export type ResultTable = Map<string, MergedRecord>;
