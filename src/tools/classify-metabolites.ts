import { z } from 'zod';
import type { SourceName } from '../types/common.js';
import type {
  HMDBRecord,
  KEGGRecord,
  MergedRecord,
  ResultTable,
  SourceRecord,
} from '../types/metabolite.js';
import { HMDBSource } from '../sources/hmdb.js';
import { KEGGSource } from '../sources/kegg.js';
import { Logger, type ComponentLogger } from '../utils/logger.js';
import { buildResultTable } from '../utils/merge-results.js';
import { recordClassification, recordLookup, withSpan } from '../utils/telemetry.js';

export const ClassifyMetabolitesInputSchema = z.object({
  names: z
    .array(z.string())
    .min(1)
    .describe('Metabolite names, in the order the result rows should appear'),
});

export type ClassifyMetabolitesInput = z.infer<typeof ClassifyMetabolitesInputSchema>;

export type PipelinePhase = 'hmdb' | 'kegg' | 'complete';

// Checkpoint offsets within the current item for each lookup phase
export const PHASE_OFFSETS = { hmdb: 0.3, kegg: 0.7 } as const;

export interface ProgressEvent {
  phase: PipelinePhase;
  index: number;
  total: number;
  name?: string;
  // Fraction of the current phase, 0..1; restarts when the KEGG phase begins
  progress: number;
}

export type ProgressListener = (event: ProgressEvent) => void;

/**
 * Fraction of the whole run, non-decreasing across phases: the HMDB phase
 * covers the first half and the KEGG phase the second.
 */
export function overallProgress(event: ProgressEvent): number {
  if (event.phase === 'complete' || event.total === 0) return 1;
  const phaseStart = event.phase === 'hmdb' ? 0 : event.total;
  return (phaseStart + event.index + PHASE_OFFSETS[event.phase]) / (2 * event.total);
}

export interface ClassificationSummary {
  primary: number;
  secondary: number;
  unknown: number;
  hmdb_found: number;
  kegg_found: number;
}

export interface ClassifyMetabolitesOutput {
  total: number;
  rows: MergedRecord[];
  summary: ClassificationSummary;
  _meta: {
    input_count: number;
    duration_ms: number;
  };
}

/**
 * Drives every name through HMDB, then KEGG, then merge and classification.
 * Lookups run one at a time; per-item failures end up in the status columns.
 */
export class ClassifyMetabolitesTool {
  private hmdb: HMDBSource;
  private kegg: KEGGSource;
  private logger: ComponentLogger;

  constructor(hmdb: HMDBSource, kegg: KEGGSource, logger: Logger) {
    this.hmdb = hmdb;
    this.kegg = kegg;
    this.logger = logger.child('classify-metabolites');
  }

  async execute(
    input: ClassifyMetabolitesInput,
    onProgress?: ProgressListener
  ): Promise<ClassifyMetabolitesOutput> {
    const startTime = Date.now();
    const table = await this.run(input.names, onProgress);
    const rows = [...table.values()];
    const summary = summarize(rows);

    this.logger.info({
      action: 'complete',
      input_count: input.names.length,
      rows: rows.length,
      ...summary,
      duration_ms: Date.now() - startTime,
    });

    return {
      total: rows.length,
      rows,
      summary,
      _meta: {
        input_count: input.names.length,
        duration_ms: Date.now() - startTime,
      },
    };
  }

  /**
   * Run the pipeline and return rows keyed by name
   */
  async run(names: readonly string[], onProgress?: ProgressListener): Promise<ResultTable> {
    return withSpan('pipeline.run', { 'pipeline.input_count': names.length }, async () => {
      const total = names.length;
      const emit = (event: ProgressEvent) => onProgress?.(event);

      this.logger.info({ action: 'start', input_count: total });

      const hmdbResults = new Map<string, HMDBRecord>();
      for (const [index, name] of names.entries()) {
        emit({ phase: 'hmdb', index, total, name, progress: (index + PHASE_OFFSETS.hmdb) / total });
        hmdbResults.set(name, await traceLookup('hmdb', name, () => this.hmdb.lookup(name)));
      }

      const keggResults = new Map<string, KEGGRecord>();
      for (const [index, name] of names.entries()) {
        emit({ phase: 'kegg', index, total, name, progress: (index + PHASE_OFFSETS.kegg) / total });
        keggResults.set(name, await traceLookup('kegg', name, () => this.kegg.lookup(name)));
      }

      const table = buildResultTable(names, hmdbResults, keggResults);
      for (const row of table.values()) {
        recordClassification(row.final_type);
      }

      emit({ phase: 'complete', index: total, total, progress: 1 });
      return table;
    });
  }
}

function traceLookup<R extends SourceRecord<unknown>>(
  source: SourceName,
  name: string,
  lookup: () => Promise<R>
): Promise<R> {
  return withSpan(`lookup.${source}`, { 'metabolite.name': name }, async (span) => {
    const record = await lookup();
    span.setAttribute('lookup.status', record.status);
    recordLookup(source, record);
    return record;
  });
}

function summarize(rows: MergedRecord[]): ClassificationSummary {
  const summary: ClassificationSummary = {
    primary: 0,
    secondary: 0,
    unknown: 0,
    hmdb_found: 0,
    kegg_found: 0,
  };

  for (const row of rows) {
    summary[row.final_type]++;
    if (row.hmdb_status === 'Found') summary.hmdb_found++;
    if (row.kegg_status === 'Found') summary.kegg_found++;
  }

  return summary;
}
