import { z } from 'zod';
import { MergedRecordSchema, type MergedRecord } from '../types/metabolite.js';
import { Logger, type ComponentLogger } from '../utils/logger.js';

export const RenderTableInputSchema = z.object({
  rows: z.array(MergedRecordSchema).describe('Rows returned by classify_metabolites'),
  format: z.enum(['markdown', 'csv']).default('markdown').describe('Output format'),
  columns: z
    .enum(['display', 'all'])
    .default('display')
    .describe('Summary columns, or every column of the merged record'),
});

export type RenderTableInput = z.infer<typeof RenderTableInputSchema>;

type RecordColumn = Exclude<keyof MergedRecord, 'name'>;

// Row key column, always first
export const KEY_COLUMN = 'metabolite';

export const DISPLAY_COLUMNS: readonly RecordColumn[] = [
  'final_type',
  'super_class',
  'hmdb_pathways',
  'kegg_pathways',
  'hmdb_id',
  'kegg_id',
];

export const ALL_COLUMNS: readonly RecordColumn[] = [
  'final_type',
  'hmdb_status',
  'hmdb_id',
  'super_class',
  'class',
  'sub_class',
  'hmdb_pathways',
  'kegg_status',
  'kegg_id',
  'type',
  'description',
  'kegg_pathways',
];

/**
 * Columns from `candidates` that at least one row fills, in candidate order
 */
export function selectDisplayColumns(
  rows: readonly MergedRecord[],
  candidates: readonly RecordColumn[] = DISPLAY_COLUMNS
): RecordColumn[] {
  return candidates.filter((column) => rows.some((row) => row[column] !== undefined));
}

export class RenderTableTool {
  private logger: ComponentLogger;

  constructor(logger: Logger) {
    this.logger = logger.child('render-table');
  }

  async execute(input: RenderTableInput): Promise<string> {
    const columns = selectDisplayColumns(
      input.rows,
      input.columns === 'all' ? ALL_COLUMNS : DISPLAY_COLUMNS
    );
    const header = [KEY_COLUMN, ...columns];
    const body = input.rows.map((row) => [row.name, ...columns.map((c) => formatCell(row[c]))]);

    const output = input.format === 'csv' ? toCSV(header, body) : toMarkdown(header, body);

    this.logger.info({
      action: 'rendered',
      format: input.format,
      rows: input.rows.length,
      columns: header.length,
    });

    return output;
  }
}

function formatCell(value: MergedRecord[RecordColumn]): string {
  if (value === undefined) return '';
  if (Array.isArray(value)) return value.join('; ');
  return value;
}

function toCSV(header: string[], body: string[][]): string {
  return [header, ...body].map((cells) => cells.map(escapeCSV).join(',')).join('\n');
}

function escapeCSV(cell: string): string {
  if (/[",\n\r]/.test(cell)) {
    return `"${cell.replace(/"/g, '""')}"`;
  }
  return cell;
}

function toMarkdown(header: string[], body: string[][]): string {
  const line = (cells: string[]) => `| ${cells.map(escapeMarkdown).join(' | ')} |`;
  return [line(header), line(header.map(() => '---')), ...body.map(line)].join('\n');
}

function escapeMarkdown(cell: string): string {
  return cell.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}
