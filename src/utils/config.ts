import { z } from 'zod';
import { parseLogLevel } from './logger.js';

export const DEFAULT_HMDB_BASE_URL = 'https://hmdb.ca';
export const DEFAULT_KEGG_BASE_URL = 'http://rest.kegg.jp';

/**
 * Environment configuration schema with validation
 */
export const ConfigSchema = z.object({
  // Upstream endpoints
  hmdbBaseUrl: z.string().url().default(DEFAULT_HMDB_BASE_URL),
  keggBaseUrl: z.string().url().default(DEFAULT_KEGG_BASE_URL),

  // Politeness delay between consecutive requests to one source
  hmdbDelayMs: z.number().int().nonnegative().default(1000),
  keggDelayMs: z.number().int().nonnegative().default(500),

  // Per-request deadlines
  hmdbSearchTimeoutMs: z.number().int().positive().default(10000),
  hmdbDetailTimeoutMs: z.number().int().positive().default(15000),
  keggSearchTimeoutMs: z.number().int().positive().default(10000),
  keggDetailTimeoutMs: z.number().int().positive().default(15000),

  // Keep whichever KEGG request succeeded when the other one fails
  keggPartialResults: z.boolean().default(false),

  // Logging
  logLevel: z
    .string()
    .refine((value) => parseLogLevel(value) !== null, { message: 'Unknown log level' })
    .default('info'),

  // OpenTelemetry
  otelEnabled: z.boolean().default(false),
  otelEndpoint: z.string().optional(),
  otelServiceName: z.string().default('metabolite-classifier-mcp'),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface SourceStatus {
  name: string;
  baseUrl: string;
  delayMs: number;
}

function parseNumber(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

/**
 * Validates the environment and returns configuration plus per-source pacing
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): { config: Config; sources: SourceStatus[] } {
  const rawConfig = {
    hmdbBaseUrl: env.HMDB_BASE_URL,
    keggBaseUrl: env.KEGG_BASE_URL,
    hmdbDelayMs: parseNumber(env.HMDB_DELAY_MS),
    keggDelayMs: parseNumber(env.KEGG_DELAY_MS),
    hmdbSearchTimeoutMs: parseNumber(env.HMDB_SEARCH_TIMEOUT_MS),
    hmdbDetailTimeoutMs: parseNumber(env.HMDB_DETAIL_TIMEOUT_MS),
    keggSearchTimeoutMs: parseNumber(env.KEGG_SEARCH_TIMEOUT_MS),
    keggDetailTimeoutMs: parseNumber(env.KEGG_DETAIL_TIMEOUT_MS),
    keggPartialResults: env.KEGG_PARTIAL_RESULTS === 'true',
    logLevel: env.LOG_LEVEL,
    otelEnabled: env.OTEL_ENABLED === 'true',
    otelEndpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT,
    otelServiceName: env.OTEL_SERVICE_NAME,
  };

  // Filter out undefined values
  const filteredConfig = Object.fromEntries(
    Object.entries(rawConfig).filter(([, v]) => v !== undefined)
  );

  const config = ConfigSchema.parse(filteredConfig);

  const sources: SourceStatus[] = [
    { name: 'HMDB', baseUrl: config.hmdbBaseUrl, delayMs: config.hmdbDelayMs },
    { name: 'KEGG', baseUrl: config.keggBaseUrl, delayMs: config.keggDelayMs },
  ];

  return { config, sources };
}

/**
 * Human-readable summary of the configured sources
 */
export function getSourceStatusMessage(sources: SourceStatus[]): string {
  return `Sources: ${sources
    .map((s) => `${s.name} (${s.baseUrl}, ${s.delayMs}ms between requests)`)
    .join(', ')}`;
}
