import { z } from 'zod';

// Upstream databases
export const SourceNameSchema = z.enum(['hmdb', 'kegg']);
export type SourceName = z.infer<typeof SourceNameSchema>;

// Lookup failure codes
export const LookupErrorCodeSchema = z.enum([
  'NOT_FOUND',
  'REQUEST_ERROR',
  'TIMEOUT',
  'PARSE_ERROR',
]);
export type LookupErrorCode = z.infer<typeof LookupErrorCodeSchema>;

export const LookupErrorSchema = z.object({
  code: LookupErrorCodeSchema,
  message: z.string(),
  source: SourceNameSchema,
  status: z.number().int().optional(),
});
export type LookupError = z.infer<typeof LookupErrorSchema>;

// Value-or-error returned by every resolver, fetcher and HTTP call
export type Result<T, E = LookupError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E = LookupError>(error: E): Result<never, E> {
  return { ok: false, error };
}

// Tool-level error codes
export const ErrorCodeSchema = z.enum([
  'VALIDATION_ERROR',
  'UNKNOWN_TOOL',
  'UNKNOWN_ERROR',
]);
export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

export const ErrorResponseSchema = z.object({
  error: z.object({
    code: ErrorCodeSchema,
    message: z.string(),
  }),
});
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// Log levels (RFC 5424)
export const LogLevel = z.enum([
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
]);
export type LogLevel = z.infer<typeof LogLevel>;

// Structured log entry
export interface LogEntry {
  level: LogLevel;
  logger: string;
  data: Record<string, unknown>;
}
