import { trace, metrics, SpanStatusCode, type Span, type Counter, type Histogram } from '@opentelemetry/api';
import { Resource } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { BasicTracerProvider, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { MeterProvider, PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import type { LookupErrorCode, SourceName } from '../types/common.js';
import type { FinalType, SourceRecord } from '../types/metabolite.js';
import type { Config } from './config.js';

const TRACER_NAME = 'metabolite-classifier-mcp';
const METRIC_EXPORT_INTERVAL_MS = 60000;

// Outcome of one upstream HTTP request
export type RequestOutcome = 'ok' | LookupErrorCode;

interface Instruments {
  toolCalls: Counter;
  toolDuration: Histogram;
  sourceRequests: Counter;
  sourceErrors: Counter;
  sourceLatency: Histogram;
  lookups: Counter;
  classified: Counter;
}

interface Providers {
  tracer: BasicTracerProvider;
  meter: MeterProvider;
}

let providers: Providers | null = null;
let instruments: Instruments | null = null;

/**
 * Start OTLP export when enabled. Without an endpoint, instruments are
 * created against whatever global meter provider is registered.
 */
export function initTelemetry(config: Config): void {
  if (!config.otelEnabled || instruments) {
    return;
  }

  if (config.otelEndpoint) {
    providers = createProviders(config.otelEndpoint, config.otelServiceName);
  }

  const meter = metrics.getMeter(config.otelServiceName);

  instruments = {
    toolCalls: meter.createCounter('mcp.tool.calls', {
      description: 'Number of MCP tool calls',
    }),
    toolDuration: meter.createHistogram('mcp.tool.duration', {
      description: 'Duration of MCP tool calls in milliseconds',
      unit: 'ms',
    }),
    sourceRequests: meter.createCounter('source.requests', {
      description: 'Number of requests to HMDB and KEGG',
    }),
    sourceErrors: meter.createCounter('source.errors', {
      description: 'Number of failed requests to HMDB and KEGG, by error code',
    }),
    sourceLatency: meter.createHistogram('source.request.duration', {
      description: 'Duration of requests to HMDB and KEGG in milliseconds',
      unit: 'ms',
    }),
    lookups: meter.createCounter('metabolite.lookups', {
      description: 'Per-source lookup outcomes',
    }),
    classified: meter.createCounter('metabolites.classified', {
      description: 'Number of metabolites classified, by final type',
    }),
  };
}

function createProviders(endpoint: string, serviceName: string): Providers {
  const resource = new Resource({
    [ATTR_SERVICE_NAME]: serviceName,
    [ATTR_SERVICE_VERSION]: '1.0.0',
  });

  const tracer = new BasicTracerProvider({ resource });
  tracer.addSpanProcessor(
    new SimpleSpanProcessor(new OTLPTraceExporter({ url: `${endpoint}/v1/traces` }))
  );
  tracer.register();

  const meter = new MeterProvider({
    resource,
    readers: [
      new PeriodicExportingMetricReader({
        exporter: new OTLPMetricExporter({ url: `${endpoint}/v1/metrics` }),
        exportIntervalMillis: METRIC_EXPORT_INTERVAL_MS,
      }),
    ],
  });
  metrics.setGlobalMeterProvider(meter);

  return { tracer, meter };
}

/**
 * Flush and stop the exporters
 */
export async function shutdownTelemetry(): Promise<void> {
  const active = providers;
  providers = null;
  instruments = null;

  if (active) {
    await active.tracer.shutdown();
    await active.meter.shutdown();
  }
}

/**
 * Run `fn` inside an active span; failures mark the span as errored and rethrow
 */
export function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  return trace.getTracer(TRACER_NAME).startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

export function recordToolCall(toolName: string, durationMs: number, success: boolean): void {
  const attributes = { tool: toolName, success: String(success) };
  instruments?.toolCalls.add(1, attributes);
  instruments?.toolDuration.record(durationMs, attributes);
}

export function recordSourceRequest(
  source: SourceName,
  durationMs: number,
  outcome: RequestOutcome
): void {
  instruments?.sourceRequests.add(1, { source, success: String(outcome === 'ok') });
  instruments?.sourceLatency.record(durationMs, { source });
  if (outcome !== 'ok') {
    instruments?.sourceErrors.add(1, { source, code: outcome });
  }
}

export function recordLookup(source: SourceName, record: SourceRecord<unknown>): void {
  instruments?.lookups.add(1, { source, status: record.status });
}

export function recordClassification(finalType: FinalType): void {
  instruments?.classified.add(1, { final_type: finalType });
}
