#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  SetLevelRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { ZodError, type z } from 'zod';

import { Logger, parseLogLevel } from './utils/logger.js';
import { RateLimiter } from './utils/rate-limiter.js';
import { HMDBSource } from './sources/hmdb.js';
import { KEGGSource } from './sources/kegg.js';
import {
  ClassifyMetabolitesTool,
  ClassifyMetabolitesInputSchema,
  RenderTableTool,
  RenderTableInputSchema,
  overallProgress,
  type ProgressListener,
} from './tools/index.js';
import { loadConfig, getSourceStatusMessage } from './utils/config.js';
import { toolInputSchema } from './utils/json-schema.js';
import { initTelemetry, shutdownTelemetry, recordToolCall } from './utils/telemetry.js';
import type { ErrorCode, ErrorResponse } from './types/common.js';

const SERVER_NAME = 'metabolite-classifier-mcp';
const SERVER_VERSION = '1.0.0';

const args = process.argv.slice(2);
if (args.includes('--help') || args.includes('-h')) {
  process.stdout.write(`
Metabolite Classifier MCP Server

Resolves metabolite names against HMDB and KEGG and classifies each one as
primary, secondary or unknown.

Usage: metabolite-classifier-mcp [--help]

Environment Variables:
  HMDB_BASE_URL            HMDB base URL (default: https://hmdb.ca)
  KEGG_BASE_URL            KEGG REST base URL (default: http://rest.kegg.jp)
  HMDB_DELAY_MS            Delay between HMDB requests (default: 1000)
  KEGG_DELAY_MS            Delay between KEGG requests (default: 500)
  HMDB_SEARCH_TIMEOUT_MS   HMDB search deadline (default: 10000)
  HMDB_DETAIL_TIMEOUT_MS   HMDB document deadline (default: 15000)
  KEGG_SEARCH_TIMEOUT_MS   KEGG find deadline (default: 10000)
  KEGG_DETAIL_TIMEOUT_MS   KEGG get/link deadline (default: 15000)
  KEGG_PARTIAL_RESULTS     Keep the KEGG request that succeeded when the other fails (default: false)
  LOG_LEVEL                debug, info, notice, warning, error (default: info)
  OTEL_ENABLED             Enable OpenTelemetry (default: false)
  OTEL_EXPORTER_OTLP_ENDPOINT  OpenTelemetry endpoint URL
`);
  process.exit(0);
}

// Load and validate configuration
const { config: appConfig, sources: sourceStatus } = loadConfig();

initTelemetry(appConfig);

const logger = new Logger(SERVER_NAME);
logger.setLevel(parseLogLevel(appConfig.logLevel) ?? 'info');

logger.info('main', {
  action: 'source_status',
  message: getSourceStatusMessage(sourceStatus),
});

const rateLimiter = new RateLimiter(logger);

const hmdb = new HMDBSource(
  {
    baseUrl: appConfig.hmdbBaseUrl,
    delayMs: appConfig.hmdbDelayMs,
    searchTimeoutMs: appConfig.hmdbSearchTimeoutMs,
    detailTimeoutMs: appConfig.hmdbDetailTimeoutMs,
  },
  logger,
  rateLimiter
);

const kegg = new KEGGSource(
  {
    baseUrl: appConfig.keggBaseUrl,
    delayMs: appConfig.keggDelayMs,
    searchTimeoutMs: appConfig.keggSearchTimeoutMs,
    detailTimeoutMs: appConfig.keggDetailTimeoutMs,
    partialResults: appConfig.keggPartialResults,
  },
  logger,
  rateLimiter
);

const classifyTool = new ClassifyMetabolitesTool(hmdb, kegg, logger);
const renderTool = new RenderTableTool(logger);

interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.AnyZodObject;
}

const tools: ToolDefinition[] = [
  {
    name: 'classify_metabolites',
    description:
      'Resolve metabolite names in HMDB and KEGG, merge their classification and pathway data, and classify each metabolite as primary, secondary or unknown. Lookups are sequential and paced, so expect one to two seconds per name.',
    inputSchema: ClassifyMetabolitesInputSchema,
  },
  {
    name: 'render_table',
    description:
      'Render rows from classify_metabolites as a markdown or CSV table, with the summary columns or every column.',
    inputSchema: RenderTableInputSchema,
  },
];

class ToolError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ToolError';
  }
}

type ToolCallResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

const server = new Server(
  {
    name: SERVER_NAME,
    version: SERVER_VERSION,
  },
  {
    capabilities: {
      tools: {},
      logging: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toolInputSchema(tool.inputSchema),
    })),
  };
});

server.setRequestHandler(SetLevelRequestSchema, async (request) => {
  const level = parseLogLevel(request.params.level);
  if (level) {
    logger.setLevel(level);
    logger.info('main', { action: 'log_level_changed', level });
  }
  return {};
});

/**
 * Execute a tool call and record telemetry
 */
async function executeToolCall(
  name: string,
  toolArgs: unknown,
  onProgress?: ProgressListener
): Promise<ToolCallResult> {
  const startTime = Date.now();
  let success = true;

  try {
    switch (name) {
      case 'classify_metabolites': {
        const input = ClassifyMetabolitesInputSchema.parse(toolArgs);
        const result = await classifyTool.execute(input, onProgress);
        return {
          content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        };
      }

      case 'render_table': {
        const input = RenderTableInputSchema.parse(toolArgs);
        const result = await renderTool.execute(input);
        return {
          content: [{ type: 'text', text: result }],
        };
      }

      default:
        throw new ToolError('UNKNOWN_TOOL', `Unknown tool: ${name}`);
    }
  } catch (error) {
    success = false;

    const response: ErrorResponse = {
      error:
        error instanceof ToolError
          ? { code: error.code, message: error.message }
          : error instanceof ZodError
            ? { code: 'VALIDATION_ERROR', message: error.message }
            : {
                code: 'UNKNOWN_ERROR',
                message: error instanceof Error ? error.message : String(error),
              },
    };

    logger.error('main', {
      action: 'tool_error',
      tool: name,
      code: response.error.code,
      error: response.error.message,
    });

    return {
      content: [{ type: 'text', text: JSON.stringify(response) }],
      isError: true,
    };
  } finally {
    recordToolCall(name, Date.now() - startTime, success);
  }
}

server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
  const { name, arguments: toolArgs } = request.params;
  const progressToken = request.params._meta?.progressToken;

  // Forward pipeline checkpoints when the client asked for progress
  const onProgress: ProgressListener | undefined =
    progressToken === undefined
      ? undefined
      : (event) => {
          extra
            .sendNotification({
              method: 'notifications/progress',
              params: { progressToken, progress: overallProgress(event), total: 1 },
            })
            .catch((error: unknown) => {
              logger.warning('main', {
                action: 'progress_notification_failed',
                error: error instanceof Error ? error.message : String(error),
              });
            });
        };

  return executeToolCall(name, toolArgs ?? {}, onProgress);
});

async function main() {
  logger.info('main', {
    action: 'starting',
    transport: 'stdio',
    sources: sourceStatus.map((s) => s.name),
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Once connected, logs travel to the client as notifications/message
  logger.setEmitter((entry) => {
    server
      .notification({
        method: 'notifications/message',
        params: {
          level: entry.level,
          logger: entry.logger,
          data: entry.data,
        },
      })
      .catch((error: unknown) => {
        console.error(`Failed to forward log entry: ${String(error)}`);
      });
  });

  logger.info('main', {
    action: 'started',
    transport: 'stdio',
  });
}

async function shutdown() {
  logger.info('main', { action: 'shutting_down' });
  logger.setEmitter(null);
  await server.close();
  await shutdownTelemetry();
  process.exit(0);
}

function onSignal() {
  shutdown().catch((error: unknown) => {
    console.error('Shutdown failed:', error);
    process.exit(1);
  });
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
