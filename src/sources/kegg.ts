import { HttpClient, Logger, MinIntervalPolicy, RateLimiter, type ComponentLogger } from '../utils/index.js';
import { err, ok, type LookupError, type LookupErrorCode, type Result, type SourceName } from '../types/common.js';
import type { KEGGData, KEGGRecord, MetaboliteType } from '../types/metabolite.js';

const SOURCE: SourceName = 'kegg';

// Substring that marks a compound as secondary in its flat-file record
export const SECONDARY_MARKER = 'Secondary metabolites';

const PATHWAY_PREFIX = 'path:';

export interface KEGGSourceOptions {
  baseUrl: string;
  delayMs: number;
  searchTimeoutMs: number;
  detailTimeoutMs: number;
  // Keep whichever request succeeded when the other one fails
  partialResults: boolean;
}

export interface KEGGCompoundInfo {
  type: MetaboliteType;
  description: string;
}

/**
 * The two KEGG requests for one compound, reported separately
 */
export interface KEGGFetchResult {
  info: Result<KEGGCompoundInfo>;
  pathways: Result<string[]>;
}

export class KEGGSource {
  private client: HttpClient;
  private logger: ComponentLogger;
  private options: KEGGSourceOptions;

  constructor(options: KEGGSourceOptions, logger: Logger, rateLimiter: RateLimiter) {
    this.options = options;
    this.logger = logger.child('kegg');

    rateLimiter.configure(SOURCE, new MinIntervalPolicy(options.delayMs));

    this.client = new HttpClient(
      SOURCE,
      {
        baseUrl: options.baseUrl,
        headers: { Accept: 'text/plain' },
        timeout: options.detailTimeoutMs,
      },
      logger,
      rateLimiter
    );
  }

  /**
   * Resolve a name to a compound ID using the first line of `find/compound`
   */
  async resolveId(name: string): Promise<Result<string>> {
    const response = await this.client.get(`/find/compound/${encodeURIComponent(name)}`, {
      timeout: this.options.searchTimeoutMs,
    });
    if (!response.ok) {
      return response;
    }

    return parseFindResponse(response.value.data, name);
  }

  /**
   * Fetch the flat-file record and the pathway links for a compound
   */
  async fetchRecord(keggId: string): Promise<KEGGFetchResult> {
    const id = encodeURIComponent(keggId);
    const timeout = this.options.detailTimeoutMs;

    const infoResponse = await this.client.get(`/get/cpd:${id}`, { timeout });
    const info = infoResponse.ok ? ok(parseCompoundInfo(infoResponse.value.data)) : infoResponse;

    const linkResponse = await this.client.get(`/link/pathway/cpd:${id}`, { timeout });
    const pathways = linkResponse.ok ? parsePathwayLinks(linkResponse.value.data) : linkResponse;

    return { info, pathways };
  }

  /**
   * Resolve then fetch one name. Never throws.
   */
  async lookup(name: string): Promise<KEGGRecord> {
    const resolved = await this.resolveId(name);
    if (!resolved.ok) {
      this.logger.debug({
        action: 'id_not_found',
        name,
        code: resolved.error.code,
        error: resolved.error.message,
      });
      return { status: 'id_not_found', cause: resolved.error };
    }

    const keggId = resolved.value;
    const { info, pathways } = await this.fetchRecord(keggId);

    let failure: LookupError;
    if (!info.ok) {
      failure = info.error;
    } else if (!pathways.ok) {
      failure = pathways.error;
    } else {
      return {
        status: 'found',
        data: {
          kegg_id: keggId,
          type: info.value.type,
          description: info.value.description,
          kegg_pathways: pathways.value,
        },
      };
    }

    this.logger.warning({
      action: 'fetch_failed',
      name,
      kegg_id: keggId,
      info_ok: info.ok,
      pathways_ok: pathways.ok,
      code: failure.code,
      error: failure.message,
    });

    if (!this.options.partialResults || (!info.ok && !pathways.ok)) {
      return { status: 'error', error: failure };
    }

    const data: KEGGData = { kegg_id: keggId };
    if (info.ok) {
      data.type = info.value.type;
      data.description = info.value.description;
    }
    if (pathways.ok) {
      data.kegg_pathways = pathways.value;
    }
    return { status: 'partial', data, error: failure };
  }
}

/**
 * Parse `find/compound` output: `<db>:<id>\t<names>` per line.
 * Only the first non-empty line is considered.
 */
export function parseFindResponse(body: string, name: string): Result<string> {
  const line = body.split('\n').find((l) => l !== '');
  if (line === undefined) {
    return err(lookupError('NOT_FOUND', `No KEGG compound matches "${name}"`));
  }

  const entry = line.split(/\s+/)[0] ?? '';
  const colon = entry.indexOf(':');
  if (colon === -1 || colon === entry.length - 1) {
    return err(lookupError('PARSE_ERROR', `Unexpected find line: ${JSON.stringify(line)}`));
  }

  return ok(entry.slice(colon + 1));
}

/**
 * Type and description from a `get/cpd:<id>` flat-file record.
 * Type is a substring heuristic over the whole record.
 */
export function parseCompoundInfo(body: string): KEGGCompoundInfo {
  const lines = body.split('\n');
  return {
    type: body.includes(SECONDARY_MARKER) ? 'secondary' : 'primary',
    description: lines.length > 1 ? lines[1] : '',
  };
}

/**
 * Unique pathway codes from `link/pathway` output, in first-seen order
 */
export function parsePathwayLinks(body: string): Result<string[]> {
  const codes = new Set<string>();

  for (const line of body.split('\n')) {
    if (line === '') continue;

    const target = line.split('\t')[1];
    if (target === undefined) {
      return err(lookupError('PARSE_ERROR', `Unexpected pathway link line: ${JSON.stringify(line)}`));
    }
    codes.add(target.startsWith(PATHWAY_PREFIX) ? target.slice(PATHWAY_PREFIX.length) : target);
  }

  return ok([...codes]);
}

function lookupError(code: LookupErrorCode, message: string): LookupError {
  return { code, message, source: SOURCE };
}
