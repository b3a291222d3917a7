import * as cheerio from 'cheerio';
import { z } from 'zod';
import { HttpClient, Logger, MinIntervalPolicy, RateLimiter, type ComponentLogger } from '../utils/index.js';
import { err, ok, type LookupError, type LookupErrorCode, type Result, type SourceName } from '../types/common.js';
import { UNKNOWN_TAXON, type HMDBData, type HMDBRecord } from '../types/metabolite.js';

const SOURCE: SourceName = 'hmdb';

// Only the first match is read, so later entries are left unchecked
const HMDBSearchResponseSchema = z.object({
  metabolites: z.array(z.unknown()),
});

const HMDBSearchMatchSchema = z.object({
  hmdb_id: z.string().min(1),
});

export interface HMDBSourceOptions {
  baseUrl: string;
  delayMs: number;
  searchTimeoutMs: number;
  detailTimeoutMs: number;
}

export class HMDBSource {
  private client: HttpClient;
  private logger: ComponentLogger;
  private options: HMDBSourceOptions;

  constructor(options: HMDBSourceOptions, logger: Logger, rateLimiter: RateLimiter) {
    this.options = options;
    this.logger = logger.child('hmdb');

    rateLimiter.configure(SOURCE, new MinIntervalPolicy(options.delayMs));

    this.client = new HttpClient(
      SOURCE,
      {
        baseUrl: options.baseUrl,
        timeout: options.detailTimeoutMs,
      },
      logger,
      rateLimiter
    );
  }

  /**
   * Resolve a metabolite name to an HMDB accession via full-text search.
   * The first match wins; there is no ranking.
   */
  async resolveId(name: string): Promise<Result<string>> {
    const response = await this.client.get('/unearth/q', {
      params: { query: name, searcher: 'metabolites' },
      headers: { Accept: 'application/json' },
      timeout: this.options.searchTimeoutMs,
    });
    if (!response.ok) {
      return response;
    }

    let body: unknown;
    try {
      body = JSON.parse(response.value.data);
    } catch (error) {
      return err(lookupError('PARSE_ERROR', `Search response is not JSON: ${describe(error)}`));
    }

    const parsed = HMDBSearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      return err(lookupError('PARSE_ERROR', `Unexpected search response: ${parsed.error.message}`));
    }

    if (parsed.data.metabolites.length === 0) {
      return err(lookupError('NOT_FOUND', `No HMDB metabolite matches "${name}"`));
    }

    const first = HMDBSearchMatchSchema.safeParse(parsed.data.metabolites[0]);
    if (!first.success) {
      return err(lookupError('PARSE_ERROR', `Unexpected search match: ${first.error.message}`));
    }

    return ok(first.data.hmdb_id);
  }

  /**
   * Fetch and parse the metabolite document for an accession
   */
  async fetchRecord(hmdbId: string): Promise<Result<HMDBData>> {
    const response = await this.client.get(`/metabolites/${encodeURIComponent(hmdbId)}.xml`, {
      headers: { Accept: 'application/xml' },
      timeout: this.options.detailTimeoutMs,
    });
    if (!response.ok) {
      return response;
    }

    return parseMetaboliteDocument(response.value.data, hmdbId);
  }

  /**
   * Resolve then fetch one name. Never throws.
   */
  async lookup(name: string): Promise<HMDBRecord> {
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

    const record = await this.fetchRecord(resolved.value);
    if (!record.ok) {
      this.logger.warning({
        action: 'fetch_failed',
        name,
        hmdb_id: resolved.value,
        code: record.error.code,
        error: record.error.message,
      });
      return { status: 'error', error: record.error };
    }

    this.logger.debug({
      action: 'found',
      name,
      hmdb_id: resolved.value,
      pathways: record.value.hmdb_pathways.length,
    });
    return { status: 'found', data: record.value };
  }
}

/**
 * Extract taxonomy and pathway names from an HMDB metabolite XML document.
 *
 * `<pathway>` entries are always read as a sequence, whether the document
 * carries one or many. Entries without child elements are dropped.
 */
export function parseMetaboliteDocument(xml: string, hmdbId: string): Result<HMDBData> {
  const $ = cheerio.load(xml, { xml: true });
  const metabolite = $.root().children('metabolite').first();

  if (metabolite.length === 0) {
    return err(lookupError('PARSE_ERROR', `Document for ${hmdbId} has no <metabolite> element`));
  }

  const classification = metabolite.children('classification').first();
  const taxon = (field: string): string => {
    const value = classification.children(field).first().text().trim();
    return value || UNKNOWN_TAXON;
  };

  const pathways = metabolite
    .children('pathways')
    .first()
    .children('pathway')
    .toArray()
    .filter((el) => $(el).children().length > 0)
    .map((el) => $(el).children('name').first().text().trim());

  return ok({
    hmdb_id: hmdbId,
    super_class: taxon('super_class'),
    class: taxon('class'),
    sub_class: taxon('sub_class'),
    hmdb_pathways: pathways,
  });
}

function lookupError(code: LookupErrorCode, message: string): LookupError {
  return { code, message, source: SOURCE };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
