import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  KEGGSource,
  parseCompoundInfo,
  parseFindResponse,
  parsePathwayLinks,
  type KEGGSourceOptions,
} from '../../src/sources/kegg.js';
import { Logger } from '../../src/utils/logger.js';
import { RateLimiter } from '../../src/utils/rate-limiter.js';
import { textResponse, timeoutError } from '../helpers/undici.js';
import { keggEntry, keggFind, keggLinks } from '../helpers/fixtures.js';

// Mock undici
vi.mock('undici', () => ({
  request: vi.fn(),
}));

import { request } from 'undici';

const mockRequest = vi.mocked(request);

const OPTIONS: KEGGSourceOptions = {
  baseUrl: 'http://rest.kegg.jp',
  delayMs: 0,
  searchTimeoutMs: 10000,
  detailTimeoutMs: 15000,
  partialResults: false,
};

describe('KEGGSource', () => {
  let logger: Logger;

  const createSource = (overrides: Partial<KEGGSourceOptions> = {}) =>
    new KEGGSource({ ...OPTIONS, ...overrides }, logger, new RateLimiter(logger));

  beforeEach(() => {
    mockRequest.mockReset();
    logger = new Logger('test');
    logger.setEmitter(vi.fn());
  });

  describe('resolveId', () => {
    it('should return the ID from the first result line', async () => {
      mockRequest.mockResolvedValueOnce(
        textResponse(200, 'cpd:C00158\tCitrate; Citric acid\ncpd:C00311\tIsocitrate\n')
      );

      const result = await createSource().resolveId('citric acid');

      expect(result).toEqual({ ok: true, value: 'C00158' });
      expect(mockRequest.mock.calls[0][0]).toBe('http://rest.kegg.jp/find/compound/citric%20acid');
      expect(mockRequest.mock.calls[0][1]).toMatchObject({
        headersTimeout: 10000,
        headers: expect.objectContaining({ Accept: 'text/plain' }),
      });
    });

    it('should report NOT_FOUND for an empty body', async () => {
      mockRequest.mockResolvedValueOnce(textResponse(200, '\n'));

      const result = await createSource().resolveId('unobtainium');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('NOT_FOUND');
      }
    });

    it('should report TIMEOUT when the search deadline passes', async () => {
      mockRequest.mockRejectedValueOnce(timeoutError());

      const result = await createSource().resolveId('citric acid');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('TIMEOUT');
        expect(result.error.message).toBe(
          'Request to http://rest.kegg.jp/find/compound/citric%20acid timed out after 10000ms'
        );
      }
    });
  });

  describe('fetchRecord', () => {
    it('should report the two requests separately', async () => {
      mockRequest.mockResolvedValueOnce(textResponse(200, keggEntry('C00158', 'Citrate;')));
      mockRequest.mockResolvedValueOnce(textResponse(404, ''));

      const result = await createSource().fetchRecord('C00158');

      expect(mockRequest.mock.calls.map((call) => call[0])).toEqual([
        'http://rest.kegg.jp/get/cpd:C00158',
        'http://rest.kegg.jp/link/pathway/cpd:C00158',
      ]);
      expect(result.info).toEqual({
        ok: true,
        value: { type: 'primary', description: 'NAME        Citrate;' },
      });
      expect(result.pathways.ok).toBe(false);
    });
  });

  describe('lookup', () => {
    it('should combine type, description and pathways', async () => {
      mockRequest.mockResolvedValueOnce(textResponse(200, keggFind('C00389', 'Quercetin')));
      mockRequest.mockResolvedValueOnce(
        textResponse(
          200,
          keggEntry('C00389', 'Quercetin;', ['Secondary metabolites [BR:br08003]'])
        )
      );
      mockRequest.mockResolvedValueOnce(textResponse(200, keggLinks('C00389', 'map00944', 'map01110')));

      const record = await createSource().lookup('quercetin');

      expect(record).toEqual({
        status: 'found',
        data: {
          kegg_id: 'C00389',
          type: 'secondary',
          description: 'NAME        Quercetin;',
          kegg_pathways: ['map00944', 'map01110'],
        },
      });
    });

    it('should not fetch details when the search finds nothing', async () => {
      mockRequest.mockResolvedValueOnce(textResponse(200, ''));

      const record = await createSource().lookup('unobtainium');

      expect(record).toEqual({
        status: 'id_not_found',
        cause: {
          code: 'NOT_FOUND',
          message: 'No KEGG compound matches "unobtainium"',
          source: 'kegg',
        },
      });
      expect(mockRequest).toHaveBeenCalledTimes(1);
    });

    it('should drop both results when either request fails', async () => {
      mockRequest.mockResolvedValueOnce(textResponse(200, keggFind('C00158', 'Citrate')));
      mockRequest.mockResolvedValueOnce(textResponse(500, 'Internal Server Error'));
      mockRequest.mockResolvedValueOnce(textResponse(200, keggLinks('C00158', 'map00020')));

      const record = await createSource().lookup('citrate');

      expect(record).toEqual({
        status: 'error',
        error: {
          code: 'REQUEST_ERROR',
          message: 'HTTP 500 for http://rest.kegg.jp/get/cpd:C00158',
          source: 'kegg',
          status: 500,
        },
      });
      expect(mockRequest).toHaveBeenCalledTimes(3);
    });

    it('should keep the surviving request with partial results enabled', async () => {
      mockRequest.mockResolvedValueOnce(textResponse(200, keggFind('C00158', 'Citrate')));
      mockRequest.mockResolvedValueOnce(textResponse(500, 'Internal Server Error'));
      mockRequest.mockResolvedValueOnce(textResponse(200, keggLinks('C00158', 'map00020')));

      const record = await createSource({ partialResults: true }).lookup('citrate');

      expect(record.status).toBe('partial');
      if (record.status === 'partial') {
        expect(record.data).toEqual({ kegg_id: 'C00158', kegg_pathways: ['map00020'] });
        expect(record.error.status).toBe(500);
      }
    });

    it('should report an error when both requests fail with partial results enabled', async () => {
      mockRequest.mockResolvedValueOnce(textResponse(200, keggFind('C00158', 'Citrate')));
      mockRequest.mockRejectedValueOnce(timeoutError());
      mockRequest.mockRejectedValueOnce(timeoutError());

      const record = await createSource({ partialResults: true }).lookup('citrate');

      expect(record.status).toBe('error');
      if (record.status === 'error') {
        expect(record.error.code).toBe('TIMEOUT');
      }
    });
  });
});

describe('parseFindResponse', () => {
  it('should skip leading empty lines', () => {
    expect(parseFindResponse('\n\ncpd:C00022\tPyruvate; Pyruvic acid\n', 'pyruvate')).toEqual({
      ok: true,
      value: 'C00022',
    });
  });

  it('should split on any whitespace after the ID', () => {
    expect(parseFindResponse('cpd:C00031   D-Glucose', 'glucose')).toEqual({
      ok: true,
      value: 'C00031',
    });
  });

  it('should reject a first line without a database prefix', () => {
    const result = parseFindResponse('C00031\tD-Glucose\n', 'glucose');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PARSE_ERROR');
    }
  });
});

describe('parseCompoundInfo', () => {
  it('should mark records mentioning secondary metabolites as secondary', () => {
    const body = keggEntry('C06160', 'Caffeine;', ['Secondary metabolites [BR:br08003]']);

    expect(parseCompoundInfo(body).type).toBe('secondary');
  });

  it('should default to primary', () => {
    expect(parseCompoundInfo(keggEntry('C00031', 'D-Glucose;')).type).toBe('primary');
  });

  it('should use an empty description for single-line records', () => {
    expect(parseCompoundInfo('ENTRY       C00031')).toEqual({
      type: 'primary',
      description: '',
    });
  });
});

describe('parsePathwayLinks', () => {
  it('should strip the path: prefix and collapse duplicates', () => {
    const body = 'cpd:C00031\tpath:map00010\ncpd:C00031\tpath:map00500\ncpd:C00031\tpath:map00010\n';

    expect(parsePathwayLinks(body)).toEqual({ ok: true, value: ['map00010', 'map00500'] });
  });

  it('should return no codes for an empty body', () => {
    expect(parsePathwayLinks('')).toEqual({ ok: true, value: [] });
  });

  it('should reject lines without a tab', () => {
    const result = parsePathwayLinks('cpd:C00031 path:map00010\n');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PARSE_ERROR');
    }
  });
});
