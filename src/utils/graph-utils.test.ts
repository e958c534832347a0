import { GraphRequest } from '@microsoft/microsoft-graph-client';
import {
  buildGraphRequest,
  parseGraphResponse,
  mapGraphError,
  GRAPH_SELECT_FIELDS
} from './graph-utils';
import { QueryError } from '../services/base/errors';

// Records the query options applied through the fluent GraphRequest API
class MockGraphRequest {
  private params: Record<string, unknown> = {};

  select(value: string) {
    this.params.select = value;
    return this;
  }

  top(value: number) {
    this.params.top = value;
    return this;
  }

  getParams() {
    return this.params;
  }
}

const asGraphRequest = (mock: MockGraphRequest): GraphRequest => mock as unknown as GraphRequest;

describe('Graph Utilities', () => {
  describe('buildGraphRequest', () => {
    it('should join the application credential select fields', () => {
      const request = new MockGraphRequest();
      buildGraphRequest(asGraphRequest(request), { select: GRAPH_SELECT_FIELDS.APPLICATION_CREDENTIALS, top: 999 });

      expect(request.getParams()).toEqual({
        select: 'id,appId,displayName,tags,passwordCredentials',
        top: 999
      });
    });

    it('should skip an empty select list', () => {
      const request = new MockGraphRequest();
      buildGraphRequest(asGraphRequest(request), { select: [], top: 10 });

      expect(request.getParams()).toEqual({ top: 10 });
    });

    it('should handle empty options', () => {
      const request = new MockGraphRequest();
      buildGraphRequest(asGraphRequest(request), {});

      expect(request.getParams()).toEqual({});
    });
  });

  describe('parseGraphResponse', () => {
    it('should extract value and next link', () => {
      const response = {
        '@odata.count': 2,
        '@odata.nextLink': 'https://graph.microsoft.com/v1.0/applications?$skiptoken=abc',
        value: [{ id: '1' }, { id: '2' }]
      };

      expect(parseGraphResponse(response)).toEqual({
        data: [{ id: '1' }, { id: '2' }],
        nextLink: 'https://graph.microsoft.com/v1.0/applications?$skiptoken=abc'
      });
    });

    it('should return an empty page for null responses', () => {
      expect(parseGraphResponse(null)).toEqual({ data: [] });
      expect(parseGraphResponse(undefined)).toEqual({ data: [] });
    });

    it('should treat a non-array value as empty', () => {
      expect(parseGraphResponse({ value: null }).data).toEqual([]);
    });

    it('should pass direct arrays through', () => {
      expect(parseGraphResponse([{ id: 'a' }])).toEqual({ data: [{ id: 'a' }] });
    });

    it('should wrap a single object', () => {
      expect(parseGraphResponse({ id: 'single' })).toEqual({ data: [{ id: 'single' }] });
    });
  });

  describe('mapGraphError', () => {
    it('should map known Graph error codes', () => {
      const graphError = Object.assign(new Error('Insufficient privileges to complete the operation.'), {
        code: 'Authorization_RequestDenied',
        statusCode: 403
      });

      const error = mapGraphError(graphError);

      expect(error).toBeInstanceOf(QueryError);
      expect(error.message).toBe('Insufficient permissions to perform this operation');
      expect(error.cause).toBe(graphError);
    });

    it('should include the status code for unknown errors', () => {
      const graphError = Object.assign(new Error('Service unavailable'), { code: 'UnknownError', statusCode: 503 });

      expect(mapGraphError(graphError).message).toBe('Graph API error (503): Service unavailable');
    });

    it('should fall back to a generic message', () => {
      expect(mapGraphError({}).message).toBe('Graph API error: Unknown Graph API error');
    });

    it('should wrap network failures', () => {
      expect(mapGraphError(new TypeError('fetch failed')).message).toBe('Graph API error: fetch failed');
    });
  });
});
