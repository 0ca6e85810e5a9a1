import { Client, errors } from '@elastic/elasticsearch';
import { SearchBackendError } from '../errors.js';
import type {
  MultiSearchParams,
  MultiSearchResponse,
  SearchClient,
  SearchParams,
  SearchResponse,
} from '../types.js';

export interface ManagedSearchClient extends SearchClient {
  close(): Promise<void>;
}

function indexPath(index: string | string[] | undefined): string {
  if (index === undefined) return '';
  const joined = typeof index === 'string' ? index : index.join(',');
  return joined === '' ? '' : `/${encodeURIComponent(joined)}`;
}

function backendError(operation: string, err: unknown): SearchBackendError {
  const statusCode = err instanceof errors.ResponseError ? err.statusCode : undefined;
  return new SearchBackendError(`Elasticsearch ${operation} failed: ${String(err)}`, err, statusCode);
}

/**
 * SearchClient over the official Elasticsearch client. Bodies are sent as
 * built, through the transport, so nothing is reshaped on the way out.
 */
export class ElasticsearchSearchClient implements ManagedSearchClient {
  constructor(private readonly client: Client) {}

  async search(params: SearchParams): Promise<SearchResponse> {
    try {
      return await this.client.transport.request<SearchResponse>({
        method: 'POST',
        path: `${indexPath(params.index)}/_search`,
        body: params.body ?? {},
      });
    } catch (err) {
      throw backendError('search', err);
    }
  }

  async msearch(params: MultiSearchParams): Promise<MultiSearchResponse> {
    try {
      return await this.client.transport.request<MultiSearchResponse>({
        method: 'POST',
        path: '/_msearch',
        bulkBody: params.body,
      });
    } catch (err) {
      throw backendError('msearch', err);
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
