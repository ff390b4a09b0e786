import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { FetchError, getErrorMessage } from '../../types/errors.js';
import type { FetchedPage, PageFetcher } from './PageFetcher.js';

export interface HttpPageFetcherOptions {
  userAgent: string;
  timeoutMs: number;
  /** Defaults to a fresh axios instance; tests pass one with a stub adapter */
  client?: AxiosInstance;
}

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

const ACCEPT_HTML = 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.5';

/**
 * Crawler identity and timeout go on every request, so a shared client passed in
 * by the caller is left untouched.
 */
export class HttpPageFetcher implements PageFetcher {
  private readonly client: AxiosInstance;

  constructor(private readonly options: HttpPageFetcherOptions) {
    this.client = options.client ?? axios.create({ maxRedirects: 5 });
  }

  async fetch(url: string): Promise<FetchedPage> {
    let response: AxiosResponse<string>;
    try {
      response = await this.client.get<string>(url, {
        headers: { 'User-Agent': this.options.userAgent, Accept: ACCEPT_HTML },
        timeout: this.options.timeoutMs,
        responseType: 'text',
        validateStatus: () => true,
      });
    } catch (error) {
      // No response at all: DNS, refused connection, timeout
      throw new FetchError(url, `Request failed: ${getErrorMessage(error)}`, { retryable: true, cause: error });
    }

    if (response.status >= 400) {
      throw new FetchError(url, `HTTP ${response.status} for ${url}`, { statusCode: response.status });
    }

    const contentTypeHeader = response.headers['content-type'];
    const contentType = typeof contentTypeHeader === 'string' ? contentTypeHeader.toLowerCase() : null;
    if (contentType && !HTML_CONTENT_TYPES.some((type) => contentType.includes(type))) {
      throw new FetchError(url, `Unsupported content type '${contentType}' for ${url}`, {
        statusCode: response.status,
        retryable: false,
      });
    }

    const redirectedTo: unknown = response.request?.res?.responseUrl;
    return {
      url,
      finalUrl: typeof redirectedTo === 'string' ? redirectedTo : url,
      statusCode: response.status,
      contentType,
      rawContent: typeof response.data === 'string' ? response.data : String(response.data ?? ''),
    };
  }
}
