import axios, { type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { FetchError } from '../../../types/errors';
import { HttpPageFetcher } from '../HttpPageFetcher';

interface StubReply {
  status?: number;
  contentType?: string;
  body?: string;
  responseUrl?: string;
}

function stubClient(reply: StubReply | Error, seen: InternalAxiosRequestConfig[] = []) {
  const adapter: AxiosAdapter = async (config) => {
    seen.push(config);
    if (reply instanceof Error) {
      throw reply;
    }
    const response: AxiosResponse<string> = {
      data: reply.body ?? '',
      status: reply.status ?? 200,
      statusText: '',
      headers: reply.contentType ? { 'content-type': reply.contentType } : {},
      config,
      request: reply.responseUrl ? { res: { responseUrl: reply.responseUrl } } : {},
    };
    return response;
  };
  return axios.create({ adapter });
}

function makeFetcher(reply: StubReply | Error, seen?: InternalAxiosRequestConfig[]): HttpPageFetcher {
  return new HttpPageFetcher({ userAgent: 'test-agent', timeoutMs: 1000, client: stubClient(reply, seen) });
}

async function fetchError(fetcher: HttpPageFetcher, url: string): Promise<FetchError> {
  try {
    await fetcher.fetch(url);
  } catch (error) {
    if (error instanceof FetchError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected fetch to fail');
}

describe('HttpPageFetcher', () => {
  it('returns the body of an HTML page', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const fetcher = makeFetcher({ contentType: 'text/html; charset=utf-8', body: '<p>Hi</p>' }, seen);

    await expect(fetcher.fetch('https://example.com/')).resolves.toEqual({
      url: 'https://example.com/',
      finalUrl: 'https://example.com/',
      statusCode: 200,
      contentType: 'text/html; charset=utf-8',
      rawContent: '<p>Hi</p>',
    });
    expect(seen[0].headers.get('User-Agent')).toBe('test-agent');
  });

  it('sends crawler headers per request without changing a shared client', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = stubClient({ contentType: 'text/html', body: '' }, seen);
    const fetcher = new HttpPageFetcher({ userAgent: 'test-agent', timeoutMs: 1000, client });

    await fetcher.fetch('https://example.com/');

    expect(client.defaults.headers.common['User-Agent']).toBeUndefined();
    expect(client.defaults.headers.common['Accept']).toBe('application/json, text/plain, */*');
    expect(seen[0].headers.get('Accept')).toBe('text/html,application/xhtml+xml;q=0.9,*/*;q=0.5');
    expect(seen[0].timeout).toBe(1000);
  });

  it('reports the URL reached after redirects', async () => {
    const fetcher = makeFetcher({ contentType: 'text/html', responseUrl: 'https://example.com/landing' });

    const page = await fetcher.fetch('https://example.com/start');
    expect(page.finalUrl).toBe('https://example.com/landing');
  });

  it('accepts responses without a content type', async () => {
    const page = await makeFetcher({ body: '<p>Hi</p>' }).fetch('https://example.com/');
    expect(page.contentType).toBeNull();
  });

  it('rejects client errors as not retryable', async () => {
    const error = await fetchError(makeFetcher({ status: 404 }), 'https://example.com/missing');

    expect(error.message).toBe('HTTP 404 for https://example.com/missing');
    expect(error.httpStatus).toBe(404);
    expect(error.retryable).toBe(false);
  });

  it('rejects server errors as retryable', async () => {
    const error = await fetchError(makeFetcher({ status: 503 }), 'https://example.com/');
    expect(error.retryable).toBe(true);
  });

  it('rejects non-HTML content', async () => {
    const error = await fetchError(makeFetcher({ contentType: 'application/pdf' }), 'https://example.com/file.pdf');

    expect(error.message).toBe("Unsupported content type 'application/pdf' for https://example.com/file.pdf");
    expect(error.retryable).toBe(false);
  });

  it('wraps network failures as retryable fetch errors', async () => {
    const error = await fetchError(makeFetcher(new Error('connect ECONNREFUSED')), 'https://example.com/');

    expect(error.message).toBe('Request failed: connect ECONNREFUSED');
    expect(error.retryable).toBe(true);
    expect(error.url).toBe('https://example.com/');
  });
});
