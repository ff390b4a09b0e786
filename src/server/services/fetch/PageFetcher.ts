import type { RawAnchor } from '../../types/exploration.js';

export interface FetchedPage {
  url: string;
  /** URL after redirects; links on the page resolve against it */
  finalUrl: string;
  statusCode: number;
  contentType: string | null;
  rawContent: string;
  /** Anchors already extracted by the fetcher (e.g. from a rendered DOM). When absent they are parsed from rawContent. */
  anchors?: RawAnchor[];
}

/**
 * Retrieves one page. Implementations throw FetchError; retrying is the caller's job.
 */
export interface PageFetcher {
  fetch(url: string): Promise<FetchedPage>;
}
