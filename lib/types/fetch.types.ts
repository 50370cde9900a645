export type FetchBackend = 'browser' | 'http';

export interface FetchedPage {
  html: string;
  statusCode: number;
}

/**
 * Source of raw page HTML.
 * Implementations reject with a `FetchError` on timeout, transport failure
 * or an error status; they never resolve with partial content.
 */
export interface PageFetcher {
  readonly backend: FetchBackend;
  fetch(url: string, timeoutSeconds: number, requestId: string): Promise<FetchedPage>;
}
