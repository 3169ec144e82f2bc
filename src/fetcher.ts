import { EmptyResponseError, FetchFailureError } from './errors.js';

/**
 * Options for fetching the docs page
 */
export interface FetchDocsOptions {
  /** Fetch implementation (default: global fetch) */
  fetchFn?: typeof fetch;
}

/**
 * Download the docs page in a single attempt.
 * Throws FetchFailureError on a non-2xx status and EmptyResponseError on an empty body.
 */
export async function fetchDocs(url: string, options: FetchDocsOptions = {}): Promise<string> {
  const { fetchFn = fetch } = options;

  const response = await fetchFn(url);
  if (!response.ok) {
    throw new FetchFailureError(url, response.status, response.statusText);
  }

  const html = await response.text();
  if (html === '') {
    throw new EmptyResponseError(url);
  }

  return html;
}
