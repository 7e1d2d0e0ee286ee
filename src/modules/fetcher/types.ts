/**
 * Fetcher Types.
 *
 * Purpose: Inputs and outputs of the page fetcher.
 */

export const DEFAULT_API_URL = "https://api.stackexchange.com/2.2";
export const DEFAULT_SITE = "stackoverflow";
/** The API refuses larger pages. */
export const MAX_PAGE_SIZE = 100;

/** The subset of `Response` the fetcher reads; global `fetch` satisfies it. */
export interface HttpResponse {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  text(): Promise<string>;
}

export type HttpGet = (url: string) => Promise<HttpResponse>;

export interface PageQueryInput {
  readonly page: number;
  readonly pageSize: number;
  readonly tag: string;
  readonly from: Date;
  readonly to: Date;
  readonly site: string;
  /** Raises the daily quota when present. */
  readonly apiKey: string | null;
}

export interface FetchInput {
  readonly baseDir: string;
  readonly tags: readonly string[];
  readonly from: Date;
  readonly to: Date;
  readonly site: string;
  readonly pageSize: number;
  readonly apiKey: string | null;
  readonly apiUrl: string;
}

export interface FetchTagSummary {
  readonly tag: string;
  readonly dir: string;
  readonly pages: number;
  readonly items: number;
  /** Quota left after the last page, when the API reported it. */
  readonly quotaRemaining: number | null;
}
