/**
 * Fetcher Module.
 *
 * Purpose: Save the paginated `/questions` replies of each tag to disk.
 */

export { fetcherService, FetcherService, FetchError } from "./service";
export { buildPageQuery, buildPageUrl, pageFileName } from "./query";
export { DEFAULT_API_URL, DEFAULT_SITE, MAX_PAGE_SIZE } from "./types";
export type {
  FetchInput,
  FetchTagSummary,
  HttpGet,
  HttpResponse,
  PageQueryInput,
} from "./types";
