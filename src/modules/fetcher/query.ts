import { toUnixSeconds } from "../../utils/dates";
import type { PageQueryInput } from "./types";

/** Query string of one `/questions` page, newest activity first. */
export function buildPageQuery(input: PageQueryInput): string {
  const params = new URLSearchParams();
  params.set("page", String(input.page));
  params.set("pagesize", String(input.pageSize));
  params.set("fromdate", String(toUnixSeconds(input.from)));
  params.set("todate", String(toUnixSeconds(input.to)));
  params.set("order", "desc");
  params.set("sort", "activity");
  params.set("tagged", input.tag);
  params.set("site", input.site);
  if (input.apiKey) params.set("key", input.apiKey);
  return params.toString();
}

export function buildPageUrl(apiUrl: string, input: PageQueryInput): string {
  return `${apiUrl.replace(/\/+$/, "")}/questions?${buildPageQuery(input)}`;
}

/** `so001.json`, `so002.json`, ... */
export const pageFileName = (page: number): string =>
  `so${String(page).padStart(3, "0")}.json`;
