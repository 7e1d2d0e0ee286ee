/**
 * Fetcher Service.
 *
 * Purpose: Download every `/questions` page of a tag and save the raw replies
 * under `baseDir/<tag>/soNNN.json`.
 * Context: Produces the layout the snapshot reader consumes.
 *
 * Invariants:
 * - The tag directory is emptied before the first page is written; a tag that
 *   would name anything but a direct child of `baseDir` is refused first.
 * - Pages are fetched one at a time until a reply has `has_more: false`.
 * - The raw body is written as received, before it is validated.
 * - No retries; the first failure ends the run.
 */
import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { DetailedError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { ErrResult, OkResult, toError, type Result } from "../../utils/result";
import { parseSnapshot, tagDirectory } from "../snapshots";
import { buildPageUrl, pageFileName } from "./query";
import type { FetchInput, FetchTagSummary, HttpGet, HttpResponse } from "./types";

const log = createLogger("fetch");

export class FetchError extends DetailedError {
  constructor(
    message: string,
    public readonly status: number | null = null,
    details: readonly string[] = [],
  ) {
    super(message, details);
    this.name = "FetchError";
  }
}

const defaultHttpGet: HttpGet = (url) => fetch(url);

/** Pulls `error_message` out of an API error body when there is one. */
function apiErrorDetail(body: string): string[] {
  try {
    const parsed: unknown = JSON.parse(body);
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "error_message" in parsed &&
      typeof parsed.error_message === "string"
    ) {
      return [parsed.error_message];
    }
  } catch {
    // Not JSON: fall back to the raw body below.
  }
  return body ? [body.slice(0, 200)] : [];
}

export class FetcherService {
  constructor(private readonly httpGet: HttpGet = defaultHttpGet) {}

  private async getPage(url: string): Promise<string> {
    let response: HttpResponse;
    try {
      response = await this.httpGet(url);
    } catch (error) {
      throw new FetchError(`Request failed: ${url}`, null, [toError(error).message]);
    }

    const body = await response.text();
    if (!response.ok) {
      throw new FetchError(
        `Request returned ${response.status} ${response.statusText}: ${url}`,
        response.status,
        apiErrorDetail(body),
      );
    }
    return body;
  }

  async fetchTag(input: FetchInput, tag: string): Promise<Result<FetchTagSummary, Error>> {
    try {
      const dir = tagDirectory(input.baseDir, tag);
      await rm(dir, { recursive: true, force: true });
      await mkdir(dir, { recursive: true });
      log.info(`Fetching tag '${tag}' to dir '${dir}'`);

      let items = 0;
      let quotaRemaining: number | null = null;

      for (let page = 1; ; page++) {
        const url = buildPageUrl(input.apiUrl, {
          page,
          pageSize: input.pageSize,
          tag,
          from: input.from,
          to: input.to,
          site: input.site,
          apiKey: input.apiKey,
        });
        log.debug(url);

        const body = await this.getPage(url);
        const filePath = path.join(dir, pageFileName(page));
        await writeFile(filePath, body, "utf8");
        log.info(`Wrote ${filePath}`);

        const reply = parseSnapshot(body, filePath);
        items += reply.items.length;
        quotaRemaining = reply.quota_remaining ?? quotaRemaining;

        if (!reply.has_more) {
          return OkResult({ tag, dir, pages: page, items, quotaRemaining });
        }
      }
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async fetchTags(input: FetchInput): Promise<Result<FetchTagSummary[], Error>> {
    try {
      await mkdir(input.baseDir, { recursive: true });
    } catch (error) {
      return ErrResult(toError(error));
    }

    const summaries: FetchTagSummary[] = [];
    for (const tag of input.tags) {
      const result = await this.fetchTag(input, tag);
      if (result.isErr()) return ErrResult(result.error);

      const summary = result.unwrap();
      log.info(
        `Tag '${tag}': ${summary.items} item(s) in ${summary.pages} page(s)` +
          (summary.quotaRemaining === null ? "" : `, quota remaining ${summary.quotaRemaining}`),
      );
      summaries.push(summary);
    }
    return OkResult(summaries);
  }
}

export const fetcherService = new FetcherService();
