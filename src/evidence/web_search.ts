import { z } from "zod";

import { createDefaultLogger, errorMessage, type RelayLogger } from "../lib/log";

export type SearchResult = {
  title: string;
  url: string;
  snippet: string;
};

export interface WebSearchClient {
  readonly configured: boolean;
  search(query: string, num?: number): Promise<SearchResult[]>;
  searchMany(queries: string[], num?: number): Promise<SearchResult[]>;
}

const SearchResponse = z.object({
  items: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional(),
      })
    )
    .optional(),
});

export const MAX_LISTED_RESULTS = 7;
const SKIPPED_HOSTS = ["youtube.com"];

type GoogleSearchOptions = {
  apiKey?: string;
  cx?: string;
  baseUrl?: string;
  timeoutMs?: number;
  log?: RelayLogger;
  fetchImpl?: typeof fetch;
};

/**
 * Google Custom Search JSON API. Failed lookups read as "no results".
 */
export class GoogleSearchClient implements WebSearchClient {
  private apiKey?: string;
  private cx?: string;
  private baseUrl: string;
  private timeoutMs: number;
  private log: RelayLogger;
  private fetchImpl: typeof fetch;

  constructor(opts: GoogleSearchOptions = {}) {
    this.apiKey = opts.apiKey;
    this.cx = opts.cx;
    this.baseUrl = opts.baseUrl ?? "https://www.googleapis.com/customsearch/v1";
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.log = opts.log ?? createDefaultLogger();
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  get configured(): boolean {
    return Boolean(this.apiKey && this.cx);
  }

  async search(query: string, num = 5): Promise<SearchResult[]> {
    if (!this.apiKey || !this.cx) {
      this.log.warn({}, "web_search.not_configured");
      return [];
    }

    const url = new URL(this.baseUrl);
    url.searchParams.set("key", this.apiKey);
    url.searchParams.set("cx", this.cx);
    url.searchParams.set("q", query);
    url.searchParams.set("num", String(num));

    let payload: unknown;
    try {
      const res = await this.fetchImpl(url.toString(), { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!res.ok) {
        this.log.error({ statusCode: res.status, query }, "web_search.http_error");
        return [];
      }
      payload = await res.json();
    } catch (error) {
      this.log.error({ error: errorMessage(error), query }, "web_search.request_failed");
      return [];
    }

    const parsed = SearchResponse.safeParse(payload);
    if (!parsed.success) {
      this.log.warn({ query }, "web_search.response_invalid");
      return [];
    }

    const results = (parsed.data.items ?? []).map((item) => ({
      title: item.title ?? "No title",
      url: item.link ?? "",
      snippet: item.snippet ?? "",
    }));
    this.log.info({ query, results: results.length }, "web_search.completed");
    return results;
  }

  async searchMany(queries: string[], num = 5): Promise<SearchResult[]> {
    const batches = await Promise.all(queries.map((query) => this.search(query, num)));

    const seen = new Set<string>();
    const unique: SearchResult[] = [];
    for (const result of batches.flat()) {
      if (!result.url || seen.has(result.url)) continue;
      seen.add(result.url);
      unique.push(result);
    }
    return unique;
  }
}

const isSkipped = (url: string) => SKIPPED_HOSTS.some((host) => url.includes(host));

export function formatSearchResults(queries: string[], results: SearchResult[]): string {
  const joined = queries.join(", ");
  if (results.length === 0) {
    return `No search results found for: ${joined}`;
  }

  const lines = [`Search results for: ${joined}`, ""];
  results
    .slice(0, MAX_LISTED_RESULTS)
    .filter((result) => !isSkipped(result.url))
    .forEach((result, index) => {
      lines.push(`${index + 1}. ${result.title}`);
      lines.push(`   URL: ${result.url}`);
      lines.push(`   ${result.snippet || "No description"}`);
      lines.push("");
    });
  return lines.join("\n");
}
