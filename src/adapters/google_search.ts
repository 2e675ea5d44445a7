import { AxiosInstance } from 'axios';
import { SearchResult } from '../core/types';
import { createHttpClient, describeHttpError } from '../utils/httpClient';
import { log } from '../utils/logger';
import { sleep } from '../utils/rateLimiter';
import { asArray, asString, isRecord } from './parserSupport';

export const CSE_URL = 'https://www.googleapis.com/customsearch/v1';
export const CSE_PAGE_SIZE = 10;

export interface SearchPageOptions {
  num?: number;
  start?: number;
  dateRestrict?: string; // e.g. "d30"
}

export interface WebSearch {
  searchMultiplePages(query: string, totalResults: number, delayMs?: number): Promise<SearchResult[]>;
}

export const parseSearchItems = (payload: unknown): SearchResult[] =>
  asArray(isRecord(payload) ? payload.items : undefined)
    .filter(isRecord)
    .map((item) => ({
      title: asString(item.title) ?? '',
      snippet: asString(item.snippet) ?? '',
      link: asString(item.link) ?? '',
      displayLink: asString(item.displayLink) ?? '',
      origin: 'cse' as const,
    }));

export class GoogleSearchClient implements WebSearch {
  constructor(
    private readonly apiKey: string,
    private readonly cseId: string,
    private readonly http: AxiosInstance = createHttpClient({ timeoutMs: 30000 }),
  ) {}

  async search(query: string, { num = CSE_PAGE_SIZE, start = 1, dateRestrict }: SearchPageOptions = {}): Promise<SearchResult[]> {
    const params: Record<string, string | number> = {
      key: this.apiKey,
      cx: this.cseId,
      q: query,
      num: Math.min(Math.max(1, num), CSE_PAGE_SIZE),
      start,
    };
    if (dateRestrict) params.dateRestrict = dateRestrict;

    try {
      const { data } = await this.http.get<unknown>(CSE_URL, { params });
      return parseSearchItems(data);
    } catch (error) {
      log('WARN', 'search request failed', `start=${start}: ${describeHttpError(error)}`);
      return [];
    }
  }

  /** Pages sequentially, stopping early at the first empty page. */
  async searchMultiplePages(query: string, totalResults: number, delayMs = 500): Promise<SearchResult[]> {
    const pages = Math.ceil(Math.max(0, totalResults) / CSE_PAGE_SIZE);
    const all: SearchResult[] = [];

    for (let page = 0; page < pages; page += 1) {
      const start = page * CSE_PAGE_SIZE + 1;
      const results = await this.search(query, { num: CSE_PAGE_SIZE, start });
      if (results.length === 0) {
        log('INFO', `no more search results at page ${page + 1}`);
        break;
      }
      all.push(...results);
      if (page < pages - 1 && delayMs > 0) await sleep(delayMs);
    }

    log('INFO', `retrieved ${all.length} search results`, { pages });
    return all;
  }
}
