import { AxiosInstance } from 'axios';
import { createHttpClient, describeHttpError } from '../utils/httpClient';
import { log } from '../utils/logger';
import { asNumber, readPath } from './parserSupport';

export const REDDIT_USER_AGENT = 'LeadRadarBot/1.0';
export const REDDIT_TIMEOUT_MS = 10_000;

export interface PostTimeLookup {
  /** Resolves the post's creation time, or null when it cannot be verified. */
  fetchCreatedAt(url: string): Promise<Date | null>;
}

export const postJsonUrl = (url: string): string => `${url.trim().replace(/\/+$/, '')}.json`;

// [0].data.children[0].data.created_utc, in epoch seconds
export const parseCreatedUtc = (payload: unknown): Date | null => {
  const seconds = asNumber(readPath(payload, [0, 'data', 'children', 0, 'data', 'created_utc']));
  if (seconds === undefined || seconds <= 0) return null;
  return new Date(seconds * 1000);
};

export class RedditClient implements PostTimeLookup {
  constructor(private readonly http: AxiosInstance = createHttpClient({ timeoutMs: REDDIT_TIMEOUT_MS, userAgent: REDDIT_USER_AGENT })) {}

  async fetchCreatedAt(url: string): Promise<Date | null> {
    try {
      const { data } = await this.http.get<unknown>(postJsonUrl(url), {
        headers: { 'user-agent': REDDIT_USER_AGENT },
        timeout: REDDIT_TIMEOUT_MS,
      });
      const createdAt = parseCreatedUtc(data);
      if (!createdAt) log('WARN', 'reddit post has no created_utc', url);
      return createdAt;
    } catch (error) {
      log('WARN', 'reddit post lookup failed', `${url}: ${describeHttpError(error)}`);
      return null;
    }
  }
}
