import pLimit from 'p-limit';
import { PostTimeLookup } from '../adapters/reddit';
import { log } from '../utils/logger';
import { RateLimiter } from '../utils/rateLimiter';
import { errorMessage } from './errors';
import { isForumLink } from './leadSource';
import { SearchResult } from './types';

export const DAY_MS = 24 * 60 * 60 * 1000;

export interface RecencyOptions {
  lookup: PostTimeLookup;
  now?: Date;
  concurrency?: number;
  minIntervalMs?: number;
}

export interface RecencyOutcome<T> {
  kept: T[];
  originTimes: Map<string, Date>;
  dropped: number;
}

type Verdict = { keep: false } | { keep: true; createdAt?: Date };

/**
 * Forum posts only survive when their creation time can be resolved and falls
 * inside the window; an unverifiable post is dropped. Other results pass.
 */
export const filterByRecency = async <T extends Pick<SearchResult, 'link'>>(
  results: T[],
  maxAgeDays: number,
  { lookup, now = new Date(), concurrency = 1, minIntervalMs = 200 }: RecencyOptions,
): Promise<RecencyOutcome<T>> => {
  const limit = pLimit(Math.max(1, Math.floor(concurrency)));
  const throttle = new RateLimiter(minIntervalMs);
  const maxAgeMs = maxAgeDays * DAY_MS;

  const checkPost = async (link: string): Promise<Verdict> => {
    await throttle.wait();
    let createdAt: Date | null;
    try {
      createdAt = await lookup.fetchCreatedAt(link);
    } catch (error) {
      log('WARN', 'post time lookup threw', `${link}: ${errorMessage(error)}`);
      return { keep: false };
    }
    if (!createdAt) return { keep: false };
    if (now.getTime() - createdAt.getTime() > maxAgeMs) return { keep: false };
    return { keep: true, createdAt };
  };

  const verdicts = await Promise.all(
    results.map((result): Promise<Verdict> => (isForumLink(result.link) ? limit(() => checkPost(result.link)) : Promise.resolve({ keep: true }))),
  );

  const kept: T[] = [];
  const originTimes = new Map<string, Date>();
  verdicts.forEach((verdict, index) => {
    if (!verdict.keep) return;
    const result = results[index];
    kept.push(result);
    if (verdict.createdAt) originTimes.set(result.link, verdict.createdAt);
  });

  const dropped = results.length - kept.length;
  if (dropped > 0) log('INFO', `recency filter dropped ${dropped} forum posts`, { maxAgeDays });
  return { kept, originTimes, dropped };
};
