import { PageTextFetcher } from '../adapters/pageText';
import { PostTimeLookup } from '../adapters/reddit';
import { keywordMatch } from '../core/relevanceFilter';
import { isKnownTemplate, getTemplate } from '../core/templates';
import { LeadStore } from '../storage/leadStore';
import { log } from '../utils/logger';
import { RateLimiter } from '../utils/rateLimiter';
import { isForumLead } from './cleanup';

export const templateKeywords = (name: string): string[] => (isKnownTemplate(name) ? getTemplate(name).keywords : []);

/** Fills in post times for forum leads; returns how many rows changed. */
export const backfillPostDates = async (store: LeadStore, lookup: PostTimeLookup, { delayMs = 200 }: { delayMs?: number } = {}): Promise<number> => {
  const throttle = new RateLimiter(delayMs);
  let updated = 0;
  for (const lead of await store.getAllLeads()) {
    if (!isForumLead(lead)) continue;
    await throttle.wait();
    const postCreatedAt = await lookup.fetchCreatedAt(lead.websiteUrl);
    if (!postCreatedAt) continue;
    if (await store.updateLeadSignals(lead.id, { postCreatedAt })) updated += 1;
  }
  log('INFO', `post date backfill updated ${updated} leads`);
  return updated;
};

/**
 * Recomputes keyword_match from the page text, company name and URL. Leads
 * whose template is gone match vacuously.
 */
export const backfillKeywordMatch = async (store: LeadStore, fetchText: PageTextFetcher, { delayMs = 100 }: { delayMs?: number } = {}): Promise<number> => {
  const throttle = new RateLimiter(delayMs);
  let updated = 0;
  for (const lead of await store.getAllLeads()) {
    await throttle.wait();
    const pageText = await fetchText(lead.websiteUrl);
    const matched = keywordMatch({ title: lead.companyName ?? '', snippet: pageText, link: lead.websiteUrl }, templateKeywords(lead.template));
    if (await store.updateLeadSignals(lead.id, { keywordMatch: matched })) updated += 1;
  }
  log('INFO', `keyword match backfill updated ${updated} leads`);
  return updated;
};
