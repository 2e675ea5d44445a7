import { PostTimeLookup } from '../adapters/reddit';
import { DAY_MS } from '../core/recencyFilter';
import { isForumLink } from '../core/leadSource';
import { Lead } from '../core/types';
import { LeadStore } from '../storage/leadStore';
import { log } from '../utils/logger';
import { RateLimiter } from '../utils/rateLimiter';

export type CleanupReason = 'reddit_missing_date' | 'reddit_too_old';

export interface CleanupCandidate {
  id: number;
  websiteUrl: string;
  template: string;
  reason: CleanupReason;
}

export interface CleanupReport {
  scanned: number;
  candidates: CleanupCandidate[];
  reasons: Partial<Record<CleanupReason, number>>;
  deleted: number;
  applied: boolean;
}

export interface CleanupOptions {
  apply?: boolean;
  maxAgeDays?: number;
  now?: Date;
  delayMs?: number;
}

export const isForumLead = (lead: Pick<Lead, 'websiteUrl' | 'leadSource'>): boolean =>
  lead.leadSource === 'reddit' || isForumLink(lead.websiteUrl);

/**
 * Re-checks every forum lead's post time and flags the ones that are missing
 * or past `maxAgeDays`. Nothing is deleted unless `apply` is set.
 */
export const cleanupStaleLeads = async (
  store: LeadStore,
  lookup: PostTimeLookup,
  { apply = false, maxAgeDays = 60, now = new Date(), delayMs = 150 }: CleanupOptions = {},
): Promise<CleanupReport> => {
  const leads = await store.getAllLeads();
  const throttle = new RateLimiter(delayMs);
  const cutoff = now.getTime() - maxAgeDays * DAY_MS;
  const candidates: CleanupCandidate[] = [];
  const reasons: Partial<Record<CleanupReason, number>> = {};

  for (const lead of leads) {
    if (!isForumLead(lead)) continue;
    await throttle.wait();
    const createdAt = await lookup.fetchCreatedAt(lead.websiteUrl);

    let reason: CleanupReason | undefined;
    if (!createdAt) reason = 'reddit_missing_date';
    else if (createdAt.getTime() < cutoff) reason = 'reddit_too_old';
    if (!reason) continue;

    candidates.push({ id: lead.id, websiteUrl: lead.websiteUrl, template: lead.template, reason });
    reasons[reason] = (reasons[reason] ?? 0) + 1;
  }

  const deleted = apply ? await store.deleteLeads(candidates.map((candidate) => candidate.id)) : 0;
  log('INFO', `cleanup scanned ${leads.length} leads, flagged ${candidates.length}`, { reasons, deleted, applied: apply });
  return { scanned: leads.length, candidates, reasons, deleted, applied: apply };
};
