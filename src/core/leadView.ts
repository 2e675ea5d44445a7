import { withScore } from './leadScorer';
import { Lead, ScoredLead } from './types';

export const LEAD_SORTS = ['newest', 'oldest', 'most_seen', 'has_email', 'has_phone', 'score'] as const;
export type LeadSort = (typeof LEAD_SORTS)[number];

export const isLeadSort = (value: unknown): value is LeadSort => LEAD_SORTS.some((sort) => sort === value);

export interface LeadViewOptions {
  sort?: LeadSort;
  q?: string;
  limit?: number;
  now?: Date;
}

const SEARCHABLE: (keyof Lead)[] = ['firstName', 'lastName', 'companyName', 'email', 'phone', 'websiteUrl'];

export const matchesText = (lead: Lead, q: string): boolean => {
  const needle = q.trim().toLowerCase();
  if (!needle) return true;
  return SEARCHABLE.some((field) => {
    const value = lead[field];
    return typeof value === 'string' && value.toLowerCase().includes(needle);
  });
};

const newestFirst = (a: Lead, b: Lead): number => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;

const COMPARATORS: Record<LeadSort, (a: ScoredLead, b: ScoredLead) => number> = {
  newest: newestFirst,
  oldest: (a, b) => -newestFirst(a, b),
  most_seen: (a, b) => b.timesSeen - a.timesSeen || newestFirst(a, b),
  has_email: (a, b) => Number(Boolean(b.email)) - Number(Boolean(a.email)) || newestFirst(a, b),
  has_phone: (a, b) => Number(Boolean(b.phone)) - Number(Boolean(a.phone)) || newestFirst(a, b),
  score: (a, b) => b.leadScore - a.leadScore || newestFirst(a, b),
};

/** Scores are derived from `now` on every read. */
export const buildLeadView = (leads: Lead[], { sort = 'newest', q = '', limit, now = new Date() }: LeadViewOptions = {}): ScoredLead[] => {
  const view = leads.filter((lead) => matchesText(lead, q)).map((lead) => withScore(lead, now));
  view.sort(COMPARATORS[sort]);
  return limit === undefined ? view : view.slice(0, limit);
};
