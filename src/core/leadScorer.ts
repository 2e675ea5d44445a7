import { DAY_MS } from './recencyFilter';
import { Candidate, LeadScore, LeadSource } from './types';

export type ScoreInput = Pick<Candidate, 'locationMatch' | 'intentMatch' | 'keywordMatch' | 'leadSource' | 'postCreatedAt' | 'email' | 'phone' | 'websiteUrl'> & {
  createdAt?: Date;
};

// Reddit leads without a resolved post time never earn recency.
export const UNKNOWN_AGE_DAYS = 9999;
const GOOD_LEAD_MAX_DAYS = 60;
const NO_INTENT_CAP = 60;

const SOURCE_BONUS: Partial<Record<LeadSource, number>> = {
  places: 8,
  linkedin: 5,
  facebook: 4,
  instagram: 3,
  reddit: 2,
};
const DEFAULT_SOURCE_BONUS = 3;

const RECENCY_STEPS: [maxDays: number, bonus: number][] = [
  [7, 20],
  [30, 15],
  [60, 10],
  [90, 5],
];

export const leadAgeDays = (lead: ScoreInput, now: Date): number => {
  if (lead.leadSource === 'reddit' && !lead.postCreatedAt) return UNKNOWN_AGE_DAYS;
  const reference = lead.postCreatedAt ?? lead.createdAt ?? now;
  return Math.max(0, Math.floor((now.getTime() - reference.getTime()) / DAY_MS));
};

export const recencyBonus = (days: number): number => RECENCY_STEPS.find(([maxDays]) => days <= maxDays)?.[1] ?? 0;

export const contactScore = (lead: Pick<ScoreInput, 'email' | 'phone' | 'websiteUrl'>): number =>
  (lead.email ? 7 : 0) + (lead.phone ? 7 : 0) + (lead.websiteUrl ? 6 : 0);

export const isGoodLead = (lead: ScoreInput, now: Date): boolean =>
  lead.intentMatch && lead.locationMatch && leadAgeDays(lead, now) <= GOOD_LEAD_MAX_DAYS;

/**
 * Additive 0-100 score. Recency depends on `now`, so scores are computed on
 * read and never persisted.
 */
export const scoreLead = (lead: ScoreInput, now: Date = new Date()): LeadScore => {
  const contact = contactScore(lead);
  const goodLead = isGoodLead(lead, now);

  let score = 0;
  if (lead.locationMatch) score += 35;
  if (lead.intentMatch) score += 30;
  score += recencyBonus(leadAgeDays(lead, now));
  score += contact;

  if (lead.keywordMatch === true) score += 8;
  if (lead.keywordMatch === false) score -= 5;

  const textSource = lead.leadSource !== 'reddit' && lead.leadSource !== 'places';
  if (textSource && !lead.intentMatch && lead.keywordMatch !== true) score -= 12;

  score += SOURCE_BONUS[lead.leadSource] ?? DEFAULT_SOURCE_BONUS;
  if (goodLead) score += 10;

  if (!lead.intentMatch) score = Math.min(score, NO_INTENT_CAP);
  return { leadScore: Math.round(Math.min(100, Math.max(0, score))), contactScore: contact, goodLead };
};

export const withScore = <T extends ScoreInput>(lead: T, now: Date = new Date()): T & LeadScore => ({ ...lead, ...scoreLead(lead, now) });
