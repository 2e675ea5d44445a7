import { asNumber, asString, isRecord } from '../adapters/parserSupport';
import { Lead, LeadSource, SearchHistoryEntry } from '../core/types';

const LEAD_SOURCES: readonly LeadSource[] = ['cse', 'places', 'reddit', 'facebook', 'instagram', 'linkedin', 'nextdoor', 'tiktok', 'youtube', 'pinterest', 'craigslist'];

const isLeadSource = (value: unknown): value is LeadSource => LEAD_SOURCES.some((source) => source === value);

// SQLite hands back 0/1 and ISO text; Postgres hands back booleans and Dates.
const toBool = (value: unknown): boolean | undefined => {
  if (value === true || value === 1) return true;
  if (value === false || value === 0) return false;
  return undefined;
};

const toDate = (value: unknown): Date | undefined => {
  if (value instanceof Date) return value;
  if (typeof value === 'string' && value) {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? undefined : parsed;
  }
  return undefined;
};

const optionalText = (value: unknown): string | undefined => asString(value) || undefined;

const requireRecord = (row: unknown, table: string): Record<string, unknown> => {
  if (!isRecord(row)) throw new Error(`unexpected ${table} row shape`);
  return row;
};

export const rowToLead = (raw: unknown): Lead => {
  const row = requireRecord(raw, 'leads');
  const now = new Date();
  return {
    id: asNumber(row.id) ?? 0,
    firstName: optionalText(row.first_name),
    lastName: optionalText(row.last_name),
    companyName: optionalText(row.company_name),
    websiteUrl: asString(row.website_url) ?? '',
    email: optionalText(row.email),
    phone: optionalText(row.phone),
    locationMatch: toBool(row.location_match) ?? false,
    intentMatch: toBool(row.intent_match) ?? false,
    keywordMatch: toBool(row.keyword_match),
    leadSource: isLeadSource(row.lead_source) ? row.lead_source : 'cse',
    postCreatedAt: toDate(row.post_created_at),
    urlHash: asString(row.url_hash) ?? '',
    template: asString(row.template) ?? '',
    locations: asString(row.locations) ?? '',
    createdAt: toDate(row.created_at) ?? now,
    lastSeen: toDate(row.last_seen) ?? now,
    timesSeen: asNumber(row.times_seen) ?? 1,
  };
};

export const rowToHistory = (raw: unknown): SearchHistoryEntry => {
  const row = requireRecord(raw, 'search_history');
  return {
    id: asNumber(row.id) ?? 0,
    template: asString(row.template) ?? '',
    locations: asString(row.locations) ?? '',
    numResults: asNumber(row.num_results) ?? 0,
    newLeads: asNumber(row.new_leads) ?? 0,
    duplicateLeads: asNumber(row.duplicate_leads) ?? 0,
    apiQueriesUsed: asNumber(row.api_queries_used) ?? 0,
    timestamp: toDate(row.timestamp) ?? new Date(0),
  };
};

/** Reads a single numeric aggregate column (COUNT/SUM come back as strings from pg). */
export const readAggregate = (raw: unknown, column: string): number => (isRecord(raw) ? asNumber(raw[column]) ?? 0 : 0);

export const readText = (raw: unknown, column: string): string | null => (isRecord(raw) ? optionalText(raw[column]) ?? null : null);
