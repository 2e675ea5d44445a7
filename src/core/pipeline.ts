import { PlacesSearch, normalizePlace } from '../adapters/google_places';
import { CSE_PAGE_SIZE, WebSearch } from '../adapters/google_search';
import { PostTimeLookup } from '../adapters/reddit';
import { LeadStore } from '../storage/leadStore';
import { log } from '../utils/logger';
import { RateLimiter } from '../utils/rateLimiter';
import { extractContactInfo, extractPhone } from './contactExtractor';
import { ConfigurationError, PersistenceError } from './errors';
import { leadSourceFromLink } from './leadSource';
import { AllowedLocations, matchesLocation, parseLocations, rankByLocation } from './locationMatcher';
import { buildTemplateQuery } from './queryBuilder';
import { filterByRecency } from './recencyFilter';
import { intentMatch, keywordMatch, strictFilter } from './relevanceFilter';
import { getTemplate, isPeopleTemplate, placesQueryForTemplate } from './templates';
import { Candidate, LeadSearchOutcome, LeadSearchRequest, SearchResult, SearchTemplate } from './types';

export const DEFAULT_MAX_RESULTS = 30;
export const DEFAULT_MAX_PLACES = 20;
export const PLACE_DETAILS_DELAY_MS = 200;

export interface PipelineDeps {
  search?: WebSearch;
  places?: PlacesSearch;
  postLookup: PostTimeLookup;
  store: LeadStore;
  now?: () => Date;
  pageDelayMs?: number;
  placesDelayMs?: number;
  recencyConcurrency?: number;
  recencyIntervalMs?: number;
}

const stopped = (message: string, query = '', extra: Partial<LeadSearchOutcome> = {}): LeadSearchOutcome => {
  log('INFO', `search stopped: ${message}`);
  return { status: 'stopped', message, query, totalResults: 0, newLeads: [], duplicateLeads: [], apiQueriesUsed: 0, ...extra };
};

export const toCandidate = (
  result: SearchResult,
  template: SearchTemplate,
  allowed: AllowedLocations,
  postCreatedAt?: Date,
): Candidate | null => {
  if (!result.link) return null;
  const contact = extractContactInfo(result.title, result.snippet, result.link);
  const fromPlaces = result.origin === 'places';

  return {
    ...contact,
    // A place with its own site is keyed by that site so it merges with web hits for the same business.
    websiteUrl: fromPlaces ? result.website || result.link : contact.websiteUrl,
    companyName: fromPlaces ? result.title || contact.companyName : contact.companyName,
    phone: (result.phone && extractPhone(result.phone)) || contact.phone,
    locationMatch: matchesLocation(result, allowed),
    intentMatch: intentMatch(`${result.title} ${result.snippet}`, template.intentPhrases),
    keywordMatch: keywordMatch(result, template.keywords),
    leadSource: fromPlaces ? 'places' : leadSourceFromLink(result.link),
    postCreatedAt,
  };
};

/** People templates need a relevance signal; business templates need a way to reach them. */
export const passesSurvivorGate = (candidate: Candidate, templateName: string): boolean => {
  if (!candidate.websiteUrl) return false;
  if (isPeopleTemplate(templateName)) return candidate.intentMatch || candidate.keywordMatch === true;
  return Boolean(candidate.email || candidate.phone);
};

const collectPlaces = async (
  places: PlacesSearch,
  template: SearchTemplate,
  locations: string[],
  maxPlaces: number,
  delayMs?: number,
): Promise<{ results: SearchResult[]; requests: number }> => {
  const { places: found, stats } = await places.searchLocations(placesQueryForTemplate(template.name), locations, { maxResults: maxPlaces, delayMs });
  const limiter = new RateLimiter(delayMs ?? PLACE_DETAILS_DELAY_MS);
  const results: SearchResult[] = [];
  for (const place of found) {
    await limiter.wait();
    results.push(normalizePlace(place, await places.placeDetails(place.id)));
  }
  return { results, requests: stats.requests + found.length };
};

/**
 * search -> recency -> strict relevance -> location ranking -> extraction ->
 * survivor gate -> dedup/persist.
 */
export const runLeadSearch = async (request: LeadSearchRequest, deps: PipelineDeps): Promise<LeadSearchOutcome> => {
  const template = getTemplate(request.template);
  const now = deps.now ? deps.now() : new Date();
  const locations = request.locations.map((location) => location.trim()).filter(Boolean);
  const sites = request.sites ?? template.sites;
  const usePlaces = request.usePlaces === true;

  if (locations.length === 0) return stopped('Enter at least one location.');
  if (sites.length === 0 && !usePlaces) return stopped('Select at least one site or enable places search.');
  if (sites.length > 0 && !deps.search) throw new ConfigurationError('GOOGLE_API_KEY and GOOGLE_CSE_ID are required for web search');
  if (usePlaces && !deps.places) throw new ConfigurationError('GOOGLE_PLACES_API_KEY is required for places search');

  const query = sites.length > 0 ? buildTemplateQuery(template, locations, { sites, includeEmailDomains: request.includeEmailDomains }) : '';

  const webResults = deps.search && sites.length > 0
    ? await deps.search.searchMultiplePages(query, request.maxResults ?? DEFAULT_MAX_RESULTS, deps.pageDelayMs)
    : [];
  const placeResults = deps.places && usePlaces
    ? await collectPlaces(deps.places, template, locations, request.maxPlaces ?? DEFAULT_MAX_PLACES, deps.placesDelayMs)
    : { results: [], requests: 0 };

  const apiQueriesUsed = Math.ceil(webResults.length / CSE_PAGE_SIZE) + placeResults.requests;
  const results = [...webResults, ...placeResults.results];
  log('INFO', `search returned ${results.length} results`, { web: webResults.length, places: placeResults.results.length, apiQueriesUsed });
  if (results.length === 0) return stopped('No results found. Try different parameters.', query, { apiQueriesUsed });

  let filtered = results;
  let originTimes = new Map<string, Date>();
  if (request.maxPostAgeDays !== undefined) {
    const recency = await filterByRecency(filtered, request.maxPostAgeDays, {
      lookup: deps.postLookup,
      now,
      concurrency: deps.recencyConcurrency,
      minIntervalMs: deps.recencyIntervalMs,
    });
    filtered = recency.kept;
    originTimes = recency.originTimes;
  }
  if (request.strict) {
    filtered = strictFilter(filtered, template.keywords, template.intentPhrases);
    log('INFO', `strict filter kept ${filtered.length} results`);
  }

  const allowed = parseLocations(locations);
  const survivors: Candidate[] = [];
  for (const result of rankByLocation(filtered, locations)) {
    const candidate = toCandidate(result, template, allowed, originTimes.get(result.link));
    if (candidate && passesSurvivorGate(candidate, template.name)) survivors.push(candidate);
  }
  log('INFO', `${survivors.length} candidates passed the survivor gate`, { filtered: filtered.length });
  if (survivors.length === 0) {
    return stopped('No leads passed the filters.', query, { totalResults: results.length, apiQueriesUsed });
  }

  const stored = await deps.store.addLeads(survivors, template.name, locations, { apiQueriesUsed });
  if (stored.failed.length > 0) {
    throw new PersistenceError(`${stored.failed.length} of ${survivors.length} leads could not be saved`, stored);
  }

  log('INFO', `search saved ${stored.newLeads.length} new leads`, { duplicates: stored.duplicateLeads.length });
  return {
    status: 'completed',
    query,
    totalResults: results.length,
    newLeads: stored.newLeads,
    duplicateLeads: stored.duplicateLeads,
    apiQueriesUsed,
  };
};
