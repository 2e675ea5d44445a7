import { FORUM_HOST } from './leadSource';
import { EMAIL_DOMAINS } from './templates';
import { SearchTemplate } from './types';

export interface QueryFacets {
  keywords?: string[];
  locations?: string[];
  sites?: string[];
  emailDomains?: string[];
  excludeTerms?: string[];
  intentPhrases?: string[];
  redditSubreddits?: string[];
}

const orGroup = (tokens: string[]): string => `(${tokens.join(' OR ')})`;

const quoted = (values: string[]): string[] => values.map((value) => `"${value}"`);

const siteTokens = (sites: string[], subreddits: string[]): string[] =>
  sites.map((site) => {
    if (site === FORUM_HOST && subreddits.length > 0) {
      return orGroup(subreddits.map((sub) => `site:${FORUM_HOST}/r/${sub}`));
    }
    return `site:${site}`;
  });

const negate = (term: string): string => (/\s/.test(term) ? `-"${term}"` : `-${term}`);

/**
 * Groups are ANDed by the search engine; terms inside a group are ORed.
 * Exclusions trail every group.
 */
export const buildQuery = ({
  keywords = [],
  locations = [],
  sites = [],
  emailDomains = [],
  excludeTerms = [],
  intentPhrases = [],
  redditSubreddits = [],
}: QueryFacets): string => {
  const groups: string[] = [];
  if (sites.length > 0) groups.push(orGroup(siteTokens(sites, redditSubreddits)));
  if (keywords.length > 0) groups.push(orGroup(quoted(keywords)));
  if (intentPhrases.length > 0) groups.push(orGroup(quoted(intentPhrases)));
  if (emailDomains.length > 0) groups.push(orGroup(quoted(emailDomains)));
  if (locations.length > 0) groups.push(orGroup(quoted(locations)));

  let query = groups.join(' ');
  if (excludeTerms.length > 0) query = `${query} ${excludeTerms.map(negate).join(' ')}`;
  return query.trim();
};

export const buildTemplateQuery = (
  template: SearchTemplate,
  locations: string[],
  options: { sites?: string[]; includeEmailDomains?: boolean; includeIntentPhrases?: boolean } = {},
): string =>
  buildQuery({
    keywords: template.keywords,
    locations,
    sites: options.sites ?? template.sites,
    emailDomains: options.includeEmailDomains === false ? [] : [...EMAIL_DOMAINS],
    excludeTerms: template.excludeTerms,
    intentPhrases: options.includeIntentPhrases ? template.intentPhrases : [],
    redditSubreddits: template.redditSubreddits,
  });
