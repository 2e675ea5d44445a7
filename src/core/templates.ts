import templateData from '../data/templates.json';
import { SearchValidationError } from './errors';
import { SearchTemplate } from './types';

export const SOCIAL_SITES: readonly string[] = templateData.socialSites;
export const EMAIL_DOMAINS: readonly string[] = templateData.emailDomains;

const PEOPLE_CATEGORIES = new Set(templateData.peopleCategories);
const PLACES_QUERIES = new Map<string, string>(Object.entries(templateData.placesQueries));

const TEMPLATES = new Map<string, SearchTemplate>(
  templateData.templates.map((t) => [t.name, { ...t, sites: [...SOCIAL_SITES] }]),
);

export const isKnownTemplate = (name: string): boolean => TEMPLATES.has(name);

export const getTemplate = (name: string): SearchTemplate => {
  const template = TEMPLATES.get(name);
  if (!template) {
    throw new SearchValidationError(`Template '${name}' not found. Available templates: ${[...TEMPLATES.keys()].join(', ')}`);
  }
  return template;
};

export const listTemplates = (): Record<string, string> =>
  Object.fromEntries([...TEMPLATES.values()].map((t) => [t.name, t.description]));

export const listByCategory = (): Record<string, string[]> => {
  const grouped: Record<string, string[]> = {};
  for (const category of templateData.categories) grouped[category] = [];
  for (const template of TEMPLATES.values()) {
    (grouped[template.category] ??= []).push(template.name);
  }
  return grouped;
};

/**
 * People templates look for homeowners and buyers rather than businesses, so
 * their leads are gated on intent/keyword signals instead of contact details.
 */
export const isPeopleTemplate = (name: string): boolean => {
  const template = TEMPLATES.get(name);
  return template !== undefined && PEOPLE_CATEGORIES.has(template.category);
};

export const placesQueryForTemplate = (name: string): string => PLACES_QUERIES.get(name) ?? name.replace(/_/g, ' ');
