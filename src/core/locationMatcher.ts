import usStates from '../data/us_states.json';
import { SearchResult } from './types';

export interface AllowedLocations {
  cities: Set<string>;
  stateAbbrevs: Set<string>;
  stateNames: Set<string>;
}

type LocationText = Pick<SearchResult, 'title' | 'snippet' | 'link'>;

const STATE_BY_ABBREV = new Map<string, string>(Object.entries(usStates).map(([abbrev, name]) => [abbrev.toLowerCase(), name.toLowerCase()]));
const ABBREV_BY_NAME = new Map<string, string>([...STATE_BY_ABBREV].map(([abbrev, name]) => [name, abbrev]));

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// Letters outside ASCII count as word characters ("San José").
const containsPhrase = (text: string, phrase: string): boolean =>
  new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegex(phrase)}(?![\\p{L}\\p{N}_])`, 'u').test(text);

const containsAbbrev = (text: string, abbrev: string, flags = ''): boolean =>
  new RegExp(`(?<![A-Za-z])${abbrev}(?![A-Za-z])`, flags).test(text);

const addState = (allowed: AllowedLocations, abbrev: string, name: string): void => {
  allowed.stateAbbrevs.add(abbrev);
  allowed.stateNames.add(name);
};

export const parseLocations = (rawLocations: string[]): AllowedLocations => {
  const allowed: AllowedLocations = { cities: new Set(), stateAbbrevs: new Set(), stateNames: new Set() };

  for (const raw of rawLocations) {
    const tokens = raw.replace(/,/g, ' ').trim().split(/\s+/).filter(Boolean);
    if (tokens.length === 0) continue;

    let cityTokens = tokens;
    const last = tokens[tokens.length - 1].toLowerCase();
    const lastTwo = tokens.slice(-2).join(' ').toLowerCase();

    const nameForAbbrev = STATE_BY_ABBREV.get(last);
    const abbrevForTwo = tokens.length >= 2 ? ABBREV_BY_NAME.get(lastTwo) : undefined;
    const abbrevForOne = ABBREV_BY_NAME.get(last);

    if (nameForAbbrev) {
      addState(allowed, last, nameForAbbrev);
      cityTokens = tokens.slice(0, -1);
    } else if (abbrevForTwo) {
      addState(allowed, abbrevForTwo, lastTwo);
      cityTokens = tokens.slice(0, -2);
    } else if (abbrevForOne) {
      addState(allowed, abbrevForOne, last);
      cityTokens = tokens.slice(0, -1);
    }

    const city = cityTokens.join(' ').toLowerCase();
    if (city) allowed.cities.add(city);
  }

  return allowed;
};

const toAllowed = (locations: string[] | AllowedLocations): AllowedLocations =>
  Array.isArray(locations) ? parseLocations(locations) : locations;

const combinedText = (result: LocationText): string => `${result.title} ${result.snippet} ${result.link}`;

export const matchesLocation = (result: LocationText, locations: string[] | AllowedLocations): boolean => {
  const allowed = toAllowed(locations);
  const text = combinedText(result).toLowerCase();

  for (const city of allowed.cities) {
    if (containsPhrase(text, city)) return true;
  }
  for (const name of allowed.stateNames) {
    if (containsPhrase(text, name)) return true;
  }
  for (const abbrev of allowed.stateAbbrevs) {
    if (containsAbbrev(text, abbrev)) return true;
  }
  return false;
};

const isAllCaps = (text: string): boolean => /\p{Lu}/u.test(text) && text === text.toUpperCase();

// Abbreviations of other states only count in upper case ("in", "or", "me" are words),
// and never inside all-caps text where every word looks like one.
export const mentionsOtherState = (result: LocationText, locations: string[] | AllowedLocations): boolean => {
  const allowed = toAllowed(locations);
  const lowered = combinedText(result).toLowerCase();
  const abbrevText = [result.title, result.snippet, result.link].filter((part) => !isAllCaps(part)).join(' ');

  for (const [abbrev, name] of STATE_BY_ABBREV) {
    if (allowed.stateAbbrevs.has(abbrev)) continue;
    if (containsPhrase(lowered, name)) return true;
    if (containsAbbrev(abbrevText, abbrev.toUpperCase())) return true;
  }
  return false;
};

export const locationRank = (result: LocationText, locations: string[] | AllowedLocations): 0 | 1 | 2 => {
  const allowed = toAllowed(locations);
  if (matchesLocation(result, allowed)) return 2;
  return mentionsOtherState(result, allowed) ? 0 : 1;
};

/** Stable: equal ranks keep their input order. */
export const rankByLocation = <T extends LocationText>(results: T[], locations: string[]): T[] => {
  const allowed = parseLocations(locations);
  return results
    .map((result, index) => ({ result, index, rank: locationRank(result, allowed) }))
    .sort((a, b) => b.rank - a.rank || a.index - b.index)
    .map(({ result }) => result);
};
