import { LeadSource } from './types';

export const FORUM_HOST = 'reddit.com';

const HOST_SOURCES: [string, LeadSource][] = [
  ['reddit.com', 'reddit'],
  ['facebook.com', 'facebook'],
  ['instagram.com', 'instagram'],
  ['linkedin.com', 'linkedin'],
  ['nextdoor.com', 'nextdoor'],
  ['tiktok.com', 'tiktok'],
  ['youtube.com', 'youtube'],
  ['youtu.be', 'youtube'],
  ['pinterest.com', 'pinterest'],
  ['craigslist.org', 'craigslist'],
];

const hostOf = (link: string): string => {
  try {
    return new URL(link).hostname.toLowerCase();
  } catch {
    return link.toLowerCase();
  }
};

const hostMatches = (host: string, domain: string): boolean => host === domain || host.endsWith(`.${domain}`);

export const leadSourceFromLink = (link: string): LeadSource => {
  const host = hostOf(link);
  for (const [domain, source] of HOST_SOURCES) {
    if (hostMatches(host, domain)) return source;
  }
  return 'cse';
};

export const isForumLink = (link: string): boolean => hostMatches(hostOf(link), FORUM_HOST);
