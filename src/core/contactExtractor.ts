import { Candidate } from './types';

export type ExtractedContact = Pick<Candidate, 'firstName' | 'lastName' | 'companyName' | 'websiteUrl' | 'email' | 'phone'>;

// Consumer mailboxes only; business domains are too noisy in snippets.
const EMAIL_REGEX = /\b[A-Za-z0-9._%+-]+@(?:gmail|outlook|hotmail|live|yahoo|icloud|me|aol|comcast|verizon|att)\.(?:com|net)\b/gi;
const PHONE_REGEX = /(?:\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/g;

const NAME_STOPWORDS = new Set(['inc', 'llc', 'ltd', 'corp', 'company', 'group', 'team', 'realty', 'properties', 'homes', 'real estate', 'realtor']);

const COMPANY_SUFFIX = '(?:Realty|Properties|Homes|Group|Team|Real Estate)';
const COMPANY_PATTERNS = [
  new RegExp(`(?:\\bat|\\bwith|@)\\s+([A-Z][A-Za-z\\s&]+${COMPANY_SUFFIX})`),
  new RegExp(`([A-Z][A-Za-z\\s&]+${COMPANY_SUFFIX})`),
];

export const formatPhone = (raw: string): string | undefined => {
  const digits = raw.replace(/\D/g, '');
  if (digits.length === 10) return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
  if (digits.length === 11 && digits.startsWith('1')) {
    return `+1 (${digits.slice(1, 4)}) ${digits.slice(4, 7)}-${digits.slice(7)}`;
  }
  return undefined;
};

export const extractEmails = (text: string): string[] => (text.match(EMAIL_REGEX) || []).map((email) => email.toLowerCase());

export const extractEmail = (text: string): string | undefined => extractEmails(text)[0];

export const extractPhones = (text: string): string[] =>
  (text.match(PHONE_REGEX) || []).map(formatPhone).filter((phone): phone is string => phone !== undefined);

export const extractPhone = (text: string): string | undefined => extractPhones(text)[0];

/** Best-effort: the first two capitalised words before any separator. */
export const extractName = (title: string): Pick<Candidate, 'firstName' | 'lastName'> => {
  if (!title) return {};
  const head = title.replace(/[|—-]+.*$/, '').replace(/\s*[@()]\s*.*$/, '');
  const names = (head.match(/\b[A-Z][a-z]+\b/g) || []).filter((word) => !NAME_STOPWORDS.has(word.toLowerCase()));
  if (names.length >= 2) return { firstName: names[0], lastName: names[1] };
  if (names.length === 1) return { firstName: names[0] };
  return {};
};

export const extractCompanyName = (text: string): string | undefined => {
  if (!text) return undefined;
  for (const pattern of COMPANY_PATTERNS) {
    const match = text.match(pattern);
    if (!match) continue;
    const company = match[1].trim().replace(/\s+/g, ' ');
    if (company.length > 3) return company;
  }
  return undefined;
};

export const extractContactInfo = (title: string, snippet: string, link: string): ExtractedContact => {
  const combined = `${title} ${snippet}`;
  return {
    ...extractName(title),
    companyName: extractCompanyName(combined),
    websiteUrl: link,
    email: extractEmail(combined),
    phone: extractPhone(combined),
  };
};
