export type LeadSource =
  | 'cse'
  | 'places'
  | 'reddit'
  | 'facebook'
  | 'instagram'
  | 'linkedin'
  | 'nextdoor'
  | 'tiktok'
  | 'youtube'
  | 'pinterest'
  | 'craigslist';

export interface SearchResult {
  title: string;
  snippet: string;
  link: string;
  displayLink: string;
  origin?: 'cse' | 'places'; // places results skip text-based filters
  phone?: string; // from place details
  website?: string; // from place details
}

export interface Candidate {
  firstName?: string;
  lastName?: string;
  companyName?: string;
  websiteUrl: string;
  email?: string;
  phone?: string;
  locationMatch: boolean;
  intentMatch: boolean;
  keywordMatch?: boolean; // undefined = never evaluated (older rows)
  leadSource: LeadSource;
  postCreatedAt?: Date;
}

export interface Lead extends Candidate {
  id: number;
  urlHash: string;
  template: string;
  locations: string;
  createdAt: Date;
  lastSeen: Date;
  timesSeen: number;
}

export interface LeadScore {
  leadScore: number; // 0-100
  contactScore: number;
  goodLead: boolean;
}

export type ScoredLead<T extends Candidate = Lead> = T & LeadScore;

export interface SearchHistoryEntry {
  id: number;
  template: string;
  locations: string;
  numResults: number;
  newLeads: number;
  duplicateLeads: number;
  apiQueriesUsed: number;
  timestamp: Date;
}

export interface SearchTemplate {
  name: string;
  description: string;
  category: string;
  keywords: string[];
  intentPhrases: string[];
  sites: string[];
  excludeTerms: string[];
  redditSubreddits: string[];
}

export interface LeadSearchRequest {
  template: string;
  locations: string[];
  sites?: string[]; // overrides the template's sites
  maxResults?: number; // CSE results, fetched 10 per page
  includeEmailDomains?: boolean;
  strict?: boolean; // keep only keyword or intent matches
  maxPostAgeDays?: number; // reddit recency window
  usePlaces?: boolean;
  maxPlaces?: number;
}

export interface LeadSearchOutcome {
  status: 'completed' | 'stopped';
  message?: string;
  query: string;
  totalResults: number;
  newLeads: Candidate[];
  duplicateLeads: Candidate[];
  apiQueriesUsed: number;
}
