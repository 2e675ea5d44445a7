import crypto from 'crypto';
import pLimit from 'p-limit';
import { errorMessage, PersistenceError } from '../core/errors';
import { Candidate, Lead, SearchHistoryEntry } from '../core/types';
import { log } from '../utils/logger';

export type NewLead = Omit<Lead, 'id'>;

export type LeadMerge = Pick<Candidate, 'email' | 'phone' | 'firstName' | 'lastName' | 'companyName'>;

export interface LeadQuery {
  template?: string;
  limit?: number;
}

export interface LeadCountFilter {
  withEmail?: boolean;
  withPhone?: boolean;
  createdSince?: Date;
}

export interface LeadSignals {
  postCreatedAt?: Date;
  keywordMatch?: boolean;
}

/** Storage primitives; the dedup algorithm lives in LeadStore. */
export interface LeadBackend {
  readonly kind: 'sqlite' | 'postgres';
  init(): Promise<void>;
  findByHash(urlHash: string): Promise<Lead | null>;
  /** Returns null when another writer already owns the url_hash. */
  insertLead(lead: NewLead): Promise<Lead | null>;
  /** Non-empty merge values replace stored ones; empty ones keep what is stored. */
  recordSighting(id: number, merge: LeadMerge, seenAt: Date, countIncrement: 0 | 1): Promise<void>;
  insertHistory(entry: Omit<SearchHistoryEntry, 'id'>): Promise<void>;
  listLeads(query: LeadQuery): Promise<Lead[]>;
  listHistory(limit: number): Promise<SearchHistoryEntry[]>;
  countLeads(filter: LeadCountFilter): Promise<number>;
  countSearches(): Promise<number>;
  mostUsedTemplate(): Promise<string | null>;
  sumApiQueries(since?: Date): Promise<number>;
  deleteLeads(ids: number[]): Promise<number>;
  updateLeadSignals(id: number, signals: LeadSignals): Promise<boolean>;
  clear(): Promise<void>;
  close(): Promise<void>;
}

export interface AddLeadsMetadata {
  apiQueriesUsed?: number;
}

export interface FailedLead {
  candidate: Candidate;
  error: string;
}

export interface AddLeadsResult {
  newLeads: Candidate[];
  duplicateLeads: Candidate[];
  failed: FailedLead[];
}

export interface StoreStats {
  totalLeads: number;
  leadsWithEmail: number;
  leadsWithPhone: number;
  newToday: number;
  totalSearches: number;
  mostUsedTemplate: string;
  totalApiQueries: number;
  apiQueriesToday: number;
}

/**
 * Dedup identity: md5 of the trimmed, lowercased URL with trailing slashes
 * removed. Raw URLs, emails and names never decide duplicates.
 */
export const hashUrl = (url: string): string =>
  crypto.createHash('md5').update(url.trim().toLowerCase().replace(/\/+$/, '')).digest('hex');

const startOfLocalDay = (date: Date): Date => new Date(date.getFullYear(), date.getMonth(), date.getDate());

const mergeOf = (candidate: Candidate): LeadMerge => ({
  email: candidate.email,
  phone: candidate.phone,
  firstName: candidate.firstName,
  lastName: candidate.lastName,
  companyName: candidate.companyName,
});

export class LeadStore {
  // One writer at a time per store: the find-then-insert below is not atomic on its own.
  private readonly writeSlot = pLimit(1);

  constructor(
    private readonly backend: LeadBackend,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  get kind(): LeadBackend['kind'] {
    return this.backend.kind;
  }

  init(): Promise<void> {
    return this.backend.init();
  }

  addLeads(candidates: Candidate[], template: string, locations: string[], metadata: AddLeadsMetadata = {}): Promise<AddLeadsResult> {
    return this.writeSlot(() => this.ingest(candidates, template, locations, metadata));
  }

  private async ingest(candidates: Candidate[], template: string, locations: string[], metadata: AddLeadsMetadata): Promise<AddLeadsResult> {
    const now = this.clock();
    const locationList = locations.join(', ');
    const result: AddLeadsResult = { newLeads: [], duplicateLeads: [], failed: [] };
    const seenThisBatch = new Set<string>();

    for (const candidate of candidates) {
      const url = candidate.websiteUrl ? candidate.websiteUrl.trim() : '';
      if (!url) continue;

      const urlHash = hashUrl(url);
      const repeatInBatch = seenThisBatch.has(urlHash);
      seenThisBatch.add(urlHash);

      try {
        let existing = await this.backend.findByHash(urlHash);
        if (!existing) {
          const inserted = await this.backend.insertLead({
            ...candidate,
            websiteUrl: url,
            urlHash,
            template,
            locations: locationList,
            createdAt: now,
            lastSeen: now,
            timesSeen: 1,
          });
          if (inserted) {
            result.newLeads.push(candidate);
            continue;
          }
          existing = await this.backend.findByHash(urlHash);
          if (!existing) throw new Error('insert conflicted but no lead holds the url_hash');
        }

        await this.backend.recordSighting(existing.id, mergeOf(candidate), now, repeatInBatch ? 0 : 1);
        result.duplicateLeads.push(candidate);
      } catch (error) {
        log('ERROR', 'failed to persist lead', `${url}: ${errorMessage(error)}`);
        result.failed.push({ candidate, error: errorMessage(error) });
      }
    }

    try {
      await this.backend.insertHistory({
        template,
        locations: locationList,
        numResults: candidates.length,
        newLeads: result.newLeads.length,
        duplicateLeads: result.duplicateLeads.length,
        apiQueriesUsed: metadata.apiQueriesUsed ?? 0,
        timestamp: now,
      });
    } catch (error) {
      log('ERROR', 'failed to record search history', errorMessage(error));
      throw new PersistenceError('search history could not be recorded', result);
    }

    return result;
  }

  getAllLeads(query: LeadQuery = {}): Promise<Lead[]> {
    return this.backend.listLeads(query);
  }

  getSearchHistory(limit = 50): Promise<SearchHistoryEntry[]> {
    return this.backend.listHistory(limit);
  }

  async getStats(): Promise<StoreStats> {
    const today = startOfLocalDay(this.clock());
    const [totalLeads, leadsWithEmail, leadsWithPhone, newToday, totalSearches, mostUsedTemplate, totalApiQueries, apiQueriesToday] =
      await Promise.all([
        this.backend.countLeads({}),
        this.backend.countLeads({ withEmail: true }),
        this.backend.countLeads({ withPhone: true }),
        this.backend.countLeads({ createdSince: today }),
        this.backend.countSearches(),
        this.backend.mostUsedTemplate(),
        this.backend.sumApiQueries(),
        this.backend.sumApiQueries(today),
      ]);

    return {
      totalLeads,
      leadsWithEmail,
      leadsWithPhone,
      newToday,
      totalSearches,
      mostUsedTemplate: mostUsedTemplate ?? 'None',
      totalApiQueries,
      apiQueriesToday,
    };
  }

  async deleteLead(id: number): Promise<boolean> {
    return (await this.deleteLeads([id])) > 0;
  }

  deleteLeads(ids: number[]): Promise<number> {
    if (ids.length === 0) return Promise.resolve(0);
    return this.writeSlot(() => this.backend.deleteLeads(ids));
  }

  updateLeadSignals(id: number, signals: LeadSignals): Promise<boolean> {
    return this.writeSlot(() => this.backend.updateLeadSignals(id, signals));
  }

  /** Irreversible: drops every lead and every history row. */
  clearAll(): Promise<boolean> {
    return this.writeSlot(async () => {
      try {
        await this.backend.clear();
        return true;
      } catch (error) {
        log('ERROR', 'failed to clear lead store', errorMessage(error));
        return false;
      }
    });
  }

  close(): Promise<void> {
    return this.backend.close();
  }
}
