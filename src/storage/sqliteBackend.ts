import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { Lead, SearchHistoryEntry } from '../core/types';
import { LeadBackend, LeadCountFilter, LeadMerge, LeadQuery, LeadSignals, NewLead } from './leadStore';
import { readAggregate, readText, rowToHistory, rowToLead } from './rows';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS leads (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    first_name TEXT,
    last_name TEXT,
    company_name TEXT,
    website_url TEXT NOT NULL,
    email TEXT,
    phone TEXT,
    template TEXT NOT NULL,
    locations TEXT NOT NULL DEFAULT '',
    url_hash TEXT NOT NULL UNIQUE,
    location_match INTEGER NOT NULL DEFAULT 0,
    intent_match INTEGER NOT NULL DEFAULT 0,
    keyword_match INTEGER,
    lead_source TEXT NOT NULL DEFAULT 'cse',
    post_created_at TEXT,
    created_at TEXT NOT NULL,
    last_seen TEXT NOT NULL,
    times_seen INTEGER NOT NULL DEFAULT 1
  );
  CREATE TABLE IF NOT EXISTS search_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    template TEXT NOT NULL,
    locations TEXT NOT NULL DEFAULT '',
    num_results INTEGER NOT NULL DEFAULT 0,
    new_leads INTEGER NOT NULL DEFAULT 0,
    duplicate_leads INTEGER NOT NULL DEFAULT 0,
    api_queries_used INTEGER NOT NULL DEFAULT 0,
    timestamp TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_leads_email ON leads(email);
  CREATE INDEX IF NOT EXISTS idx_leads_template ON leads(template);
  CREATE INDEX IF NOT EXISTS idx_leads_created_at ON leads(created_at);
`;

type SqlValue = string | number | null;

// better-sqlite3 binds neither booleans nor undefined.
const bindBool = (value: boolean | undefined): SqlValue => (value === undefined ? null : value ? 1 : 0);
const bindText = (value: string | undefined): SqlValue => value ?? null;
const bindDate = (value: Date | undefined): SqlValue => (value ? value.toISOString() : null);

/** File-backed store; pass ':memory:' for a throwaway database. */
export class SqliteBackend implements LeadBackend {
  readonly kind = 'sqlite' as const;

  private readonly db: Database.Database;

  constructor(filename: string) {
    if (filename !== ':memory:') mkdirSync(dirname(filename), { recursive: true });
    this.db = new Database(filename);
    this.db.pragma('journal_mode = WAL');
  }

  async init(): Promise<void> {
    this.db.exec(SCHEMA);
  }

  async findByHash(urlHash: string): Promise<Lead | null> {
    const row: unknown = this.db.prepare('SELECT * FROM leads WHERE url_hash = ?').get(urlHash);
    return row === undefined ? null : rowToLead(row);
  }

  async insertLead(lead: NewLead): Promise<Lead | null> {
    const row: unknown = this.db
      .prepare(
        `INSERT INTO leads (
          first_name, last_name, company_name, website_url, email, phone,
          template, locations, url_hash, location_match, intent_match, keyword_match,
          lead_source, post_created_at, created_at, last_seen, times_seen
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(url_hash) DO NOTHING
        RETURNING *`,
      )
      .get(
        bindText(lead.firstName),
        bindText(lead.lastName),
        bindText(lead.companyName),
        lead.websiteUrl,
        bindText(lead.email),
        bindText(lead.phone),
        lead.template,
        lead.locations,
        lead.urlHash,
        bindBool(lead.locationMatch),
        bindBool(lead.intentMatch),
        bindBool(lead.keywordMatch),
        lead.leadSource,
        bindDate(lead.postCreatedAt),
        lead.createdAt.toISOString(),
        lead.lastSeen.toISOString(),
        lead.timesSeen,
      );
    return row === undefined ? null : rowToLead(row);
  }

  async recordSighting(id: number, merge: LeadMerge, seenAt: Date, countIncrement: 0 | 1): Promise<void> {
    this.db
      .prepare(
        `UPDATE leads SET
          last_seen = ?,
          times_seen = times_seen + ?,
          email = COALESCE(NULLIF(?, ''), email),
          phone = COALESCE(NULLIF(?, ''), phone),
          first_name = COALESCE(NULLIF(?, ''), first_name),
          last_name = COALESCE(NULLIF(?, ''), last_name),
          company_name = COALESCE(NULLIF(?, ''), company_name)
        WHERE id = ?`,
      )
      .run(
        seenAt.toISOString(),
        countIncrement,
        bindText(merge.email),
        bindText(merge.phone),
        bindText(merge.firstName),
        bindText(merge.lastName),
        bindText(merge.companyName),
        id,
      );
  }

  async insertHistory(entry: Omit<SearchHistoryEntry, 'id'>): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO search_history (template, locations, num_results, new_leads, duplicate_leads, api_queries_used, timestamp)
        VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(entry.template, entry.locations, entry.numResults, entry.newLeads, entry.duplicateLeads, entry.apiQueriesUsed, entry.timestamp.toISOString());
  }

  async listLeads({ template, limit }: LeadQuery): Promise<Lead[]> {
    const params: SqlValue[] = [];
    let sql = 'SELECT * FROM leads';
    if (template) {
      sql += ' WHERE template = ?';
      params.push(template);
    }
    sql += ' ORDER BY created_at DESC, id DESC';
    if (limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(limit);
    }
    const rows: unknown[] = this.db.prepare(sql).all(...params);
    return rows.map(rowToLead);
  }

  async listHistory(limit: number): Promise<SearchHistoryEntry[]> {
    const rows: unknown[] = this.db.prepare('SELECT * FROM search_history ORDER BY timestamp DESC, id DESC LIMIT ?').all(limit);
    return rows.map(rowToHistory);
  }

  async countLeads({ withEmail, withPhone, createdSince }: LeadCountFilter): Promise<number> {
    const clauses: string[] = [];
    const params: SqlValue[] = [];
    if (withEmail) clauses.push("email IS NOT NULL AND email != ''");
    if (withPhone) clauses.push("phone IS NOT NULL AND phone != ''");
    if (createdSince) {
      clauses.push('created_at >= ?');
      params.push(createdSince.toISOString());
    }
    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
    return readAggregate(this.db.prepare(`SELECT COUNT(*) AS total FROM leads${where}`).get(...params), 'total');
  }

  async countSearches(): Promise<number> {
    return readAggregate(this.db.prepare('SELECT COUNT(*) AS total FROM search_history').get(), 'total');
  }

  async mostUsedTemplate(): Promise<string | null> {
    const row: unknown = this.db
      .prepare('SELECT template, COUNT(*) AS uses FROM search_history GROUP BY template ORDER BY uses DESC, MAX(id) DESC LIMIT 1')
      .get();
    return readText(row, 'template');
  }

  async sumApiQueries(since?: Date): Promise<number> {
    const sql = 'SELECT COALESCE(SUM(api_queries_used), 0) AS total FROM search_history';
    const row: unknown = since ? this.db.prepare(`${sql} WHERE timestamp >= ?`).get(since.toISOString()) : this.db.prepare(sql).get();
    return readAggregate(row, 'total');
  }

  async deleteLeads(ids: number[]): Promise<number> {
    if (ids.length === 0) return 0;
    const placeholders = ids.map(() => '?').join(', ');
    return this.db.prepare(`DELETE FROM leads WHERE id IN (${placeholders})`).run(...ids).changes;
  }

  async updateLeadSignals(id: number, { postCreatedAt, keywordMatch }: LeadSignals): Promise<boolean> {
    const sets: string[] = [];
    const params: SqlValue[] = [];
    if (postCreatedAt) {
      sets.push('post_created_at = ?');
      params.push(postCreatedAt.toISOString());
    }
    if (keywordMatch !== undefined) {
      sets.push('keyword_match = ?');
      params.push(bindBool(keywordMatch));
    }
    if (sets.length === 0) return false;
    return this.db.prepare(`UPDATE leads SET ${sets.join(', ')} WHERE id = ?`).run(...params, id).changes > 0;
  }

  async clear(): Promise<void> {
    this.db.transaction(() => {
      this.db.prepare('DELETE FROM leads').run();
      this.db.prepare('DELETE FROM search_history').run();
    })();
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
