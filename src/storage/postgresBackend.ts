import { Pool } from 'pg';
import { Lead, SearchHistoryEntry } from '../core/types';
import { LeadBackend, LeadCountFilter, LeadMerge, LeadQuery, LeadSignals, NewLead } from './leadStore';
import { readAggregate, readText, rowToHistory, rowToLead } from './rows';

/** The slice of pg's Pool this backend relies on. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export const poolQueryable = (pool: Pool): Queryable => ({
  query: async (text, values) => {
    const result = await pool.query(text, values);
    return { rows: result.rows, rowCount: result.rowCount };
  },
  end: () => pool.end(),
});

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS leads (
    id SERIAL PRIMARY KEY,
    first_name TEXT,
    last_name TEXT,
    company_name TEXT,
    website_url TEXT NOT NULL,
    email TEXT,
    phone TEXT,
    template TEXT NOT NULL,
    locations TEXT NOT NULL DEFAULT '',
    url_hash TEXT NOT NULL UNIQUE,
    location_match BOOLEAN NOT NULL DEFAULT FALSE,
    intent_match BOOLEAN NOT NULL DEFAULT FALSE,
    keyword_match BOOLEAN,
    lead_source TEXT NOT NULL DEFAULT 'cse',
    post_created_at TIMESTAMPTZ,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    last_seen TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    times_seen INTEGER NOT NULL DEFAULT 1
  )`,
  `CREATE TABLE IF NOT EXISTS search_history (
    id SERIAL PRIMARY KEY,
    template TEXT NOT NULL,
    locations TEXT NOT NULL DEFAULT '',
    num_results INTEGER NOT NULL DEFAULT 0,
    new_leads INTEGER NOT NULL DEFAULT 0,
    duplicate_leads INTEGER NOT NULL DEFAULT 0,
    api_queries_used INTEGER NOT NULL DEFAULT 0,
    timestamp TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  'CREATE INDEX IF NOT EXISTS idx_leads_email ON leads(email)',
  'CREATE INDEX IF NOT EXISTS idx_leads_template ON leads(template)',
  'CREATE INDEX IF NOT EXISTS idx_leads_created_at ON leads(created_at)',
];

/** Hosted relational store (e.g. a Supabase Postgres database). */
export class PostgresBackend implements LeadBackend {
  readonly kind = 'postgres' as const;

  constructor(private readonly db: Queryable) {}

  async init(): Promise<void> {
    for (const statement of SCHEMA) {
      await this.db.query(statement);
    }
  }

  async findByHash(urlHash: string): Promise<Lead | null> {
    const { rows } = await this.db.query('SELECT * FROM leads WHERE url_hash = $1', [urlHash]);
    return rows.length > 0 ? rowToLead(rows[0]) : null;
  }

  async insertLead(lead: NewLead): Promise<Lead | null> {
    const { rows } = await this.db.query(
      `INSERT INTO leads (
        first_name, last_name, company_name, website_url, email, phone,
        template, locations, url_hash, location_match, intent_match, keyword_match,
        lead_source, post_created_at, created_at, last_seen, times_seen
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17)
      ON CONFLICT (url_hash) DO NOTHING
      RETURNING *`,
      [
        lead.firstName ?? null,
        lead.lastName ?? null,
        lead.companyName ?? null,
        lead.websiteUrl,
        lead.email ?? null,
        lead.phone ?? null,
        lead.template,
        lead.locations,
        lead.urlHash,
        lead.locationMatch,
        lead.intentMatch,
        lead.keywordMatch ?? null,
        lead.leadSource,
        lead.postCreatedAt ?? null,
        lead.createdAt,
        lead.lastSeen,
        lead.timesSeen,
      ],
    );
    return rows.length > 0 ? rowToLead(rows[0]) : null;
  }

  async recordSighting(id: number, merge: LeadMerge, seenAt: Date, countIncrement: 0 | 1): Promise<void> {
    await this.db.query(
      `UPDATE leads SET
        last_seen = $1,
        times_seen = times_seen + $2,
        email = COALESCE(NULLIF($3, ''), email),
        phone = COALESCE(NULLIF($4, ''), phone),
        first_name = COALESCE(NULLIF($5, ''), first_name),
        last_name = COALESCE(NULLIF($6, ''), last_name),
        company_name = COALESCE(NULLIF($7, ''), company_name)
      WHERE id = $8`,
      [
        seenAt,
        countIncrement,
        merge.email ?? null,
        merge.phone ?? null,
        merge.firstName ?? null,
        merge.lastName ?? null,
        merge.companyName ?? null,
        id,
      ],
    );
  }

  async insertHistory(entry: Omit<SearchHistoryEntry, 'id'>): Promise<void> {
    await this.db.query(
      `INSERT INTO search_history (template, locations, num_results, new_leads, duplicate_leads, api_queries_used, timestamp)
      VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [entry.template, entry.locations, entry.numResults, entry.newLeads, entry.duplicateLeads, entry.apiQueriesUsed, entry.timestamp],
    );
  }

  async listLeads({ template, limit }: LeadQuery): Promise<Lead[]> {
    const values: unknown[] = [];
    let sql = 'SELECT * FROM leads';
    if (template) {
      values.push(template);
      sql += ` WHERE template = $${values.length}`;
    }
    sql += ' ORDER BY created_at DESC, id DESC';
    if (limit !== undefined) {
      values.push(limit);
      sql += ` LIMIT $${values.length}`;
    }
    const { rows } = await this.db.query(sql, values);
    return rows.map(rowToLead);
  }

  async listHistory(limit: number): Promise<SearchHistoryEntry[]> {
    const { rows } = await this.db.query('SELECT * FROM search_history ORDER BY timestamp DESC, id DESC LIMIT $1', [limit]);
    return rows.map(rowToHistory);
  }

  async countLeads({ withEmail, withPhone, createdSince }: LeadCountFilter): Promise<number> {
    const clauses: string[] = [];
    const values: unknown[] = [];
    if (withEmail) clauses.push("email IS NOT NULL AND email <> ''");
    if (withPhone) clauses.push("phone IS NOT NULL AND phone <> ''");
    if (createdSince) {
      values.push(createdSince);
      clauses.push(`created_at >= $${values.length}`);
    }
    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
    const { rows } = await this.db.query(`SELECT COUNT(*) AS total FROM leads${where}`, values);
    return readAggregate(rows[0], 'total');
  }

  async countSearches(): Promise<number> {
    const { rows } = await this.db.query('SELECT COUNT(*) AS total FROM search_history');
    return readAggregate(rows[0], 'total');
  }

  async mostUsedTemplate(): Promise<string | null> {
    const { rows } = await this.db.query(
      'SELECT template, COUNT(*) AS uses FROM search_history GROUP BY template ORDER BY uses DESC, MAX(id) DESC LIMIT 1',
    );
    return readText(rows[0], 'template');
  }

  async sumApiQueries(since?: Date): Promise<number> {
    const sql = 'SELECT COALESCE(SUM(api_queries_used), 0) AS total FROM search_history';
    const { rows } = since ? await this.db.query(`${sql} WHERE timestamp >= $1`, [since]) : await this.db.query(sql);
    return readAggregate(rows[0], 'total');
  }

  async deleteLeads(ids: number[]): Promise<number> {
    if (ids.length === 0) return 0;
    const { rowCount } = await this.db.query('DELETE FROM leads WHERE id = ANY($1::int[])', [ids]);
    return rowCount ?? 0;
  }

  async updateLeadSignals(id: number, { postCreatedAt, keywordMatch }: LeadSignals): Promise<boolean> {
    const sets: string[] = [];
    const values: unknown[] = [];
    if (postCreatedAt) {
      values.push(postCreatedAt);
      sets.push(`post_created_at = $${values.length}`);
    }
    if (keywordMatch !== undefined) {
      values.push(keywordMatch);
      sets.push(`keyword_match = $${values.length}`);
    }
    if (sets.length === 0) return false;
    values.push(id);
    const { rowCount } = await this.db.query(`UPDATE leads SET ${sets.join(', ')} WHERE id = $${values.length}`, values);
    return (rowCount ?? 0) > 0;
  }

  async clear(): Promise<void> {
    await this.db.query('BEGIN');
    try {
      await this.db.query('DELETE FROM leads');
      await this.db.query('DELETE FROM search_history');
      await this.db.query('COMMIT');
    } catch (error) {
      await this.db.query('ROLLBACK');
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.db.end();
  }
}
