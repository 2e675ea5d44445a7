import { Pool } from 'pg';
import { StorageConfig } from '../config';
import { log } from '../utils/logger';
import { LeadStore } from './leadStore';
import { PostgresBackend, poolQueryable } from './postgresBackend';
import { SqliteBackend } from './sqliteBackend';

export const createLeadStore = (storage: StorageConfig, clock?: () => Date): LeadStore => {
  if (storage.backend === 'postgres') {
    log('INFO', 'using postgres lead store');
    return new LeadStore(new PostgresBackend(poolQueryable(new Pool({ connectionString: storage.databaseUrl }))), clock);
  }
  log('INFO', `using sqlite lead store at ${storage.sqlitePath}`);
  return new LeadStore(new SqliteBackend(storage.sqlitePath), clock);
};
