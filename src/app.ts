import express, { NextFunction, Request, Response } from 'express';
import { PlacesSearch } from './adapters/google_places';
import { WebSearch } from './adapters/google_search';
import { PageTextFetcher } from './adapters/pageText';
import { PostTimeLookup } from './adapters/reddit';
import { ConfigurationError, PersistenceError, SearchValidationError, errorMessage } from './core/errors';
import { withScore } from './core/leadScorer';
import { buildLeadView, isLeadSort, LEAD_SORTS } from './core/leadView';
import { PipelineDeps, runLeadSearch } from './core/pipeline';
import { getTemplate, listByCategory } from './core/templates';
import { LeadSearchRequest } from './core/types';
import { backfillKeywordMatch, backfillPostDates } from './maintenance/backfill';
import { cleanupStaleLeads } from './maintenance/cleanup';
import { LeadStore } from './storage/leadStore';
import { log } from './utils/logger';

export interface AppDeps {
  store: LeadStore;
  apiKey?: string;
  search?: WebSearch;
  places?: PlacesSearch;
  postLookup: PostTimeLookup;
  fetchText: PageTextFetcher;
  requestTimeoutMs?: number;
  now?: () => Date;
  pipeline?: Pick<PipelineDeps, 'pageDelayMs' | 'placesDelayMs' | 'recencyConcurrency' | 'recencyIntervalMs'>;
  maintenanceDelayMs?: number;
}

type Body = Record<string, unknown>;

const isBody = (value: unknown): value is Body => typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] => Array.isArray(value) && value.every((item) => typeof item === 'string');

const optionalBoolean = (body: Body, key: string): boolean | undefined => {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw new SearchValidationError(`${key} must be boolean`);
  return value;
};

const optionalPositive = (body: Body, key: string, { integer = true, max }: { integer?: boolean; max?: number } = {}): number | undefined => {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value)) || (max !== undefined && value > max)) {
    throw new SearchValidationError(`${key} must be a positive ${integer ? 'integer' : 'number'}${max !== undefined ? ` <= ${max}` : ''}`);
  }
  return value;
};

export const parseSearchRequest = (input: unknown): LeadSearchRequest => {
  if (!isBody(input)) throw new SearchValidationError('Body must be a JSON object');
  if (typeof input.template !== 'string' || !input.template.trim()) throw new SearchValidationError('template must be a non-empty string');
  if (!isStringArray(input.locations)) throw new SearchValidationError('locations must be a string[]');
  if (input.sites !== undefined && !isStringArray(input.sites)) throw new SearchValidationError('sites must be a string[]');

  return {
    template: input.template.trim(),
    locations: input.locations,
    sites: input.sites,
    maxResults: optionalPositive(input, 'maxResults', { max: 100 }),
    includeEmailDomains: optionalBoolean(input, 'includeEmailDomains'),
    strict: optionalBoolean(input, 'strict'),
    maxPostAgeDays: optionalPositive(input, 'maxPostAgeDays', { integer: false }),
    usePlaces: optionalBoolean(input, 'usePlaces'),
    maxPlaces: optionalPositive(input, 'maxPlaces', { max: 60 }),
  };
};

const queryText = (value: unknown): string | undefined => (typeof value === 'string' && value.trim() ? value.trim() : undefined);

const queryLimit = (value: unknown): number | undefined => {
  const raw = queryText(value);
  if (raw === undefined) return undefined;
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit <= 0) throw new SearchValidationError('limit must be a positive integer');
  return limit;
};

const withTimeout = async <T>(work: Promise<T>, timeoutMs: number): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('Request timeout')), timeoutMs);
  });
  try {
    return await Promise.race([work, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
};

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

// Express 4 does not forward rejected promises on its own.
const route = (handler: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
  handler(req, res).catch(next);
};

export const createApp = (deps: AppDeps) => {
  const app = express();
  const clock = deps.now ?? (() => new Date());
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_, res) => res.json({ ok: true, service: 'lead-radar' }));

  app.use((req, res, next) => {
    if (!deps.apiKey || req.header('x-api-key') !== deps.apiKey) return res.status(401).json({ error: 'Unauthorized' });
    return next();
  });

  app.get('/templates', (_, res) => {
    const categories = Object.entries(listByCategory()).map(([category, names]) => ({
      category,
      templates: names.map((name) => ({ name, description: getTemplate(name).description })),
    }));
    res.json({ success: true, categories });
  });

  app.post(
    '/searches',
    route(async (req, res) => {
      const started = Date.now();
      const request = parseSearchRequest(req.body);
      const outcome = await withTimeout(
        runLeadSearch(request, {
          ...deps.pipeline,
          search: deps.search,
          places: deps.places,
          postLookup: deps.postLookup,
          store: deps.store,
          now: clock,
        }),
        deps.requestTimeoutMs ?? 120000,
      );
      const now = clock();
      return res.json({
        success: true,
        ...outcome,
        newLeads: outcome.newLeads.map((lead) => withScore(lead, now)),
        duplicateLeads: outcome.duplicateLeads.map((lead) => withScore(lead, now)),
        runtimeSeconds: Number(((Date.now() - started) / 1000).toFixed(2)),
      });
    }),
  );

  app.get(
    '/leads',
    route(async (req, res) => {
      const sort = queryText(req.query.sort) ?? 'newest';
      if (!isLeadSort(sort)) throw new SearchValidationError(`sort must be one of ${LEAD_SORTS.join(', ')}`);
      const leads = await deps.store.getAllLeads({ template: queryText(req.query.template) });
      const view = buildLeadView(leads, { sort, q: queryText(req.query.q), limit: queryLimit(req.query.limit), now: clock() });
      return res.json({ success: true, count: view.length, leads: view });
    }),
  );

  app.delete(
    '/leads/:id',
    route(async (req, res) => {
      const id = Number(req.params.id);
      if (!Number.isInteger(id) || id <= 0) throw new SearchValidationError('id must be a positive integer');
      if (!(await deps.store.deleteLead(id))) return res.status(404).json({ success: false, error: `Lead ${id} not found` });
      return res.json({ success: true, deleted: id });
    }),
  );

  app.delete(
    '/leads',
    route(async (req, res) => {
      if (!isBody(req.body) || req.body.confirm !== true) {
        throw new SearchValidationError('Clearing all leads requires { "confirm": true }');
      }
      if (!(await deps.store.clearAll())) return res.status(500).json({ success: false, error: 'Failed to clear leads' });
      return res.json({ success: true });
    }),
  );

  app.get(
    '/stats',
    route(async (_, res) => res.json({ success: true, stats: await deps.store.getStats() })),
  );

  app.get(
    '/history',
    route(async (req, res) => res.json({ success: true, history: await deps.store.getSearchHistory(queryLimit(req.query.limit)) })),
  );

  app.post(
    '/maintenance/cleanup',
    route(async (req, res) => {
      const apply = isBody(req.body) && req.body.apply === true;
      const report = await cleanupStaleLeads(deps.store, deps.postLookup, { apply, now: clock(), delayMs: deps.maintenanceDelayMs });
      return res.json({ success: true, ...report });
    }),
  );

  app.post(
    '/maintenance/backfill/post-dates',
    route(async (_, res) => {
      const updated = await backfillPostDates(deps.store, deps.postLookup, { delayMs: deps.maintenanceDelayMs });
      return res.json({ success: true, updated });
    }),
  );

  app.post(
    '/maintenance/backfill/keyword-match',
    route(async (_, res) => {
      const updated = await backfillKeywordMatch(deps.store, deps.fetchText, { delayMs: deps.maintenanceDelayMs });
      return res.json({ success: true, updated });
    }),
  );

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SearchValidationError) return res.status(400).json({ success: false, error: error.message });
    if (error instanceof ConfigurationError) return res.status(503).json({ success: false, error: error.message });
    if (error instanceof PersistenceError) {
      log('ERROR', 'search finished with unsaved leads', error.message);
      return res.status(500).json({
        success: false,
        error: error.message,
        failed: error.partial.failed.map(({ candidate, error: reason }) => ({ websiteUrl: candidate.websiteUrl, error: reason })),
        newLeads: error.partial.newLeads.length,
        duplicateLeads: error.partial.duplicateLeads.length,
      });
    }
    if (isBody(error) && error.type === 'entity.parse.failed') {
      return res.status(400).json({ success: false, error: 'Body must be valid JSON' });
    }
    log('ERROR', 'request failed', errorMessage(error));
    return res.status(500).json({ success: false, error: errorMessage(error) });
  });

  return app;
};
