import test from 'node:test';
import assert from 'node:assert/strict';
import { once } from 'node:events';
import { WebSearch } from '../adapters/google_search';
import { AppDeps, createApp, parseSearchRequest } from '../app';
import { SearchValidationError } from '../core/errors';
import { SearchResult } from '../core/types';
import { LeadStore } from '../storage/leadStore';
import { SqliteBackend } from '../storage/sqliteBackend';

const now = new Date('2026-03-01T12:00:00Z');
const API_KEY = 'test-secret';

const agent: SearchResult = {
  title: 'Jane Smith - Realtor',
  snippet: 'Boston agent, email jane.smith@gmail.com',
  link: 'https://www.instagram.com/janesmith/',
  displayLink: 'www.instagram.com',
  origin: 'cse',
};

const search: WebSearch = { searchMultiplePages: async () => [agent] };

interface Reply {
  status: number;
  body: unknown;
}

/** Starts the app on an ephemeral port for the duration of `run`. */
const withServer = async (overrides: Partial<AppDeps>, run: (call: (path: string, init?: RequestInit) => Promise<Reply>) => Promise<void>) => {
  const store = new LeadStore(new SqliteBackend(':memory:'), () => now);
  await store.init();
  const app = createApp({
    store,
    apiKey: API_KEY,
    search,
    postLookup: { fetchCreatedAt: async () => null },
    fetchText: async () => '',
    now: () => now,
    ...overrides,
  });
  const server = app.listen(0);
  await once(server, 'listening');
  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : 0;

  const call = async (path: string, init: RequestInit = {}): Promise<Reply> => {
    const headers = new Headers(init.headers);
    if (!headers.has('x-api-key')) headers.set('x-api-key', API_KEY);
    if (init.body !== undefined) headers.set('content-type', 'application/json');
    const response = await fetch(`http://127.0.0.1:${port}${path}`, { ...init, headers });
    return { status: response.status, body: await response.json() };
  };

  try {
    await run(call);
  } finally {
    server.closeAllConnections();
    server.close();
    await once(server, 'close');
    await store.close();
  }
};

const readPath = (value: unknown, ...path: (string | number)[]): unknown => {
  let current = value;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
};

const post = (body: unknown): RequestInit => ({ method: 'POST', body: JSON.stringify(body) });

test('parses search requests and rejects malformed ones', () => {
  assert.deepEqual(parseSearchRequest({ template: ' realtors ', locations: ['Boston MA'], strict: true, maxPostAgeDays: 7.5 }), {
    template: 'realtors',
    locations: ['Boston MA'],
    sites: undefined,
    maxResults: undefined,
    includeEmailDomains: undefined,
    strict: true,
    maxPostAgeDays: 7.5,
    usePlaces: undefined,
    maxPlaces: undefined,
  });
  assert.throws(() => parseSearchRequest([]), /Body must be a JSON object/);
  assert.throws(() => parseSearchRequest({ template: '', locations: [] }), /template must be a non-empty string/);
  assert.throws(() => parseSearchRequest({ template: 'realtors', locations: ['Boston MA'], maxResults: 101 }), SearchValidationError);
  assert.throws(() => parseSearchRequest({ template: 'realtors', locations: ['Boston MA'], maxResults: 2.5 }), /maxResults must be a positive integer <= 100/);
  assert.throws(() => parseSearchRequest({ template: 'realtors', locations: ['Boston MA'], strict: 'yes' }), /strict must be boolean/);
});

test('health is public and everything else needs the api key', async () => {
  await withServer({}, async (call) => {
    assert.deepEqual(await call('/health', { headers: { 'x-api-key': 'wrong' } }), { status: 200, body: { ok: true, service: 'lead-radar' } });
    assert.deepEqual(await call('/stats', { headers: { 'x-api-key': 'wrong' } }), { status: 401, body: { error: 'Unauthorized' } });
  });
});

test('without a configured key every protected route is refused', async () => {
  await withServer({ apiKey: undefined }, async (call) => {
    assert.equal((await call('/templates')).status, 401);
  });
});

test('lists templates grouped by category', async () => {
  await withServer({}, async (call) => {
    const { status, body } = await call('/templates');
    assert.equal(status, 200);
    assert.equal(readPath(body, 'categories', 0, 'category'), 'Service Providers');
    assert.deepEqual(readPath(body, 'categories', 0, 'templates', 0), { name: 'realtors', description: 'Find real estate agents and realtors' });
  });
});

test('maps request errors to status codes', async () => {
  await withServer({ search: undefined }, async (call) => {
    assert.deepEqual(await call('/searches', post({ template: 'realtors', locations: 'Boston MA' })), {
      status: 400,
      body: { success: false, error: 'locations must be a string[]' },
    });

    const unknown = await call('/searches', post({ template: 'landlords', locations: ['Boston MA'] }));
    assert.equal(unknown.status, 400);
    assert.match(String(readPath(unknown.body, 'error')), /^Template 'landlords' not found/);

    assert.deepEqual(await call('/searches', post({ template: 'realtors', locations: ['Boston MA'] })), {
      status: 503,
      body: { success: false, error: 'GOOGLE_API_KEY and GOOGLE_CSE_ID are required for web search' },
    });

    assert.deepEqual(await call('/searches', { method: 'POST', body: '{"template":' }), {
      status: 400,
      body: { success: false, error: 'Body must be valid JSON' },
    });
  });
});

test('a search returns scored leads and stores them', async () => {
  await withServer({}, async (call) => {
    const { status, body } = await call('/searches', post({ template: 'realtors', locations: ['Boston MA'] }));

    assert.equal(status, 200);
    assert.equal(readPath(body, 'status'), 'completed');
    assert.equal(readPath(body, 'apiQueriesUsed'), 1);
    assert.equal(readPath(body, 'newLeads', 0, 'websiteUrl'), agent.link);
    assert.equal(readPath(body, 'newLeads', 0, 'leadScore'), 60);
    assert.equal(readPath(body, 'newLeads', 0, 'contactScore'), 13);
    assert.equal(readPath(body, 'newLeads', 0, 'goodLead'), false);

    const leads = await call('/leads?sort=score');
    assert.equal(readPath(leads.body, 'count'), 1);
    assert.equal(readPath(leads.body, 'leads', 0, 'email'), 'jane.smith@gmail.com');

    const history = await call('/history');
    assert.equal(readPath(history.body, 'history', 0, 'newLeads'), 1);
  });
});

test('a search without locations stops without storing anything', async () => {
  await withServer({}, async (call) => {
    const { status, body } = await call('/searches', post({ template: 'realtors', locations: [' '] }));
    assert.equal(status, 200);
    assert.deepEqual([readPath(body, 'status'), readPath(body, 'message')], ['stopped', 'Enter at least one location.']);
    assert.equal(readPath((await call('/stats')).body, 'stats', 'totalSearches'), 0);
  });
});

test('validates lead listing and deletion requests', async () => {
  await withServer({}, async (call) => {
    const badSort = await call('/leads?sort=loudest');
    assert.equal(badSort.status, 400);
    assert.match(String(readPath(badSort.body, 'error')), /^sort must be one of /);

    assert.equal((await call('/leads?limit=0')).status, 400);

    assert.deepEqual(await call('/leads/999', { method: 'DELETE' }), { status: 404, body: { success: false, error: 'Lead 999 not found' } });
    assert.deepEqual(await call('/leads', { method: 'DELETE' }), {
      status: 400,
      body: { success: false, error: 'Clearing all leads requires { "confirm": true }' },
    });
    assert.deepEqual(await call('/leads', { method: 'DELETE', body: JSON.stringify({ confirm: true }) }), { status: 200, body: { success: true } });
  });
});

test('deletes a stored lead by id', async () => {
  await withServer({}, async (call) => {
    await call('/searches', post({ template: 'realtors', locations: ['Boston MA'] }));
    const id = readPath((await call('/leads')).body, 'leads', 0, 'id');
    assert.equal(typeof id, 'number');

    assert.deepEqual(await call(`/leads/${String(id)}`, { method: 'DELETE' }), { status: 200, body: { success: true, deleted: id } });
    assert.equal(readPath((await call('/leads')).body, 'count'), 0);
  });
});

test('runs maintenance jobs as dry runs unless applied', async () => {
  await withServer({ maintenanceDelayMs: 0 }, async (call) => {
    const cleanup = await call('/maintenance/cleanup', post({}));
    assert.deepEqual(cleanup, {
      status: 200,
      body: { success: true, scanned: 0, candidates: [], reasons: {}, deleted: 0, applied: false },
    });
    assert.deepEqual(await call('/maintenance/backfill/post-dates', post({})), { status: 200, body: { success: true, updated: 0 } });
  });
});
