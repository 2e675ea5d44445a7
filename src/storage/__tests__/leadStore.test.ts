import test from 'node:test';
import assert from 'node:assert/strict';
import { DAY_MS } from '../../core/recencyFilter';
import { PersistenceError } from '../../core/errors';
import { Candidate, Lead, SearchHistoryEntry } from '../../core/types';
import { hashUrl, LeadStore, NewLead } from '../leadStore';
import { SqliteBackend } from '../sqliteBackend';

const start = new Date('2026-03-01T12:00:00Z');

const candidate = (websiteUrl: string, extra: Partial<Candidate> = {}): Candidate => ({
  websiteUrl,
  locationMatch: true,
  intentMatch: false,
  leadSource: 'cse',
  ...extra,
});

const openStore = async (backend = new SqliteBackend(':memory:')) => {
  let now = start;
  const store = new LeadStore(backend, () => now);
  await store.init();
  return {
    store,
    advance: (ms: number) => {
      now = new Date(now.getTime() + ms);
    },
  };
};

test('url hash ignores case, surrounding space and trailing slashes', () => {
  assert.equal(hashUrl(' HTTPS://Example.com/Agent/ '), hashUrl('https://example.com/agent'));
  assert.notEqual(hashUrl('https://example.com/agent'), hashUrl('https://example.com/agents'));
  assert.match(hashUrl('https://example.com/agent'), /^[0-9a-f]{32}$/);
});

test('new leads are inserted once and repeats merge contact details', async () => {
  const { store, advance } = await openStore();

  const first = await store.addLeads(
    [candidate('https://example.com/a', { email: 'a@gmail.com', firstName: 'Ann' }), candidate('https://example.com/b')],
    'realtors',
    ['Boston MA', 'Quincy MA'],
    { apiQueriesUsed: 2 },
  );
  assert.deepEqual([first.newLeads.length, first.duplicateLeads.length, first.failed.length], [2, 0, 0]);

  advance(DAY_MS);
  const repeat = candidate(' HTTPS://Example.com/a/ ', { phone: '(617) 555-0142', email: '', firstName: 'Anne' });
  const second = await store.addLeads([repeat], 'home_sellers', ['Salem MA']);
  assert.deepEqual(second.newLeads, []);
  assert.deepEqual(second.duplicateLeads, [repeat]);

  const stored = await store.getAllLeads();
  const merged = stored.find((lead) => lead.websiteUrl === 'https://example.com/a');
  assert.ok(merged);
  assert.deepEqual(
    {
      timesSeen: merged.timesSeen,
      email: merged.email,
      phone: merged.phone,
      firstName: merged.firstName,
      template: merged.template,
      locations: merged.locations,
      createdAt: merged.createdAt,
      lastSeen: merged.lastSeen,
    },
    {
      timesSeen: 2,
      email: 'a@gmail.com',
      phone: '(617) 555-0142',
      firstName: 'Anne',
      template: 'realtors',
      locations: 'Boston MA, Quincy MA',
      createdAt: start,
      lastSeen: new Date(start.getTime() + DAY_MS),
    },
  );
  await store.close();
});

test('a url repeated within one batch counts once', async () => {
  const { store } = await openStore();

  const result = await store.addLeads(
    [candidate('https://example.com/a'), candidate('https://example.com/a/', { email: 'a@gmail.com' })],
    'realtors',
    ['Boston MA'],
  );

  assert.deepEqual([result.newLeads.length, result.duplicateLeads.length], [1, 1]);
  const [lead] = await store.getAllLeads();
  assert.equal(lead.timesSeen, 1);
  assert.equal(lead.email, 'a@gmail.com');
  await store.close();
});

test('one batch dedups by normalized url and skips empty urls', async () => {
  const { store } = await openStore();
  const first = candidate('https://example.com/agent');
  const variant = candidate(' HTTPS://Example.com/Agent/ ');

  const result = await store.addLeads([first, variant, candidate('')], 'realtors', ['Boston MA']);

  assert.deepEqual(result, { newLeads: [first], duplicateLeads: [variant], failed: [] });
  const [history] = await store.getSearchHistory();
  assert.deepEqual([history.numResults, history.newLeads, history.duplicateLeads], [3, 1, 1]);
  const leads = await store.getAllLeads();
  assert.deepEqual(
    leads.map((lead) => [lead.websiteUrl, lead.timesSeen]),
    [['https://example.com/agent', 1]],
  );
  await store.close();
});

test('concurrent batches for the same url create one lead', async () => {
  const { store } = await openStore();
  const same = candidate('https://example.com/agent');

  const results = await Promise.all([1, 2, 3, 4].map(() => store.addLeads([same], 'realtors', ['Boston MA'])));

  assert.deepEqual(
    results.map((result) => result.newLeads.length),
    [1, 0, 0, 0],
  );
  const leads = await store.getAllLeads();
  assert.equal(leads.length, 1);
  assert.equal(leads[0].timesSeen, 4);
  assert.equal((await store.getSearchHistory()).length, 4);
  await store.close();
});

test('skips empty urls but still records the search', async () => {
  const { store } = await openStore();

  const result = await store.addLeads([candidate('   ')], 'realtors', ['Boston MA']);

  assert.deepEqual(result, { newLeads: [], duplicateLeads: [], failed: [] });
  const [history] = await store.getSearchHistory();
  assert.deepEqual(
    [history.template, history.locations, history.numResults, history.newLeads, history.duplicateLeads, history.apiQueriesUsed],
    ['realtors', 'Boston MA', 1, 0, 0, 0],
  );
  await store.close();
});

test('round-trips optional signals', async () => {
  const { store } = await openStore();
  const postCreatedAt = new Date('2026-02-20T08:30:00Z');
  await store.addLeads(
    [candidate('https://www.reddit.com/r/a/comments/1/x', { leadSource: 'reddit', keywordMatch: false, postCreatedAt, intentMatch: true })],
    'home_buyers',
    ['Boston MA'],
  );

  const [lead] = await store.getAllLeads();
  assert.deepEqual(
    [lead.leadSource, lead.keywordMatch, lead.postCreatedAt, lead.intentMatch, lead.locationMatch, lead.email],
    ['reddit', false, postCreatedAt, true, true, undefined],
  );

  assert.equal(await store.updateLeadSignals(lead.id, { keywordMatch: true }), true);
  assert.equal(await store.updateLeadSignals(lead.id, {}), false);
  assert.equal(await store.updateLeadSignals(9999, { keywordMatch: true }), false);
  const [updated] = await store.getAllLeads();
  assert.equal(updated.keywordMatch, true);
  await store.close();
});

test('lists newest first with template filter and limit', async () => {
  const { store, advance } = await openStore();
  await store.addLeads([candidate('https://example.com/1')], 'realtors', ['Boston MA']);
  advance(1000);
  await store.addLeads([candidate('https://example.com/2'), candidate('https://example.com/3')], 'contractors', ['Boston MA']);

  const urls = (leads: Lead[]) => leads.map((lead) => lead.websiteUrl);
  assert.deepEqual(urls(await store.getAllLeads()), ['https://example.com/3', 'https://example.com/2', 'https://example.com/1']);
  assert.deepEqual(urls(await store.getAllLeads({ template: 'realtors' })), ['https://example.com/1']);
  assert.deepEqual(urls(await store.getAllLeads({ limit: 1 })), ['https://example.com/3']);
  assert.deepEqual(
    (await store.getSearchHistory(1)).map((entry) => entry.template),
    ['contractors'],
  );
  await store.close();
});

test('reports stats across leads and searches', async () => {
  const { store, advance } = await openStore();
  await store.addLeads([candidate('https://example.com/old', { email: 'old@gmail.com' })], 'realtors', ['Boston MA'], { apiQueriesUsed: 3 });
  advance(2 * DAY_MS);
  await store.addLeads(
    [candidate('https://example.com/new', { phone: '(617) 555-0100' }), candidate('https://example.com/both', { email: 'b@gmail.com', phone: '(617) 555-0101' })],
    'contractors',
    ['Boston MA'],
    { apiQueriesUsed: 2 },
  );
  await store.addLeads([candidate('https://example.com/old')], 'realtors', ['Boston MA'], { apiQueriesUsed: 1 });

  assert.deepEqual(await store.getStats(), {
    totalLeads: 3,
    leadsWithEmail: 2,
    leadsWithPhone: 2,
    newToday: 2,
    totalSearches: 3,
    mostUsedTemplate: 'realtors',
    totalApiQueries: 6,
    apiQueriesToday: 3,
  });
  await store.close();
});

test('an empty store reports no template', async () => {
  const { store } = await openStore();
  const stats = await store.getStats();
  assert.equal(stats.mostUsedTemplate, 'None');
  assert.equal(stats.totalLeads, 0);
  await store.close();
});

test('deletes single leads, batches and everything', async () => {
  const { store } = await openStore();
  await store.addLeads(['1', '2', '3', '4'].map((n) => candidate(`https://example.com/${n}`)), 'realtors', ['Boston MA']);
  const ids = (await store.getAllLeads()).map((lead) => lead.id);

  assert.equal(await store.deleteLead(ids[0]), true);
  assert.equal(await store.deleteLead(ids[0]), false);
  assert.equal(await store.deleteLeads([ids[1], ids[2], 9999]), 2);
  assert.equal(await store.deleteLeads([]), 0);
  assert.equal((await store.getAllLeads()).length, 1);

  assert.equal(await store.clearAll(), true);
  assert.deepEqual(await store.getAllLeads(), []);
  assert.deepEqual(await store.getSearchHistory(), []);
  await store.close();
});

class FailingInsertBackend extends SqliteBackend {
  async insertLead(lead: NewLead): Promise<Lead | null> {
    if (lead.websiteUrl.endsWith('/broken')) throw new Error('constraint failed');
    return super.insertLead(lead);
  }
}

test('a failing record is collected and the batch continues', async () => {
  const { store } = await openStore(new FailingInsertBackend(':memory:'));
  const broken = candidate('https://example.com/broken');

  const result = await store.addLeads([candidate('https://example.com/ok'), broken, candidate('https://example.com/after')], 'realtors', ['Boston MA']);

  assert.deepEqual(
    result.newLeads.map((lead) => lead.websiteUrl),
    ['https://example.com/ok', 'https://example.com/after'],
  );
  assert.deepEqual(result.failed, [{ candidate: broken, error: 'constraint failed' }]);
  const [history] = await store.getSearchHistory();
  assert.deepEqual([history.numResults, history.newLeads], [3, 2]);
  await store.close();
});

class FailingClearBackend extends SqliteBackend {
  async clear(): Promise<void> {
    throw new Error('database is locked');
  }
}

test('clearAll reports failure instead of throwing', async () => {
  const { store } = await openStore(new FailingClearBackend(':memory:'));
  assert.equal(await store.clearAll(), false);
  await store.close();
});

class FailingHistoryBackend extends SqliteBackend {
  async insertHistory(_entry: Omit<SearchHistoryEntry, 'id'>): Promise<void> {
    throw new Error('history table missing');
  }
}

test('a failed history write raises a persistence error carrying the saved leads', async () => {
  const { store } = await openStore(new FailingHistoryBackend(':memory:'));
  const lead = candidate('https://example.com/x');

  await assert.rejects(store.addLeads([lead], 'realtors', ['Boston MA']), (error: unknown) => {
    assert.ok(error instanceof PersistenceError);
    assert.equal(error.message, 'search history could not be recorded');
    assert.deepEqual(error.partial, { newLeads: [lead], duplicateLeads: [], failed: [] });
    return true;
  });
  assert.equal((await store.getAllLeads()).length, 1);
  await store.close();
});
