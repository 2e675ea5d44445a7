import test from 'node:test';
import assert from 'node:assert/strict';
import { CSE_URL, GoogleSearchClient, parseSearchItems } from '../google_search';
import { stubHttp } from './httpStub';

const item = (n: number) => ({ title: `Result ${n}`, snippet: `snippet ${n}`, link: `https://example.org/${n}`, displayLink: 'example.org' });

test('parses search items and skips malformed entries', () => {
  assert.deepEqual(parseSearchItems({ items: [item(1), 'junk', { title: 'No link' }] }), [
    { title: 'Result 1', snippet: 'snippet 1', link: 'https://example.org/1', displayLink: 'example.org', origin: 'cse' },
    { title: 'No link', snippet: '', link: '', displayLink: '', origin: 'cse' },
  ]);
  assert.deepEqual(parseSearchItems({}), []);
  assert.deepEqual(parseSearchItems(null), []);
});

test('sends credentials, clamps page size and passes date restriction', async () => {
  const { http, requests } = stubHttp(() => ({ items: [item(1)] }));
  const client = new GoogleSearchClient('test-key', 'test-cx', http);

  const results = await client.search('"realtor"', { num: 25, start: 11, dateRestrict: 'd30' });

  assert.equal(results.length, 1);
  assert.equal(requests[0].url, CSE_URL);
  assert.deepEqual(requests[0].params, { key: 'test-key', cx: 'test-cx', q: '"realtor"', num: 10, start: 11, dateRestrict: 'd30' });
});

test('pages until the requested total and stops at an empty page', async () => {
  const pages: Record<number, unknown[]> = {
    1: Array.from({ length: 10 }, (_, i) => item(i + 1)),
    11: [item(11), item(12), item(13)],
    21: [],
  };
  const { http, requests } = stubHttp((config) => ({ items: pages[Number(config.params.start)] }));
  const client = new GoogleSearchClient('test-key', 'test-cx', http);

  const results = await client.searchMultiplePages('q', 50, 0);

  assert.equal(results.length, 13);
  assert.deepEqual(
    requests.map((request) => request.params.start),
    [1, 11, 21],
  );
});

test('a failed request yields no results', async () => {
  const { http } = stubHttp(() => {
    throw new Error('quota exceeded');
  });
  const client = new GoogleSearchClient('test-key', 'test-cx', http);

  assert.deepEqual(await client.search('q'), []);
  assert.deepEqual(await client.searchMultiplePages('q', 30, 0), []);
});
