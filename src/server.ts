import 'dotenv/config';
import { createApp } from './app';
import { GooglePlacesClient } from './adapters/google_places';
import { GoogleSearchClient } from './adapters/google_search';
import { BROWSER_UA, createPageTextFetcher } from './adapters/pageText';
import { RedditClient, REDDIT_TIMEOUT_MS, REDDIT_USER_AGENT } from './adapters/reddit';
import { loadConfig } from './config';
import { errorMessage } from './core/errors';
import { createLeadStore } from './storage/storeFactory';
import { createHttpClient } from './utils/httpClient';
import { log } from './utils/logger';

const main = async () => {
  const config = loadConfig();
  const store = createLeadStore(config.storage);
  await store.init();

  const proxy = config.proxyUrl;
  const { apiKey, cseId, placesApiKey } = config.google;
  if (!config.apiKey) log('WARN', 'API_KEY is not set; every protected route will answer 401');

  const app = createApp({
    store,
    apiKey: config.apiKey,
    search: apiKey && cseId ? new GoogleSearchClient(apiKey, cseId, createHttpClient({ timeoutMs: 30000, proxy })) : undefined,
    places: placesApiKey ? new GooglePlacesClient(placesApiKey, createHttpClient({ timeoutMs: 20000, proxy })) : undefined,
    postLookup: new RedditClient(createHttpClient({ timeoutMs: REDDIT_TIMEOUT_MS, userAgent: REDDIT_USER_AGENT, proxy })),
    fetchText: createPageTextFetcher(createHttpClient({ timeoutMs: 20000, userAgent: BROWSER_UA, proxy })),
    requestTimeoutMs: config.requestTimeoutMs,
    pipeline: {
      pageDelayMs: config.searchPageDelayMs,
      recencyConcurrency: config.redditLookupConcurrency,
      recencyIntervalMs: config.redditLookupDelayMs,
    },
  });

  const server = app.listen(config.port, () => log('INFO', `lead-radar listening on ${config.port}`, { storage: store.kind }));

  const shutdown = async () => {
    log('INFO', 'shutting down');
    server.close();
    await store.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown().catch((error) => log('ERROR', 'shutdown failed', errorMessage(error)));
  });
  process.on('SIGTERM', () => {
    shutdown().catch((error) => log('ERROR', 'shutdown failed', errorMessage(error)));
  });
};

main().catch((error) => {
  log('ERROR', 'failed to start', errorMessage(error));
  process.exit(1);
});
