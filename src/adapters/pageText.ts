import { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { createHttpClient, describeHttpError } from '../utils/httpClient';
import { log } from '../utils/logger';

export const MAX_TEXT_CHARS = 20000;

export const BROWSER_UA =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36';

export type PageTextFetcher = (url: string) => Promise<string>;

export const htmlToText = (html: string): string => {
  const $ = cheerio.load(html);
  $('script, style, noscript').remove();
  // keep adjacent elements from running together
  $('body *').each((_, el) => {
    $(el).prepend(' ').append(' ');
  });
  return $('body').text().replace(/\s+/g, ' ').trim().slice(0, MAX_TEXT_CHARS);
};

export const createPageTextFetcher =
  (http: AxiosInstance = createHttpClient({ timeoutMs: 20000, userAgent: BROWSER_UA })): PageTextFetcher =>
  async (url) => {
    if (!/^https?:\/\//i.test(url)) return '';
    try {
      const { data } = await http.get<unknown>(url, { responseType: 'text' });
      return typeof data === 'string' ? htmlToText(data) : '';
    } catch (error) {
      log('WARN', 'page fetch failed', `${url}: ${describeHttpError(error)}`);
      return '';
    }
  };
