import axios, { AxiosError, AxiosInstance } from 'axios';

export interface HttpClientOptions {
  timeoutMs?: number;
  proxy?: string;
  userAgent?: string;
}

export const createHttpClient = ({ timeoutMs = 25000, proxy, userAgent }: HttpClientOptions = {}): AxiosInstance => {
  const headers: Record<string, string> = { 'accept-language': 'en-US,en;q=0.9' };
  if (userAgent) headers['user-agent'] = userAgent;

  const instance = axios.create({ timeout: timeoutMs, headers });
  if (proxy) {
    const p = new URL(proxy);
    instance.defaults.proxy = {
      protocol: p.protocol.replace(':', ''),
      host: p.hostname,
      port: Number(p.port || 80),
    };
  }
  return instance;
};

export const describeHttpError = (error: unknown): string => {
  if (error instanceof AxiosError) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') return `timeout: ${error.message}`;
    if (error.response) return `HTTP ${error.response.status}`;
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
};
