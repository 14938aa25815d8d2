import { Readable } from 'stream';
import { fetch, ProxyAgent, type Dispatcher } from 'undici';
import { socksDispatcher } from 'fetch-socks';
import { PROXY_ENV_VARS } from '../constants/index.js';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  text(): Promise<string>;
  /** Body as a Node stream; null when the response has no body */
  stream(): Readable | null;
  /** Drop an unread body so the connection can be reused */
  discard(): Promise<void>;
}

/**
 * Minimal HTTP surface used by the release index and the fetch engine.
 * Tests supply an in-process implementation.
 */
export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

/**
 * First proxy found in the environment, in precedence order
 */
export function proxyFromEnvironment(env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (const name of PROXY_ENV_VARS) {
    const value = env[name]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}

export function createProxyDispatcher(proxy: string): Dispatcher {
  let url: URL;
  try {
    url = new URL(proxy);
  } catch {
    throw new ConfigurationError(`Invalid proxy URL: ${proxy}`);
  }

  if (url.protocol === 'socks5:' || url.protocol === 'socks5h:' || url.protocol === 'socks:') {
    return socksDispatcher({
      type: 5,
      host: url.hostname,
      port: Number(url.port || 1080),
      userId: url.username ? decodeURIComponent(url.username) : undefined,
      password: url.password ? decodeURIComponent(url.password) : undefined
    });
  }
  if (url.protocol === 'socks4:') {
    return socksDispatcher({ type: 4, host: url.hostname, port: Number(url.port || 1080) });
  }
  if (url.protocol === 'http:' || url.protocol === 'https:') {
    return new ProxyAgent(proxy);
  }
  throw new ConfigurationError(`Unsupported proxy protocol '${url.protocol}' in ${proxy}`);
}

/**
 * HttpClient backed by undici's fetch. Redirects are followed.
 */
export class UndiciHttpClient implements HttpClient {
  private readonly dispatcher?: Dispatcher;

  constructor(proxy?: string) {
    if (proxy) {
      logger.debug(`Using proxy ${proxy}`);
      this.dispatcher = createProxyDispatcher(proxy);
    }
  }

  async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const response = await fetch(url, {
      headers: options.headers,
      signal: options.signal,
      redirect: 'follow',
      dispatcher: this.dispatcher
    });

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    return {
      status: response.status,
      headers,
      text: () => response.text(),
      stream: () => (response.body ? Readable.fromWeb(response.body) : null),
      discard: async () => {
        await response.body?.cancel();
      }
    };
  }
}
