/**
 * Primary HTTP transport with no browser dependencies.
 *
 * One keep-alive undici pool plus a cookie jar, so cookies set by the warmup
 * request (and by every later response) ride along on subsequent requests the
 * way a browser session would. Redirects are followed by hand so cookies set on
 * intermediate hops are not lost.
 *
 * Non-2xx statuses are returned, not thrown: classifying them is the
 * orchestrator's job. Only transport-level faults (DNS, connection, TLS,
 * timeout) throw, always as `TransportError`.
 */

import type { ReadableStream } from 'node:stream/web';
import { fetch as undiciFetch, Agent, type Dispatcher } from 'undici';
import { CookieJar } from 'tough-cookie';
import { TransportError } from '../types.js';
import type { ImpersonationProfile } from './user-agents.js';

export interface TransportResponse {
  status: number;
  body: string;
  /** Final URL after redirects. */
  url: string;
}

export interface HttpTransport {
  get(url: string): Promise<TransportResponse>;
  close(): Promise<void>;
}

export interface UndiciTransportOptions {
  profile: ImpersonationProfile;
  timeoutMs: number;
  /** Custom dispatcher (proxy agent, or undici's MockAgent in tests). Not closed by the transport. */
  dispatcher?: Dispatcher;
  cookieJar?: CookieJar;
}

const MAX_REDIRECTS = 10;
const MAX_BODY_BYTES = 10 * 1024 * 1024; // 10MB

function createHttpPool(): Agent {
  return new Agent({
    connections: 6,
    keepAliveTimeout: 60000,
    keepAliveMaxTimeout: 60000,
  });
}

export class UndiciTransport implements HttpTransport {
  private readonly profile: ImpersonationProfile;
  private readonly timeoutMs: number;
  private readonly cookieJar: CookieJar;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private closed = false;

  constructor(options: UndiciTransportOptions) {
    this.profile = options.profile;
    this.timeoutMs = options.timeoutMs;
    this.cookieJar = options.cookieJar ?? new CookieJar();
    this.ownsDispatcher = !options.dispatcher;
    this.dispatcher = options.dispatcher ?? createHttpPool();
  }

  async get(url: string): Promise<TransportResponse> {
    if (this.closed) {
      throw new TransportError('Transport is closed', url);
    }

    const timeoutController = new AbortController();
    const timer = setTimeout(() => timeoutController.abort(), this.timeoutMs);

    let currentUrl = url;
    try {
      for (let redirectCount = 0; redirectCount <= MAX_REDIRECTS; redirectCount++) {
        const headers: Record<string, string> = { ...this.profile.headers };
        const cookie = await this.cookieJar.getCookieString(currentUrl);
        if (cookie) {
          headers['Cookie'] = cookie;
        }

        const response = await undiciFetch(currentUrl, {
          headers,
          signal: timeoutController.signal,
          dispatcher: this.dispatcher,
          redirect: 'manual',
        });

        for (const setCookie of response.headers.getSetCookie()) {
          await this.cookieJar.setCookie(setCookie, currentUrl, { ignoreError: true });
        }

        const location = response.headers.get('location');
        if (response.status >= 300 && response.status < 400 && location) {
          await response.body?.cancel();
          currentUrl = new URL(location, currentUrl).href;
          continue;
        }

        const body = await readBody(response.body, currentUrl);
        return { status: response.status, body, url: currentUrl };
      }

      throw new TransportError(`Too many redirects (max ${MAX_REDIRECTS})`, url);
    } catch (error) {
      throw toTransportError(error, currentUrl, timeoutController.signal.aborted, this.timeoutMs);
    } finally {
      clearTimeout(timer);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}

async function readBody(stream: ReadableStream<Uint8Array> | null, url: string): Promise<string> {
  if (!stream) {
    return '';
  }

  const chunks: Uint8Array[] = [];
  let totalSize = 0;
  const reader = stream.getReader();

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      totalSize += value.length;
      if (totalSize > MAX_BODY_BYTES) {
        await reader.cancel();
        throw new TransportError('Response too large (max 10MB)', url);
      }

      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }

  return Buffer.concat(chunks).toString('utf8');
}

function causeOf(error: unknown): string {
  if (!(error instanceof Error)) return '';
  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : '';
    return `${code} ${cause.message}`.trim();
  }
  return '';
}

function toTransportError(error: unknown, url: string, timedOut: boolean, timeoutMs: number): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  if (timedOut) {
    return new TransportError(`Request timed out after ${timeoutMs}ms for URL: ${url}`, url);
  }

  const hostname = safeHostname(url);
  const cause = causeOf(error);

  if (/ENOTFOUND|getaddrinfo/.test(cause)) {
    return new TransportError(`DNS resolution failed: ${hostname} not found`, url);
  }
  if (cause.includes('ECONNREFUSED')) {
    return new TransportError(`Connection refused by ${hostname}`, url);
  }
  if (/ECONNRESET|EPIPE|UND_ERR_SOCKET/.test(cause)) {
    return new TransportError(`Connection reset by ${hostname}`, url);
  }
  if (/certificate|CERT|SSL|TLS/.test(cause)) {
    return new TransportError(`TLS/SSL error for ${hostname}: ${cause}`, url);
  }

  const message = error instanceof Error ? error.message : String(error);
  const detail = cause ? ` (${cause})` : '';
  return new TransportError(`Request failed for URL: ${url}: ${message}${detail}`, url);
}

function safeHostname(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}
