import { TransportError } from './errors.js';
import { HeaderMap } from './headers.js';

export interface OutgoingRequest {
  method: string;
  /** Origin the request is sent to; only its scheme, host and port are used. */
  origin: URL;
  host: string;
  /** Final path, already rewritten and joined with the origin's base path. */
  path: string;
  /** Raw query string including the leading `?`, or empty. */
  query: string;
  headers: HeaderMap;
  body?: Buffer;
}

export interface UpstreamResponse {
  status: number;
  statusText: string;
  headers: HeaderMap;
  body: Buffer;
  readonly request: OutgoingRequest;
}

/**
 * Performs the network call to the origin. Pooling, retries and streaming
 * are the implementation's business.
 */
export interface Transport {
  roundTrip(request: OutgoingRequest): Promise<UpstreamResponse>;
}

export function requestUrl(request: OutgoingRequest): URL {
  const url = new URL(request.origin.origin);
  url.pathname = request.path;
  url.search = request.query;
  return url;
}

// fetch hands back a decoded body, so the origin's framing and encoding headers no longer apply
const SKIPPED_RESPONSE_HEADERS = ['transfer-encoding', 'connection', 'content-encoding', 'content-length', 'set-cookie'];

export interface FetchTransportOptions {
  timeoutMs?: number;
}

export class FetchTransport implements Transport {
  private readonly timeoutMs: number;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async roundTrip(request: OutgoingRequest): Promise<UpstreamResponse> {
    const url = requestUrl(request);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        method: request.method,
        headers: { ...request.headers.toRecord(), host: request.host },
        body: ['GET', 'HEAD'].includes(request.method) ? undefined : request.body,
        redirect: 'manual',
        signal: controller.signal,
      });

      const headers = new HeaderMap();
      response.headers.forEach((value, key) => {
        if (!SKIPPED_RESPONSE_HEADERS.includes(key.toLowerCase())) {
          headers.set(key, value);
        }
      });
      const cookies = response.headers.getSetCookie();
      if (cookies.length > 0) headers.set('set-cookie', cookies);

      const body = Buffer.from(await response.arrayBuffer());
      return {
        status: response.status,
        statusText: response.statusText,
        headers,
        body,
        request,
      };
    } catch (err) {
      if (controller.signal.aborted) {
        throw new TransportError(`Origin did not respond within ${this.timeoutMs}ms`, { cause: err });
      }
      throw new TransportError(`Origin request to ${url.host} failed: ${String(err)}`, { cause: err });
    } finally {
      clearTimeout(timeout);
    }
  }
}
