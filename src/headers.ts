import type { IncomingHttpHeaders } from 'node:http';

export type HeaderInit = HeaderMap | Record<string, string | readonly string[] | undefined>;

/**
 * Case-insensitive, insertion-ordered multimap of header values.
 * Keys are stored lowercased, the way Node exposes incoming headers.
 */
export class HeaderMap implements Iterable<[string, string[]]> {
  private readonly entries = new Map<string, string[]>();

  constructor(init?: HeaderInit) {
    if (!init) return;
    if (init instanceof HeaderMap) {
      for (const [key, values] of init) this.entries.set(key, [...values]);
      return;
    }
    for (const [key, value] of Object.entries(init)) {
      if (value === undefined) continue;
      this.set(key, value);
    }
  }

  static fromIncoming(headers: IncomingHttpHeaders): HeaderMap {
    const map = new HeaderMap();
    for (const [key, value] of Object.entries(headers)) {
      if (value === undefined) continue;
      map.set(key, value);
    }
    return map;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key.toLowerCase());
  }

  /** First value for the key. */
  get(key: string): string | undefined {
    return this.entries.get(key.toLowerCase())?.[0];
  }

  values(key: string): string[] {
    return [...(this.entries.get(key.toLowerCase()) ?? [])];
  }

  set(key: string, value: string | readonly string[]): this {
    const values = typeof value === 'string' ? [value] : [...value];
    if (values.length === 0) {
      this.entries.delete(key.toLowerCase());
    } else {
      this.entries.set(key.toLowerCase(), values);
    }
    return this;
  }

  add(key: string, value: string): this {
    const existing = this.entries.get(key.toLowerCase());
    if (existing) {
      existing.push(value);
    } else {
      this.entries.set(key.toLowerCase(), [value]);
    }
    return this;
  }

  delete(key: string): boolean {
    return this.entries.delete(key.toLowerCase());
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  clone(): HeaderMap {
    return new HeaderMap(this);
  }

  /** Plain record for APIs that take one header line per key. */
  toRecord(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, values] of this.entries) {
      out[key] = key === 'cookie' ? values.join('; ') : values.join(', ');
    }
    return out;
  }

  toJSON(): Record<string, string[]> {
    return Object.fromEntries(this.entries);
  }

  *[Symbol.iterator](): Iterator<[string, string[]]> {
    for (const [key, values] of this.entries) yield [key, [...values]];
  }
}

export interface HasHeaders {
  headers: HeaderMap;
}

/** Anything a response can be written through: the framework reply, or a test double. */
export interface ResponseSink {
  readonly sent: boolean;
  status(code: number): void;
  setHeader(key: string, value: string): void;
  addHeader(key: string, value: string): void;
  send(body?: Buffer | string): void | Promise<void>;
}

function overlay(target: HeaderMap, sources: readonly (HeaderMap | undefined)[]): void {
  for (const source of sources) {
    if (!source) continue;
    for (const [key, values] of source) target.set(key, values);
  }
}

/** Later sources replace earlier values key by key; values are never appended. */
export function mergeRequestHeaders(request: HasHeaders, ...sources: (HeaderMap | undefined)[]): void {
  overlay(request.headers, sources);
}

export function mergeResponseHeaders(response: HasHeaders, ...sources: (HeaderMap | undefined)[]): void {
  overlay(response.headers, sources);
}

/** First value of each key is set on the sink, the rest are added after it. */
export function mergeSinkHeaders(sink: ResponseSink, ...sources: (HeaderMap | undefined)[]): void {
  for (const source of sources) {
    if (!source) continue;
    for (const [key, lines] of source) {
      lines.forEach((line, i) => {
        if (i === 0) {
          sink.setHeader(key, line);
          return;
        }
        sink.addHeader(key, line);
      });
    }
  }
}

const HOP_BY_HOP = [
  'connection',
  'keep-alive',
  'proxy-connection',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
];

/** Drops hop-by-hop headers, including any listed in `Connection`. */
export function removeHopHeaders(headers: HeaderMap): void {
  for (const line of headers.values('connection')) {
    for (const token of line.split(',')) {
      const name = token.trim();
      if (name) headers.delete(name);
    }
  }
  for (const name of HOP_BY_HOP) headers.delete(name);
}
