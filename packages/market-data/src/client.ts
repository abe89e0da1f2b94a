// Vendor HTTP client with caching, rate limiting and response validation
// One instance per vendor; sources build theirs from MarketDataConfig

import type { z } from 'zod';
import { UpstreamFormatError, UpstreamUnavailable } from './errors.js';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface VendorCredential {
  /** Query parameter carrying the key (e.g. `token`, `api-key`) */
  param: string;
  value: string | undefined;
  /** Environment variable users set to provide the key, named in the error */
  envVar: string;
  /** When true the request goes out without the key if it is unset */
  optional?: boolean;
}

export interface VendorClientOptions {
  name: string;
  baseUrl: string;
  timeoutMs?: number;
  /** requests per minute */
  rateLimit?: number;
  /** seconds, 0 to skip cache */
  cacheTtl?: number;
  credential?: VendorCredential;
  headers?: Record<string, string>;
}

export interface RequestOptions {
  cacheTtl?: number; // seconds, 0 to skip cache
}

interface CacheEntry {
  data: unknown;
  expiresAt: number;
}

const MAX_CACHE_ENTRIES = 1000;

export class VendorClient {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly rateLimit: number;
  private readonly defaultTtl: number;
  private readonly credential?: VendorCredential;
  private readonly headers: Record<string, string>;
  private readonly cache = new Map<string, CacheEntry>();
  private requestTimestamps: number[] = [];

  constructor(options: VendorClientOptions) {
    this.name = options.name;
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl : options.baseUrl + '/';
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.rateLimit = options.rateLimit ?? 120;
    this.defaultTtl = options.cacheTtl ?? 300;
    this.credential = options.credential;
    this.headers = options.headers ?? {};
  }

  async getJson<S extends z.ZodTypeAny>(
    endpoint: string,
    params: QueryParams,
    schema: S,
    options: RequestOptions = {},
  ): Promise<z.output<S>> {
    const url = this.buildUrl(endpoint, params);
    const data = await this.cached(`GET ${url}`, options, () =>
      this.send(url, 'GET', { Accept: 'application/json' }, res => this.decodeJson(res)),
    );
    return this.validate(schema, data);
  }

  async postJson<S extends z.ZodTypeAny>(
    endpoint: string,
    body: unknown,
    schema: S,
    options: RequestOptions = {},
  ): Promise<z.output<S>> {
    const url = this.buildUrl(endpoint, {});
    const payload = JSON.stringify(body);
    const data = await this.cached(`POST ${url} ${payload}`, options, () =>
      this.send(
        url,
        'POST',
        { Accept: 'application/json', 'Content-Type': 'application/json' },
        res => this.decodeJson(res),
        payload,
      ),
    );
    return this.validate(schema, data);
  }

  async getText(endpoint: string, params: QueryParams = {}, options: RequestOptions = {}): Promise<string> {
    const url = this.buildUrl(endpoint, params);
    const data = await this.cached(`TEXT ${url}`, options, () =>
      this.send(url, 'GET', { Accept: 'text/html,*/*' }, res => res.text()),
    );
    if (typeof data !== 'string') {
      throw new UpstreamFormatError(this.name, 'expected a text response');
    }
    return data;
  }

  /** Binary downloads are never cached */
  async getBinary(endpoint: string, params: QueryParams = {}): Promise<Uint8Array> {
    const url = this.buildUrl(endpoint, params);
    return this.send(url, 'GET', { Accept: '*/*' }, async res => new Uint8Array(await res.arrayBuffer()));
  }

  clearCache(): void {
    this.cache.clear();
  }

  buildUrl(endpoint: string, params: QueryParams): string {
    const url = new URL(endpoint.replace(/^\//, ''), this.baseUrl);
    if (this.credential?.value) url.searchParams.set(this.credential.param, this.credential.value);
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined) url.searchParams.set(k, String(v));
    }
    return url.toString();
  }

  // ── Internals ───────────────────────────────────────────────────

  private async cached(key: string, options: RequestOptions, load: () => Promise<unknown>): Promise<unknown> {
    // the configured TTL caps every per-request TTL, so 0 turns caching off
    const ttl = Math.min(options.cacheTtl ?? this.defaultTtl, this.defaultTtl);
    if (ttl > 0) {
      const hit = this.getCached(key);
      if (hit !== undefined) return hit;
    }
    const data = await load();
    if (ttl > 0) this.setCache(key, data, ttl);
    return data;
  }

  private getCached(key: string): unknown {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }
    return entry.data;
  }

  private setCache(key: string, data: unknown, ttlSeconds: number): void {
    this.cache.set(key, { data, expiresAt: Date.now() + ttlSeconds * 1000 });
    if (this.cache.size > MAX_CACHE_ENTRIES) {
      const now = Date.now();
      for (const [k, v] of this.cache) {
        if (now > v.expiresAt) this.cache.delete(k);
      }
    }
  }

  private isRateLimited(): boolean {
    const now = Date.now();
    this.requestTimestamps = this.requestTimestamps.filter(t => now - t < 60_000);
    return this.requestTimestamps.length >= this.rateLimit;
  }

  /**
   * One request, including reading the body with `read`. The timeout covers
   * both the exchange and the body read.
   */
  private async send<T>(
    url: string,
    method: 'GET' | 'POST',
    headers: Record<string, string>,
    read: (res: Response) => Promise<T>,
    body?: string,
  ): Promise<T> {
    const cred = this.credential;
    if (cred && !cred.value && !cred.optional) {
      throw new UpstreamUnavailable(this.name, `${cred.envVar} environment variable is not set`);
    }

    if (this.isRateLimited()) {
      throw new UpstreamUnavailable(this.name, `rate limit exceeded (${this.rateLimit} req/min). Try again shortly.`);
    }
    this.requestTimestamps.push(Date.now());

    const controller = new AbortController();
    let timeout: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<never>((_, reject) => {
      timeout = setTimeout(() => {
        controller.abort();
        reject(new UpstreamUnavailable(this.name, `request timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([this.exchange(url, method, headers, body, controller.signal, read), expired]);
    } finally {
      clearTimeout(timeout);
    }
  }

  private async exchange<T>(
    url: string,
    method: 'GET' | 'POST',
    headers: Record<string, string>,
    body: string | undefined,
    signal: AbortSignal,
    read: (res: Response) => Promise<T>,
  ): Promise<T> {
    let res: Response;
    try {
      res = await fetch(url, { method, headers: { ...this.headers, ...headers }, body, signal });
    } catch (err) {
      if (signal.aborted) {
        throw new UpstreamUnavailable(this.name, `request timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new UpstreamUnavailable(this.name, `request failed — ${reason}`, { cause: err });
    }

    if (!res.ok) {
      const detail = await res.text().catch(() => '');
      const status = res.status;
      if (status === 401) throw new UpstreamUnavailable(this.name, 'Invalid API key', { status });
      if (status === 403) throw new UpstreamUnavailable(this.name, 'Endpoint not available on your plan', { status });
      if (status === 429) throw new UpstreamUnavailable(this.name, 'Rate limited by server', { status });
      throw new UpstreamUnavailable(this.name, `HTTP ${status} — ${detail.slice(0, 200)}`, { status });
    }

    return read(res);
  }

  private async decodeJson(res: Response): Promise<unknown> {
    try {
      return await res.json();
    } catch (err) {
      throw new UpstreamFormatError(this.name, 'response is not valid JSON', { cause: err });
    }
  }

  private validate<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.length ? issue.path.join('.') : '(root)';
      throw new UpstreamFormatError(this.name, `unexpected response shape at ${where}: ${issue?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }
}
