import { SessionInvalidatedError, TransportError } from '../core/errors.js';
import type { Credential } from '../core/types.js';
import { httpRequestsTotal } from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';

export type SessionMode = 'bare' | 'persistent';
export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;
export type QueryParams = Record<string, string | number>;

export interface ApiResponse {
  status: number;
  headers: Headers;
  body: Buffer;
  text(): string;
  json(): unknown;
}

export interface RequestOptions {
  query?: QueryParams;
  json?: unknown;
  form?: FormData;
  timeoutMs?: number;
}

export interface SessionOptions {
  baseUrl: string;
  mode?: SessionMode;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export function createCredential(identity: string, secret: string): Credential {
  return Object.freeze({ identity, secret });
}

function toApiResponse(status: number, headers: Headers, body: Buffer): ApiResponse {
  return {
    status,
    headers,
    body,
    text: () => body.toString('utf8'),
    json: (): unknown => JSON.parse(body.toString('utf8')),
  };
}

/**
 * An authenticated channel for one actor. Every request carries HTTP Basic
 * credentials; a persistent session additionally keeps the cookies the server
 * hands out and replays them on later calls.
 *
 * Once {@link invalidate} is called the session refuses further requests.
 * Callers that changed the actor's permissions must open a new session rather
 * than keep using one whose server-side state may predate the change.
 */
export class CredentialedSession {
  readonly mode: SessionMode;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly cookies = new Map<string, string>();
  private invalidated = false;

  constructor(
    readonly credential: Credential,
    opts: SessionOptions,
  ) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.mode = opts.mode ?? 'bare';
    this.timeoutMs = opts.timeoutMs ?? 10000;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  get identity(): string {
    return this.credential.identity;
  }

  get isValid(): boolean {
    return !this.invalidated;
  }

  invalidate(): void {
    this.invalidated = true;
    this.cookies.clear();
  }

  get(path: string, opts?: RequestOptions) {
    return this.request('GET', path, opts);
  }

  post(path: string, opts?: RequestOptions) {
    return this.request('POST', path, opts);
  }

  patch(path: string, opts?: RequestOptions) {
    return this.request('PATCH', path, opts);
  }

  delete(path: string, opts?: RequestOptions) {
    return this.request('DELETE', path, opts);
  }

  url(path: string, query?: QueryParams): URL {
    const url = new URL(this.baseUrl + (path.startsWith('/') ? path : `/${path}`));
    for (const [k, v] of Object.entries(query ?? {})) {
      url.searchParams.set(k, String(v));
    }
    return url;
  }

  async request(method: string, path: string, opts: RequestOptions = {}): Promise<ApiResponse> {
    if (this.invalidated) throw new SessionInvalidatedError(this.identity);
    const url = this.url(path, opts.query);
    const basic = Buffer.from(`${this.credential.identity}:${this.credential.secret}`).toString(
      'base64',
    );
    const headers: Record<string, string> = { authorization: `Basic ${basic}` };
    let body: string | FormData | undefined;
    if (opts.form) {
      // fetch derives the multipart boundary header itself
      body = opts.form;
    } else if (opts.json !== undefined) {
      headers['content-type'] = 'application/json';
      body = JSON.stringify(opts.json);
    }
    if (this.mode === 'persistent' && this.cookies.size > 0) {
      headers.cookie = Array.from(this.cookies, ([k, v]) => `${k}=${v}`).join('; ');
    }

    const start = Date.now();
    let res: Response;
    let payload: Buffer;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(opts.timeoutMs ?? this.timeoutMs),
      });
      payload = Buffer.from(await res.arrayBuffer());
    } catch (err) {
      httpRequestsTotal.inc({ method, status: 'error' });
      throw new TransportError(method, url.toString(), err);
    }
    httpRequestsTotal.inc({ method, status: String(res.status) });
    if (this.mode === 'persistent') this.storeCookies(res.headers);
    getLogger().debug(
      {
        method,
        url: url.toString(),
        status: res.status,
        identity: this.identity,
        ms: Date.now() - start,
      },
      'api-request',
    );
    return toApiResponse(res.status, res.headers, payload);
  }

  private storeCookies(headers: Headers): void {
    for (const line of headers.getSetCookie()) {
      const pair = line.split(';', 1)[0];
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      this.cookies.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
  }
}
