import { RequestError, UnreachableError, describeError } from './errors.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpRequest {
  method?: HttpMethod;
  /** Serialized as JSON. */
  json?: unknown;
  /** Sent verbatim, e.g. a SQL statement. */
  text?: string;
  headers?: Record<string, string>;
}

export interface HttpClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetch?: FetchLike;
  headers?: Record<string, string>;
}

export function basicAuth(user: string, password: string): string {
  return `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`;
}

/**
 * Small JSON-over-HTTP client. Network failures and timeouts surface as
 * UnreachableError, non-2xx responses as RequestError with the status code.
 */
export class HttpClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly headers: Record<string, string>;

  constructor(opts: HttpClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/$/, '');
    this.timeoutMs = opts.timeoutMs;
    this.fetchImpl = opts.fetch ?? fetch;
    this.headers = { ...(opts.headers ?? {}) };
  }

  setHeader(name: string, value: string): void {
    this.headers[name] = value;
  }

  async send(path: string, req: HttpRequest = {}): Promise<Response> {
    const method = req.method ?? 'GET';
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = { ...this.headers, ...(req.headers ?? {}) };
    let body: string | undefined;
    if (req.json !== undefined) {
      body = JSON.stringify(req.json);
      headers['Content-Type'] = 'application/json';
    } else if (req.text !== undefined) {
      body = req.text;
      headers['Content-Type'] = 'text/plain; charset=utf-8';
    }
    let res: Response;
    try {
      res = await this.fetchImpl(url, { method, headers, body, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      throw new UnreachableError(`${method} ${url} failed: ${describeError(err)}`, { cause: err });
    }
    if (!res.ok) {
      const detail = (await res.text()).trim();
      throw new RequestError(`HTTP ${res.status} for ${method} ${path}${detail ? `: ${detail}` : ''}`, { status: res.status });
    }
    return res;
  }

  /** Parsed JSON body, or null when the response has no body. */
  async json(path: string, req?: HttpRequest): Promise<unknown> {
    const res = await this.send(path, req);
    const text = await res.text();
    if (!text) return null;
    const parsed: unknown = JSON.parse(text);
    return parsed;
  }

  async text(path: string, req?: HttpRequest): Promise<string> {
    const res = await this.send(path, req);
    return await res.text();
  }
}
