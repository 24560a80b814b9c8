/**
 * @module utils/http
 * Thin fetch wrapper shared by the providers and platform connectors.
 */

export interface HttpRequest {
  method?: 'GET' | 'POST' | 'PATCH' | 'PUT';
  headers?: Record<string, string>;
  /** Serialised with JSON.stringify unless it is already a FormData. */
  body?: unknown;
  /** Per-request timeout. */
  timeoutMs: number;
  /** Outer cancellation (the run's signal). */
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  /** Parsed JSON when the body is JSON, the raw text otherwise. */
  body: unknown;
}

export class HttpError extends Error {
  readonly status: number;
  readonly body: unknown;

  constructor(label: string, status: number, body: unknown) {
    super(`${label} HTTP ${status}: ${typeof body === 'string' ? body : JSON.stringify(body)}`);
    this.name = 'HttpError';
    this.status = status;
    this.body = body;
  }
}

/** Perform a request bounded by `timeoutMs` and the caller's signal. */
export async function request(url: string, req: HttpRequest): Promise<HttpResponse> {
  const signals = [AbortSignal.timeout(req.timeoutMs)];
  if (req.signal) signals.push(req.signal);

  const headers: Record<string, string> = { ...req.headers };
  let body: string | FormData | undefined;
  if (req.body instanceof FormData) {
    body = req.body;
  } else if (req.body !== undefined) {
    body = JSON.stringify(req.body);
    headers['content-type'] ??= 'application/json';
  }

  const res = await fetch(url, {
    method: req.method ?? (body === undefined ? 'GET' : 'POST'),
    headers,
    body,
    signal: AbortSignal.any(signals),
  });

  const text = await res.text();
  return { status: res.status, ok: res.ok, body: parseBody(text) };
}

/** Like {@link request} but throws an {@link HttpError} on a non-2xx status. */
export async function requestOk(label: string, url: string, req: HttpRequest): Promise<HttpResponse> {
  const res = await request(url, req);
  if (!res.ok) throw new HttpError(label, res.status, res.body);
  return res;
}

function parseBody(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
