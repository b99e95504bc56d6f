import { RemoteError, toError } from '@tidemark/core';
import { z } from 'zod';
import type {
  FetchFunction,
  HttpRemoteConfig,
  PullResult,
  PushRequest,
  PushResult,
  RemoteApi,
} from './types.js';

const pushResponseSchema = z.object({
  serverRevision: z.number().int(),
});

const pullResponseSchema = z.object({
  changes: z.array(
    z.object({
      id: z.string().min(1),
      payload: z.record(z.unknown()),
      serverRevision: z.number().int(),
      updatedAt: z.number(),
      deleted: z.boolean().optional(),
    })
  ),
  cursor: z.string(),
  hasMore: z.boolean().optional(),
});

/**
 * Classify an HTTP status into a remote failure kind
 */
export function remoteErrorForStatus(status: number, context: Record<string, unknown>): RemoteError {
  const message = `HTTP error: ${status}`;
  if (status === 401 || status === 403) {
    return RemoteError.unauthorized(message, { ...context, statusCode: status });
  }
  // 409: the push was based on a stale revision; the next pull resolves it
  if (status === 408 || status === 409 || status === 425 || status === 429 || status >= 500) {
    return RemoteError.transient(message, { ...context, statusCode: status });
  }
  return RemoteError.permanent(message, { ...context, statusCode: status });
}

/**
 * HTTP client for the remote collaborator.
 *
 * ## Endpoints
 *
 * - `POST {baseUrl}/collections/:collection/push` with a {@link PushRequest}
 *   body, answering `{ serverRevision }`
 * - `GET {baseUrl}/collections/:collection/changes?since=<cursor>`,
 *   answering `{ changes, cursor, hasMore }`
 *
 * Failures reject with a `RemoteError`: 401/403 are `unauthorized`,
 * 408/409/425/429/5xx and timeouts `transient`, other 4xx `permanent`, and a
 * network failure `unreachable`.
 *
 * @example
 * ```typescript
 * const remote = createHttpRemote({
 *   baseUrl: 'https://api.example.com/sync',
 *   headers: { Authorization: `Bearer ${token}` },
 * });
 * ```
 */
export class HttpRemote implements RemoteApi {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFunction;

  constructor(config: HttpRemoteConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.headers = config.headers ?? {};
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
  }

  async push(request: PushRequest): Promise<PushResult> {
    const url = `${this.collectionUrl(request.collection)}/push`;
    const body = await this.request(url, {
      method: 'POST',
      headers: { ...this.getHeaders(), 'Idempotency-Key': request.idempotencyKey },
      body: JSON.stringify(request),
    });

    const parsed = pushResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw RemoteError.transient('Invalid push response', {
        url,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data;
  }

  async pull(collection: string, cursor: string | null): Promise<PullResult> {
    const query = cursor === null ? '' : `?since=${encodeURIComponent(cursor)}`;
    const url = `${this.collectionUrl(collection)}/changes${query}`;
    const body = await this.request(url, { method: 'GET', headers: this.getHeaders() });

    const parsed = pullResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw RemoteError.transient('Invalid pull response', {
        url,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data;
  }

  // ── Private ──────────────────────────────────────────────────────────

  private async request(url: string, init: RequestInit): Promise<unknown> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchFn(url, { ...init, signal: controller.signal });
      } catch (error) {
        if (timedOut) {
          throw RemoteError.transient('Request timeout', { url, timeoutMs: this.timeoutMs });
        }
        throw RemoteError.unreachable(`Network error: ${toError(error).message}`, { url }, toError(error));
      }

      if (!response.ok) {
        throw remoteErrorForStatus(response.status, { url });
      }

      try {
        const body: unknown = await response.json();
        return body;
      } catch (error) {
        if (timedOut) {
          throw RemoteError.transient('Request timeout', { url, timeoutMs: this.timeoutMs });
        }
        throw RemoteError.transient('Response body is not JSON', { url }, toError(error));
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private collectionUrl(collection: string): string {
    return `${this.baseUrl}/collections/${encodeURIComponent(collection)}`;
  }

  private getHeaders(): Record<string, string> {
    return {
      Accept: 'application/json',
      'Content-Type': 'application/json',
      ...this.headers,
    };
  }
}

/**
 * Creates an HTTP remote
 */
export function createHttpRemote(config: HttpRemoteConfig): HttpRemote {
  return new HttpRemote(config);
}
