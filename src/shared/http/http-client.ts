/**
 * src/shared/http/http-client.ts
 *
 * WHY:
 * - One place that owns the outbound request timeout and turns "could not send"
 *   into a TRANSPORT_ERROR with context.
 * - `fetchFn` is injectable so tests run against an in-process fake.
 *
 * RULES:
 * - No retries, no backoff. A timeout is terminal for that call.
 * - Status codes are NOT interpreted here; callers decide what non-2xx means.
 * - A response whose body the caller does not read goes through discard(), or the
 *   connection stays held until the body is garbage-collected.
 */

import { AppError } from '../errors/app-error';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type HttpClientOptions = {
  timeoutMs: number;
  fetchFn?: FetchFn;
};

export class HttpClient {
  readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(opts: HttpClientOptions) {
    this.timeoutMs = opts.timeoutMs;
    this.fetchFn = opts.fetchFn ?? fetch;
  }

  get(url: string, context: string): Promise<Response> {
    return this.send(url, { method: 'GET', headers: { Accept: 'application/json' } }, context);
  }

  putJson(url: string, body: unknown, context: string): Promise<Response> {
    return this.send(
      url,
      {
        method: 'PUT',
        headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      },
      context,
    );
  }

  async discard(response: Response): Promise<void> {
    if (response.body && !response.bodyUsed) {
      await response.body.cancel();
    }
  }

  private async send(url: string, init: RequestInit, context: string): Promise<Response> {
    try {
      return await this.fetchFn(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      throw AppError.transport(context, err, { url, method: init.method });
    }
  }
}
