import { toUserJson } from '../../src/modules/users/user.codec';
import type { User, UserId } from '../../src/modules/users/user.types';
import { errorEnvelope, successEnvelope, toWireEnvelope } from '../../src/shared/http/envelope';
import type { FetchFn } from '../../src/shared/http/http-client';

export type RecordedRequest = {
  method: string;
  url: string;
  body: unknown;
};

type CannedResponse = { status: number; body: string | null };

/**
 * WHY:
 * - In-process stand-in for the remote users API. Tests hand `fetchFn` to the
 *   HttpClient and assert on `requests` instead of hitting a network.
 *
 * RULES:
 * - GET for an id with nothing served => 404.
 * - PUT => 204 unless failUpdate() set another status.
 */
export function createFakeUsersApi(baseUrl = 'https://users.test') {
  const gets = new Map<UserId, CannedResponse>();
  const putStatuses = new Map<UserId, number>();
  const requests: RecordedRequest[] = [];
  const prefix = `${baseUrl}/users/`;

  const fetchFn: FetchFn = (url, init) => {
    const method = init.method ?? 'GET';
    const body: unknown = typeof init.body === 'string' ? JSON.parse(init.body) : undefined;
    requests.push({ method, url, body });

    if (!url.startsWith(prefix)) {
      return Promise.resolve(new Response(null, { status: 404 }));
    }
    const userId = decodeURIComponent(url.slice(prefix.length));

    if (method === 'PUT') {
      return Promise.resolve(new Response(null, { status: putStatuses.get(userId) ?? 204 }));
    }

    const canned = gets.get(userId) ?? { status: 404, body: null };
    return Promise.resolve(
      new Response(canned.body, {
        status: canned.status,
        headers: { 'Content-Type': 'application/json' },
      }),
    );
  };

  return {
    baseUrl,
    fetchFn,
    requests,

    serveUser(user: User, id: UserId = user.id) {
      gets.set(id, {
        status: 200,
        body: JSON.stringify(toWireEnvelope(successEnvelope(user), toUserJson)),
      });
    },

    serveApiError(id: UserId, message: string) {
      gets.set(id, {
        status: 200,
        body: JSON.stringify(toWireEnvelope(errorEnvelope<User>(message), toUserJson)),
      });
    },

    serveJson(id: UserId, payload: unknown, status = 200) {
      gets.set(id, { status, body: JSON.stringify(payload) });
    },

    serveRaw(id: UserId, body: string, status = 200) {
      gets.set(id, { status, body });
    },

    failUpdate(id: UserId, status: number) {
      putStatuses.set(id, status);
    },

    countRequests(method: string, id?: UserId): number {
      return requests.filter(
        (r) => r.method === method && (id === undefined || r.url === `${prefix}${encodeURIComponent(id)}`),
      ).length;
    },
  };
}

export type FakeUsersApi = ReturnType<typeof createFakeUsersApi>;

/**
 * Response over a stream that never yields; `cancelled()` reports whether the
 * caller released the body.
 */
export function cancellableResponse(status: number) {
  let cancelled = false;
  const body = new ReadableStream<Uint8Array>({
    cancel() {
      cancelled = true;
    },
  });

  return {
    response: new Response(body, { status }),
    cancelled: () => cancelled,
  };
}
