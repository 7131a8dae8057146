import type { EventsBody } from '../model.js';
import { HttpError, NetworkError, ResponseParseError, requestJson, type FetchLike } from '../http.js';
import { createLogger, type Logger } from '../log.js';

export type ActivityFetchErrorKind = 'not-found' | 'rate-limited' | 'http' | 'network' | 'parse';

export class ActivityFetchError extends Error {
  /** HTTP status, when the server answered. */
  readonly status?: number;

  constructor(
    public readonly kind: ActivityFetchErrorKind,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ActivityFetchError';
    this.status = options?.status;
  }
}

export interface GitHubActivityClientOptions {
  /** Default: https://api.github.com */
  baseUrl?: string;
  token?: string;
  timeoutMs?: number;
  logger?: Logger;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
}

export const DEFAULT_EVENT_LIMIT = 10;

/**
 * Reads a user's public events: `GET /users/{username}/events`.
 *
 * Auth: optional `Authorization: Bearer <token>`. Unauthenticated calls share
 * the low anonymous rate limit and surface as `rate-limited` once exhausted.
 */
export class GitHubActivityClient {
  private fetcher: FetchLike;
  private logger: Logger;

  constructor(private opts: GitHubActivityClientOptions = {}) {
    this.fetcher = opts.fetcher ?? fetch;
    this.logger = opts.logger ?? createLogger('silent');
  }

  private headers() {
    const headers: Record<string, string> = {
      accept: 'application/vnd.github+json',
      'user-agent': 'taskpulse-github-activity',
    };
    if (this.opts.token) headers.authorization = `Bearer ${this.opts.token}`;
    return headers;
  }

  eventsUrl(username: string) {
    const base = (this.opts.baseUrl ?? 'https://api.github.com').replace(/\/+$/, '');
    return `${base}/users/${encodeURIComponent(username)}/events`;
  }

  async fetchEvents(username: string, limit = DEFAULT_EVENT_LIMIT): Promise<EventsBody> {
    const url = this.eventsUrl(username);
    this.logger.debug(`GET ${url}`, { authenticated: Boolean(this.opts.token) });

    let body: EventsBody;
    try {
      body = await requestJson<EventsBody>(url, { headers: this.headers(), timeoutMs: this.opts.timeoutMs }, this.fetcher);
    } catch (e) {
      throw toFetchError(e, username);
    }

    if (!Array.isArray(body)) {
      this.logger.warn('events endpoint returned a non-array body', { type: typeof body });
      return body;
    }
    this.logger.debug(`received ${body.length} events`);
    return body.slice(0, Math.max(0, limit));
  }
}

function toFetchError(e: unknown, username: string): ActivityFetchError {
  if (e instanceof HttpError) {
    if (e.status === 404) {
      return new ActivityFetchError('not-found', `User ${username} not found.`, { cause: e, status: e.status });
    }
    if (e.status === 403) {
      return new ActivityFetchError(
        'rate-limited',
        'API rate limit exceeded or access forbidden (403). Try authenticating with a token (GITHUB_TOKEN).',
        { cause: e, status: e.status },
      );
    }
    return new ActivityFetchError('http', `HTTP error occurred: ${e.status} ${e.statusText}`.trimEnd(), {
      cause: e,
      status: e.status,
    });
  }
  if (e instanceof NetworkError) {
    return new ActivityFetchError('network', `Failed to reach the server: ${e.message}`, { cause: e });
  }
  if (e instanceof ResponseParseError) {
    return new ActivityFetchError('parse', 'Failed to parse JSON response.', { cause: e });
  }
  return new ActivityFetchError('network', e instanceof Error ? e.message : String(e), { cause: e });
}
