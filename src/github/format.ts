import type { EventsBody } from '../model.js';

/**
 * Display-relevant view of a raw GitHub event. Built by `classifyEvent`, which
 * fills every missing field with its default so rendering cannot fail.
 */
export type ClassifiedEvent =
  | { type: 'PushEvent'; repo: string; commits: number }
  | { type: 'IssuesEvent'; repo: string; action: string; title: string }
  | { type: 'WatchEvent'; repo: string; action: string }
  | { type: 'IssueCommentEvent'; repo: string; action: string; title: string }
  | { type: 'PullRequestEvent'; repo: string; action: string; title: string }
  | { type: 'PullRequestReviewCommentEvent'; repo: string }
  | { type: 'CreateEvent'; repo: string; refType: string; ref: string }
  | { type: 'DeleteEvent'; repo: string; refType: string; ref: string }
  | { type: 'ForkEvent'; repo: string; forkee: string }
  | { type: 'ReleaseEvent'; repo: string; action: string; tag: string }
  | { type: 'StarEvent'; repo: string; action: string }
  | { type: 'other'; rawType: string; repo: string };

export const DEFAULT_MAX_LINE_LENGTH = 80;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function child(v: unknown, key: string): Record<string, unknown> {
  if (!isRecord(v)) return {};
  const c = v[key];
  return isRecord(c) ? c : {};
}

/** Non-empty string or undefined. */
function text(v: unknown): string | undefined {
  return typeof v === 'string' && v.length > 0 ? v : undefined;
}

export function capitalize(s: string): string {
  if (!s) return s;
  return s.charAt(0).toUpperCase() + s.slice(1).toLowerCase();
}

export function truncate(value: string | undefined, maxLength: number): string {
  if (!value) return '';
  // counted in code points so astral characters are never split
  const chars = Array.from(value);
  if (chars.length <= maxLength) return value;
  return chars.slice(0, Math.max(0, maxLength - 3)).join('') + '...';
}

function commitCount(payload: Record<string, unknown>): number {
  const { commits, size } = payload;
  if (Array.isArray(commits)) return commits.length;
  if (typeof size === 'number' && Number.isFinite(size)) return size;
  return 0;
}

export function classifyEvent(event: unknown, maxLength = DEFAULT_MAX_LINE_LENGTH): ClassifiedEvent {
  const raw: Record<string, unknown> = isRecord(event) ? event : {};
  const type = text(raw.type) ?? 'UnknownEvent';
  const repo = text(child(raw, 'repo').name) ?? 'UnknownRepo';
  const payload = child(raw, 'payload');
  const action = text(payload.action);

  switch (type) {
    case 'PushEvent':
      return { type: 'PushEvent', repo, commits: commitCount(payload) };
    case 'IssuesEvent':
      return { type: 'IssuesEvent', repo, action: action ?? 'performed', title: truncate(text(child(payload, 'issue').title), maxLength) };
    case 'WatchEvent':
      return { type: 'WatchEvent', repo, action: action ?? 'started' };
    case 'IssueCommentEvent':
      return { type: 'IssueCommentEvent', repo, action: action ?? 'commented', title: truncate(text(child(payload, 'issue').title), maxLength) };
    case 'PullRequestEvent':
      return {
        type: 'PullRequestEvent',
        repo,
        action: action ?? 'performed',
        title: truncate(text(child(payload, 'pull_request').title), maxLength),
      };
    case 'PullRequestReviewCommentEvent':
      return { type: 'PullRequestReviewCommentEvent', repo };
    case 'CreateEvent':
      return { type: 'CreateEvent', repo, refType: text(payload.ref_type) ?? 'ref', ref: text(payload.ref) ?? '' };
    case 'DeleteEvent':
      return { type: 'DeleteEvent', repo, refType: text(payload.ref_type) ?? 'ref', ref: text(payload.ref) ?? '' };
    case 'ForkEvent':
      return { type: 'ForkEvent', repo, forkee: text(child(payload, 'forkee').full_name) ?? '<fork>' };
    case 'ReleaseEvent':
      return { type: 'ReleaseEvent', repo, action: action ?? 'released', tag: text(child(payload, 'release').tag_name) ?? '' };
    case 'StarEvent':
      return { type: 'StarEvent', repo, action: action ?? 'starred' };
    default:
      return { type: 'other', rawType: type, repo };
  }
}

function assertNever(x: never): never {
  throw new Error(`Unhandled event variant: ${JSON.stringify(x)}`);
}

export function describeEvent(e: ClassifiedEvent): string {
  switch (e.type) {
    case 'PushEvent':
      return `Pushed ${e.commits} commit${e.commits === 1 ? '' : 's'} to ${e.repo}`;
    case 'IssuesEvent':
      return `${capitalize(e.action)} issue '${e.title}' in ${e.repo}`;
    case 'WatchEvent':
      return `${capitalize(e.action)} watching ${e.repo}`;
    case 'IssueCommentEvent':
      return `${capitalize(e.action)} comment on issue '${e.title}' in ${e.repo}`;
    case 'PullRequestEvent':
      return `${capitalize(e.action)} pull request '${e.title}' in ${e.repo}`;
    case 'PullRequestReviewCommentEvent':
      return `Commented on a pull request in ${e.repo}`;
    case 'CreateEvent':
      return `Created ${e.refType} '${e.ref}' in ${e.repo}`;
    case 'DeleteEvent':
      return `Deleted ${e.refType} '${e.ref}' in ${e.repo}`;
    case 'ForkEvent':
      return `Forked ${e.repo} to ${e.forkee}`;
    case 'ReleaseEvent':
      return `${capitalize(e.action)} release '${e.tag}' in ${e.repo}`;
    case 'StarEvent':
      return `${capitalize(e.action)} ${e.repo}`;
    case 'other':
      return `${e.rawType} on ${e.repo}`;
    default:
      return assertNever(e);
  }
}

/** One human-readable line for a raw event. Never throws on odd input. */
export function formatEvent(event: unknown, maxLength = DEFAULT_MAX_LINE_LENGTH): string {
  return describeEvent(classifyEvent(event, maxLength));
}

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * `YYYY-MM-DD HH:MM` in UTC for ISO timestamps; the input unchanged when it
 * does not parse.
 */
export function formatTimestamp(value: string): string {
  const ms = /^\d{4}-\d{2}-\d{2}/.test(value) ? Date.parse(value) : NaN;
  if (!Number.isFinite(ms)) return value;
  const d = new Date(ms);
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}`
  );
}

/** Empty lists, objects and strings count as no events. */
export function eventList(body: EventsBody | undefined): unknown[] {
  if (body === undefined || body === null || body === '') return [];
  if (Array.isArray(body)) return body;
  if (isRecord(body) && Object.keys(body).length === 0) return [];
  return [body];
}

export function renderEvents(body: EventsBody | undefined, limit: number, maxLength = DEFAULT_MAX_LINE_LENGTH): string[] {
  const events = eventList(body).slice(0, Math.max(0, limit));
  if (!events.length) return ['No events found.'];

  return events.map((ev) => {
    const line = `- ${formatEvent(ev, maxLength)}`;
    const created = isRecord(ev) ? text(ev.created_at) : undefined;
    return created ? `${line} (${formatTimestamp(created)})` : line;
  });
}

export function printEvents(
  body: EventsBody | undefined,
  limit: number,
  write: (line: string) => void = (line) => console.log(line),
): void {
  for (const line of renderEvents(body, limit)) write(line);
}
