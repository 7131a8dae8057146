import path from 'node:path';
import type { Command } from 'commander';
import type { ResolvedConfig } from '../config.js';
import type { FetchLike } from '../http.js';
import { createLogger, type Logger } from '../log.js';
import type { EventsBody } from '../model.js';
import { ActivityFetchError, DEFAULT_EVENT_LIMIT, GitHubActivityClient } from '../github/client.js';
import { EventCache } from '../github/eventCache.js';
import { eventList, printEvents } from '../github/format.js';
import { baseProgram, consoleOutput, parseFormat, parsePositiveInt, type Output, type OutputFormat } from './shared.js';

export const EXIT_USER_NOT_FOUND = 2;
export const EXIT_FETCH_FAILED = 3;

export interface ActivityProgramDeps {
  config: Pick<ResolvedConfig, 'eventsFile' | 'githubApiUrl' | 'githubToken' | 'httpTimeoutMs'>;
  out?: Output;
  logger?: Logger;
  fetcher?: FetchLike;
  setExitCode?: (code: number) => void;
}

export function createActivityProgram(deps: ActivityProgramDeps): Command {
  const out = deps.out ?? consoleOutput;
  const logger = deps.logger ?? createLogger('silent');
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const program = baseProgram('github-activity', 'Show recent GitHub activity for a user', out);
  const cacheFor = (file?: string) => new EventCache(file ? path.resolve(file) : deps.config.eventsFile);

  program
    .command('fetch')
    .description('Fetch a user\'s recent public events and cache them')
    .argument('<username>', 'GitHub username')
    .option('-n, --limit <n>', `Number of events to show (default: ${DEFAULT_EVENT_LIMIT})`, parsePositiveInt, DEFAULT_EVENT_LIMIT)
    .option('--cache <path>', 'Events cache file (default: events.json or TASKPULSE_EVENTS_FILE)')
    .option('--format <format>', 'Output format: pretty|json', parseFormat, 'pretty')
    .action(async (username: string, opts: { limit: number; cache?: string; format: OutputFormat }) => {
      const client = new GitHubActivityClient({
        baseUrl: deps.config.githubApiUrl,
        token: deps.config.githubToken,
        timeoutMs: deps.config.httpTimeoutMs,
        logger,
        fetcher: deps.fetcher,
      });

      let events: EventsBody;
      try {
        events = await client.fetchEvents(username, opts.limit);
      } catch (e) {
        if (!(e instanceof ActivityFetchError)) throw e;
        out.error(`Error: ${e.message}`);
        setExitCode(e.kind === 'not-found' ? EXIT_USER_NOT_FOUND : EXIT_FETCH_FAILED);
        return;
      }

      if (opts.format === 'json') out.log(JSON.stringify(events, null, 2));
      else printEvents(events, opts.limit, out.log);

      const count = eventList(events).length;
      if (!count) {
        if (opts.format === 'pretty') out.log('No events to display.');
        return;
      }

      const cache = cacheFor(opts.cache);
      try {
        await cache.save(events);
      } catch (e) {
        // the events were already shown; a cache miss is not worth failing over
        out.error(`Warning: failed to write JSON file: ${e instanceof Error ? e.message : String(e)}`);
        return;
      }

      if (opts.format === 'json') logger.info(`saved ${count} events`, { file: cache.getPath() });
      else out.log(`Saved ${count} events to ${cache.getPath()}`);
    });

  program
    .command('cached')
    .description('Show the events saved by the last fetch')
    .option('-n, --limit <n>', `Number of events to show (default: ${DEFAULT_EVENT_LIMIT})`, parsePositiveInt, DEFAULT_EVENT_LIMIT)
    .option('--cache <path>', 'Events cache file (default: events.json or TASKPULSE_EVENTS_FILE)')
    .action(async (opts: { limit: number; cache?: string }) => {
      const cache = cacheFor(opts.cache);
      logger.debug(`reading ${cache.getPath()}`);
      printEvents(await cache.load(), opts.limit, out.log);
    });

  return program;
}
