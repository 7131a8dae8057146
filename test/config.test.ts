import { describe, expect, it } from 'vitest';
import path from 'node:path';
import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import { ConfigError, readEnv, resolveConfig } from '../src/config.js';
import { loadEnvFiles, parseEnvFile } from '../src/env.js';

describe('config', () => {
  it('fills in defaults relative to the working directory', () => {
    expect(resolveConfig(readEnv({}), '/work')).toEqual({
      logLevel: 'warn',
      tasksFile: path.resolve('/work', 'tasks.json'),
      eventsFile: path.resolve('/work', 'events.json'),
      httpTimeoutMs: 10_000,
      githubApiUrl: 'https://api.github.com',
      githubToken: undefined,
    });
  });

  it('reads overrides from the environment', () => {
    const env = readEnv({
      TASKPULSE_LOG_LEVEL: 'debug',
      TASKPULSE_TASKS_FILE: 'data/my-tasks.json',
      TASKPULSE_EVENTS_FILE: '/tmp/ev.json',
      TASKPULSE_HTTP_TIMEOUT_MS: '2500',
      TASKPULSE_GITHUB_API_URL: 'http://ghe.local/api/v3',
      GITHUB_TOKEN: 'test-token',
    });

    expect(resolveConfig(env, '/work')).toEqual({
      logLevel: 'debug',
      tasksFile: path.resolve('/work', 'data/my-tasks.json'),
      eventsFile: '/tmp/ev.json',
      httpTimeoutMs: 2500,
      githubApiUrl: 'http://ghe.local/api/v3',
      githubToken: 'test-token',
    });
  });

  it('treats an empty token as unset', () => {
    expect(resolveConfig(readEnv({ GITHUB_TOKEN: '' }), '/work').githubToken).toBeUndefined();
  });

  it('names the first invalid variable', () => {
    expect(() => readEnv({ TASKPULSE_LOG_LEVEL: 'loud' })).toThrow(ConfigError);
    expect(() => readEnv({ TASKPULSE_LOG_LEVEL: 'loud' })).toThrow(/^Invalid TASKPULSE_LOG_LEVEL: /);
    expect(() => readEnv({ TASKPULSE_HTTP_TIMEOUT_MS: '-1' })).toThrow(/^Invalid TASKPULSE_HTTP_TIMEOUT_MS: /);
  });
});

describe('env files', () => {
  it('parses KEY=VALUE lines, comments, export prefixes and quotes', () => {
    expect(
      parseEnvFile(['# comment', '', 'A=1', 'export B = two words ', 'C="quoted # not a comment"', "D='x'", 'broken line', 'E='].join('\n')),
    ).toEqual({ A: '1', B: 'two words', C: 'quoted # not a comment', D: 'x', E: '' });
  });

  it('does not override keys that are already set', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'taskpulse-env-'));
    await writeFile(path.join(dir, '.env'), 'GITHUB_TOKEN=from-file\nTASKPULSE_LOG_LEVEL=debug\n', 'utf8');
    await writeFile(path.join(dir, '.env.local'), 'TASKPULSE_LOG_LEVEL=info\nTASKPULSE_TASKS_FILE=local.json\n', 'utf8');
    const env: NodeJS.ProcessEnv = { GITHUB_TOKEN: 'from-shell' };

    const { loaded } = loadEnvFiles(['.env', '.env.local', '.env.missing'], dir, env);

    expect(loaded).toEqual(['.env', '.env.local']);
    expect(env).toEqual({
      GITHUB_TOKEN: 'from-shell',
      TASKPULSE_LOG_LEVEL: 'debug',
      TASKPULSE_TASKS_FILE: 'local.json',
    });
  });
});
