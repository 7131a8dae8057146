import path from 'node:path';
import { z } from 'zod';

const str = z.string().min(1);

// `FOO=` in a shell or .env file means "not set"
const blankAsUnset = <T extends z.ZodTypeAny>(schema: T) => z.preprocess((v) => (v === '' ? undefined : v), schema);

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug']);

export const EnvSchema = z.object({
  // behavior
  TASKPULSE_LOG_LEVEL: LogLevelSchema.optional(),
  TASKPULSE_TASKS_FILE: str.optional(),
  TASKPULSE_EVENTS_FILE: str.optional(),
  TASKPULSE_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().optional(),

  // GitHub
  TASKPULSE_GITHUB_API_URL: z.string().url().optional(),
  GITHUB_TOKEN: blankAsUnset(str.optional()),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export const DEFAULT_TASKS_FILE = 'tasks.json';
export const DEFAULT_EVENTS_FILE = 'events.json';
export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;
export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** Validates the environment; the first bad variable is named in the error. */
export function readEnv(env = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  const where = issue ? `${issue.path.join('.') || '(env)'}: ${issue.message}` : parsed.error.message;
  throw new ConfigError(`Invalid ${where}`, { cause: parsed.error });
}

export interface ResolvedConfig {
  logLevel: z.infer<typeof LogLevelSchema>;
  tasksFile: string;
  eventsFile: string;
  httpTimeoutMs: number;
  githubApiUrl: string;
  githubToken?: string;
}

/** Fills in defaults; relative file paths are resolved against `cwd`. */
export function resolveConfig(env: EnvConfig = readEnv(), cwd: string = process.cwd()): ResolvedConfig {
  return {
    logLevel: env.TASKPULSE_LOG_LEVEL ?? 'warn',
    tasksFile: path.resolve(cwd, env.TASKPULSE_TASKS_FILE ?? DEFAULT_TASKS_FILE),
    eventsFile: path.resolve(cwd, env.TASKPULSE_EVENTS_FILE ?? DEFAULT_EVENTS_FILE),
    httpTimeoutMs: env.TASKPULSE_HTTP_TIMEOUT_MS ?? DEFAULT_HTTP_TIMEOUT_MS,
    githubApiUrl: env.TASKPULSE_GITHUB_API_URL ?? DEFAULT_GITHUB_API_URL,
    githubToken: env.GITHUB_TOKEN,
  };
}
