import fs from 'node:fs/promises';
import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import YAML from 'yaml';
import { z } from 'zod';
import type { ConfigError } from '../types/errors';
import { errorMessage } from '../types/errors';
import { DEFAULT_DOCKER_HOST, groupsPath, settingsPath } from './paths';

const settingsSchema = z.object({
  dockerHost: z.string().min(1).optional(),
  refreshIntervalMs: z.number().int().min(250).default(2000),
  logTail: z.number().int().min(0).default(100),
  logBufferLines: z.number().int().min(10).default(1000),
  statsHistory: z.number().int().min(2).default(60),
  stopTimeoutSeconds: z.number().int().min(0).default(10),
}).strict();

export type AppConfig = {
  dockerHost: string;
  refreshIntervalMs: number;
  logTail: number;
  logBufferLines: number;
  statsHistory: number;
  stopTimeoutSeconds: number;
  groupsFile: string;
};

export function defaultConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return resolveConfig(settingsSchema.parse({}), env);
}

function resolveConfig(settings: z.infer<typeof settingsSchema>, env: NodeJS.ProcessEnv): AppConfig {
  return {
    dockerHost: settings.dockerHost ?? env.DOCKER_HOST ?? DEFAULT_DOCKER_HOST,
    refreshIntervalMs: settings.refreshIntervalMs,
    logTail: settings.logTail,
    logBufferLines: settings.logBufferLines,
    statsHistory: settings.statsHistory,
    stopTimeoutSeconds: settings.stopTimeoutSeconds,
    groupsFile: groupsPath(env),
  };
}

export function parseConfig(text: string, file: string, env: NodeJS.ProcessEnv = process.env): ResultAsync<AppConfig, ConfigError> {
  let raw: unknown;
  try {
    raw = YAML.parse(text) ?? {};
  } catch (error) {
    return errAsync({ kind: 'config', path: file, message: `invalid YAML: ${errorMessage(error)}` });
  }
  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
    return errAsync({ kind: 'config', path: file, message: `${where}${issue?.message ?? 'invalid settings'}` });
  }
  return okAsync(resolveConfig(parsed.data, env));
}

/** Reads the YAML settings file; a missing file yields the defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ResultAsync<AppConfig, ConfigError> {
  const file = settingsPath(env);
  return ResultAsync.fromPromise(fs.readFile(file, 'utf8'), (error) => error)
    .orElse((error): ResultAsync<string, ConfigError> => {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return okAsync<string, ConfigError>('');
      return errAsync<string, ConfigError>({ kind: 'config', path: file, message: errorMessage(error) });
    })
    .andThen((text) => parseConfig(text, file, env));
}
