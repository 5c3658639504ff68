/**
 * Environ Digest — Environment
 *
 * Reads paths and fetch settings from environment variables.
 * The CLI loads `.env` through dotenv before calling this.
 */

import path from 'path';
import { z } from 'zod';
import { logger } from '../lib/logger';
import { DEFAULT_USER_AGENT } from '../feeds/fetcher';
import type { FetchSettings } from '../types';

const EnvironmentSchema = z.object({
  FEEDS_CONFIG_PATH: z.string().min(1).default('config/feeds.json'),
  SITE_CONFIG_PATH: z.string().min(1).default('config/site.json'),
  OUTPUT_DIR: z.string().min(1).default('site'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  FETCH_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});
type Environment = z.infer<typeof EnvironmentSchema>;

export interface EnvironmentConfig {
  feedsConfigPath: string;
  siteConfigPath: string;
  outputDir: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  fetch: FetchSettings;
}

const log = logger.child({ component: 'config' });

/**
 * Validate the environment. Relative paths resolve against `cwd`.
 * A variable that is set but unusable is reported and replaced by its default.
 */
export function loadEnvironmentConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): EnvironmentConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = EnvironmentSchema.safeParse(present);
  let vars: Environment;

  if (parsed.success) {
    vars = parsed.data;
  } else {
    const rejected = new Set(parsed.error.issues.map(issue => String(issue.path[0])));
    log.warn('Invalid environment variables, using defaults', {
      issues: parsed.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
    vars = EnvironmentSchema.parse(
      Object.fromEntries(Object.entries(present).filter(([name]) => !rejected.has(name)))
    );
  }

  return {
    feedsConfigPath: path.resolve(cwd, vars.FEEDS_CONFIG_PATH),
    siteConfigPath: path.resolve(cwd, vars.SITE_CONFIG_PATH),
    outputDir: path.resolve(cwd, vars.OUTPUT_DIR),
    logLevel: vars.LOG_LEVEL,
    fetch: {
      timeoutMs: vars.FETCH_TIMEOUT_MS,
      concurrency: vars.FETCH_CONCURRENCY,
      userAgent: vars.USER_AGENT,
    },
  };
}
