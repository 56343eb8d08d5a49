import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import YAML from 'yaml';
import type { ZodError } from 'zod';
import { UpdaterError, ErrorCode } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';
import { configSchema, defaultConfig, type Config } from './types.js';

// ── Location ──

/** Config file path: MAC_UPDATER_CONFIG or ~/.config/mac-updater/config.yaml */
export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.MAC_UPDATER_CONFIG ?? join(homedir(), '.config', 'mac-updater', 'config.yaml');
}

// ── Error formatting ──

export function formatConfigError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `✗ ${path}: ${issue.message}` : `✗ ${issue.message}`;
    })
    .join('\n');
}

// ── Env overrides ──

/** MAC_UPDATER_SKIP_STEPS="Updating Ruby gems,Optimizing Xcode" */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const raw = env.MAC_UPDATER_SKIP_STEPS;
  if (!raw) return config;

  const extra = raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  return { ...config, skip_steps: [...new Set([...config.skip_steps, ...extra])] };
}

// ── Public API ──

/** Parse a YAML string into a validated Config. Throws UpdaterError on failure. */
export function parseConfigYaml(content: string, source = 'config'): Config {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new UpdaterError(
      ErrorCode.CONFIG_PARSE_ERROR,
      `Invalid YAML in ${source}: ${err instanceof Error ? err.message : String(err)}`,
      'Check the config file for syntax errors (indentation, colons, etc.)',
    );
  }

  // An empty file means "all defaults"
  if (raw === null || raw === undefined) return defaultConfig();

  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new UpdaterError(
      ErrorCode.CONFIG_VALIDATION_ERROR,
      `✗ ${source} must contain a YAML mapping\n  Example:\n    skip_steps:\n      - Updating Ruby gems`,
    );
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new UpdaterError(
      ErrorCode.CONFIG_VALIDATION_ERROR,
      formatConfigError(result.error),
      `Fix ${source} and try again`,
    );
  }

  return result.data;
}

/**
 * Load the config file. A missing file yields the defaults;
 * an unreadable or invalid one throws.
 */
export function loadConfig(path: string = configPath(), env: NodeJS.ProcessEnv = process.env): Config {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      debug('config', `no config at ${path}, using defaults`);
      return applyEnvOverrides(defaultConfig(), env);
    }
    throw new UpdaterError(
      ErrorCode.CONFIG_PARSE_ERROR,
      `Cannot read config ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return applyEnvOverrides(parseConfigYaml(content, path), env);
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
