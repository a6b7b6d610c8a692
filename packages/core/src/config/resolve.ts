import { ValidationError } from '../errors';
import { DEFAULT_TIMEOUT_MS } from '../execute';
import { createLogger } from '../logger';
import { type LoadConfigOptions, loadConfig } from './load';
import type { Env } from './substitution';
import type { FeedConfigInput, ResolvedFeedConfig } from './types';

const log = createLogger('config');

/**
 * Read FEEDWIRE_* variables as a config layer.
 */
export function configFromEnv(env: Env): FeedConfigInput {
  const layer: FeedConfigInput = {};
  const baseUrl = env['FEEDWIRE_BASE_URL']?.trim();
  const proId = env['FEEDWIRE_PRO_ID']?.trim();
  const proToken = env['FEEDWIRE_PRO_TOKEN']?.trim();
  const timeout = env['FEEDWIRE_TIMEOUT_MS']?.trim();

  if (baseUrl) layer.baseUrl = baseUrl;
  if (proId) layer.proId = proId;
  if (proToken) layer.proToken = proToken;
  if (timeout) {
    const timeoutMs = Number(timeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs < 0) {
      throw new ValidationError(`FEEDWIRE_TIMEOUT_MS must be a non-negative integer, got '${timeout}'`);
    }
    layer.timeoutMs = timeoutMs;
  }
  return layer;
}

/**
 * Merge config layers, later layers winning. Headers merge per key.
 */
export function mergeConfig(...layers: FeedConfigInput[]): FeedConfigInput {
  const merged: FeedConfigInput = {};
  for (const layer of layers) {
    if (layer.baseUrl !== undefined) merged.baseUrl = layer.baseUrl;
    if (layer.proId !== undefined) merged.proId = layer.proId;
    if (layer.proToken !== undefined) merged.proToken = layer.proToken;
    if (layer.timeoutMs !== undefined) merged.timeoutMs = layer.timeoutMs;
    if (layer.headers !== undefined) merged.headers = { ...merged.headers, ...layer.headers };
  }
  return merged;
}

export type ResolveConfigOptions = {
  /** Where to start looking for feedwire.jsonc. Defaults to process.cwd(). */
  startDir?: string;
  /** Explicit config file path; disables the upward search. */
  configPath?: string;
  env?: Env;
  /** Highest-precedence values, e.g. CLI flags. */
  overrides?: FeedConfigInput;
};

/**
 * Resolve the effective configuration: file, then FEEDWIRE_* env, then
 * explicit overrides.
 */
export async function resolveFeedConfig(
  options: ResolveConfigOptions = {}
): Promise<ResolvedFeedConfig & { path?: string }> {
  const env = options.env ?? process.env;
  const loadOptions: LoadConfigOptions = options.configPath
    ? { path: options.configPath, env }
    : { startDir: options.startDir ?? process.cwd(), env };

  const loaded = await loadConfig(loadOptions);
  if (loaded.path) {
    log.debug(`loaded ${loaded.path}`);
  }

  const merged = mergeConfig(loaded.config, configFromEnv(env), options.overrides ?? {});
  if (!merged.baseUrl) {
    throw new ValidationError(
      'baseUrl is not configured (set FEEDWIRE_BASE_URL, --base-url or baseUrl in feedwire.jsonc)'
    );
  }

  const resolved: ResolvedFeedConfig & { path?: string } = {
    baseUrl: merged.baseUrl,
    timeoutMs: merged.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    headers: merged.headers ?? {}
  };
  if (merged.proId) resolved.proId = merged.proId;
  if (merged.proToken) resolved.proToken = merged.proToken;
  if (loaded.path) resolved.path = loaded.path;
  return resolved;
}
