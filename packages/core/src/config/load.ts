import { access, readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { ValidationError } from '../errors';
import { parseJsonc } from './jsonc';
import { applySubstitutions, type Env } from './substitution';
import {
  CONFIG_FILENAMES,
  type ConfigFormat,
  type FeedConfigInput,
  FeedConfigInputSchema,
  type LoadedConfig
} from './types';

export type LoadConfigOptions = ({ path: string } | { startDir: string; stopDir?: string }) & {
  /** Environment used for `{env:NAME}` substitution. Defaults to process.env. */
  env?: Env;
};

async function fileExists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

function getFormatFromPath(configPath: string): ConfigFormat {
  return configPath.endsWith('.jsonc') ? 'jsonc' : 'json';
}

/**
 * Find a config file by walking up from startDir.
 * feedwire.jsonc is preferred over feedwire.json in the same directory.
 */
async function findUp(startDir: string, stopDir?: string): Promise<string | undefined> {
  let dir = path.resolve(startDir);
  const stop = stopDir ? path.resolve(stopDir) : undefined;

  while (true) {
    for (const filename of CONFIG_FILENAMES) {
      const candidate = path.join(dir, filename);
      if (await fileExists(candidate)) return candidate;
    }

    if (stop && dir === stop) return undefined;

    const parent = path.dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

/**
 * Parse and validate config text. Substitution runs before validation so
 * `{env:NAME}` works in any string field.
 */
export function parseConfigText(
  content: string,
  format: ConfigFormat,
  env: Env,
  label = 'config'
): FeedConfigInput {
  const raw: unknown = format === 'jsonc' ? parseJsonc(content) : JSON.parse(content);
  const result = FeedConfigInputSchema.safeParse(applySubstitutions(raw, env));
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.join('.') || 'config';
    throw new ValidationError(`Invalid ${label}: ${where}: ${issue?.message ?? 'invalid value'}`);
  }
  return result.data;
}

/**
 * Load config from an explicit path or by searching upwards.
 * Returns an empty config when no file is found.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<LoadedConfig> {
  const env = options.env ?? process.env;

  let configPath: string | undefined;
  if ('path' in options) {
    configPath = path.resolve(options.path);
    if (!(await fileExists(configPath))) {
      return { config: {} };
    }
  } else {
    configPath = await findUp(options.startDir, options.stopDir);
    if (!configPath) {
      return { config: {} };
    }
  }

  const format = getFormatFromPath(configPath);
  const content = await readFile(configPath, 'utf-8');
  const config = parseConfigText(content, format, env, `config at ${configPath}`);
  return { path: configPath, format, config };
}
