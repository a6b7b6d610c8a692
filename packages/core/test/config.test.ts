import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import {
  applySubstitutions,
  configFromEnv,
  loadConfig,
  mergeConfig,
  parseConfigText,
  resolveFeedConfig
} from '../src/config';
import { ValidationError } from '../src/errors';

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(path.join(os.tmpdir(), 'feedwire-config-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  test('returns an empty config when no file is found', async () => {
    const loaded = await loadConfig({ startDir: tempDir, stopDir: tempDir, env: {} });
    expect(loaded).toEqual({ config: {} });
  });

  test('finds feedwire.jsonc by searching upwards', async () => {
    const nested = path.join(tempDir, 'a', 'b');
    await mkdir(nested, { recursive: true });
    const configPath = path.join(tempDir, 'feedwire.jsonc');
    await writeFile(
      configPath,
      `{
  // local service
  "baseUrl": "http://localhost:5080",
  "timeoutMs": 1234,
  "headers": { "X-Test": "1" }
}`
    );

    const loaded = await loadConfig({ startDir: nested, stopDir: tempDir, env: {} });
    expect(loaded.path).toBe(configPath);
    expect(loaded.format).toBe('jsonc');
    expect(loaded.config).toEqual({
      baseUrl: 'http://localhost:5080',
      timeoutMs: 1234,
      headers: { 'X-Test': '1' }
    });
  });

  test('prefers feedwire.jsonc over feedwire.json in the same directory', async () => {
    await writeFile(path.join(tempDir, 'feedwire.json'), '{"proId":"from-json"}');
    await writeFile(path.join(tempDir, 'feedwire.jsonc'), '{"proId":"from-jsonc"}');

    const loaded = await loadConfig({ startDir: tempDir, stopDir: tempDir, env: {} });
    expect(loaded.config.proId).toBe('from-jsonc');
  });

  test('substitutes {env:NAME} tokens', async () => {
    const configPath = path.join(tempDir, 'custom.json');
    await writeFile(configPath, '{"proId":"p_1","proToken":"{env:FEED_TOKEN}"}');

    const loaded = await loadConfig({ path: configPath, env: { FEED_TOKEN: 'test-secret' } });
    expect(loaded.config).toEqual({ proId: 'p_1', proToken: 'test-secret' });
  });

  test('returns an empty config for a missing explicit path', async () => {
    const loaded = await loadConfig({ path: path.join(tempDir, 'missing.jsonc'), env: {} });
    expect(loaded.config).toEqual({});
  });
});

describe('parseConfigText', () => {
  test('rejects unknown keys', () => {
    expect(() => parseConfigText('{"baseURL":"x"}', 'json', {})).toThrow(ValidationError);
  });

  test('names the offending field', () => {
    expect(() => parseConfigText('{"timeoutMs":"soon"}', 'json', {})).toThrow(
      /^Invalid config: timeoutMs: /
    );
  });
});

describe('applySubstitutions', () => {
  test('replaces unset variables with an empty string and leaves keys alone', () => {
    expect(applySubstitutions({ '{env:K}': ['{env:A}-{env:MISSING}'] }, { A: 'x' })).toEqual({
      '{env:K}': ['x-']
    });
  });
});

describe('configFromEnv', () => {
  test('reads FEEDWIRE_* variables', () => {
    expect(
      configFromEnv({
        FEEDWIRE_BASE_URL: ' http://feed.test ',
        FEEDWIRE_PRO_ID: 'p_9',
        FEEDWIRE_PRO_TOKEN: 'test-secret',
        FEEDWIRE_TIMEOUT_MS: '500'
      })
    ).toEqual({
      baseUrl: 'http://feed.test',
      proId: 'p_9',
      proToken: 'test-secret',
      timeoutMs: 500
    });
  });

  test('rejects a malformed timeout', () => {
    expect(() => configFromEnv({ FEEDWIRE_TIMEOUT_MS: '1.5s' })).toThrow(ValidationError);
  });
});

describe('mergeConfig', () => {
  test('later layers win and headers merge per key', () => {
    const merged = mergeConfig(
      { baseUrl: 'http://a', headers: { A: '1', B: '1' } },
      { baseUrl: 'http://b', headers: { B: '2' } },
      { proId: 'p_1' }
    );
    expect(merged).toEqual({ baseUrl: 'http://b', proId: 'p_1', headers: { A: '1', B: '2' } });
  });
});

describe('resolveFeedConfig', () => {
  test('layers file, environment and overrides, overrides last', async () => {
    await writeFile(
      path.join(tempDir, 'feedwire.jsonc'),
      '{"baseUrl":"http://file","proId":"file-pro","timeoutMs":100}'
    );

    const resolved = await resolveFeedConfig({
      startDir: tempDir,
      env: { FEEDWIRE_PRO_ID: 'env-pro', FEEDWIRE_TIMEOUT_MS: '200' },
      overrides: { proId: 'flag-pro' }
    });

    expect(resolved).toEqual({
      baseUrl: 'http://file',
      proId: 'flag-pro',
      timeoutMs: 200,
      headers: {},
      path: path.join(tempDir, 'feedwire.jsonc')
    });
  });

  test('applies the default timeout', async () => {
    const configPath = path.join(tempDir, 'feedwire.json');
    await writeFile(configPath, '{"baseUrl":"http://file"}');

    const resolved = await resolveFeedConfig({ configPath, env: {} });
    expect(resolved.timeoutMs).toBe(30000);
    expect(resolved.proId).toBeUndefined();
  });

  test('requires a base URL', async () => {
    await expect(
      resolveFeedConfig({ configPath: path.join(tempDir, 'none.json'), env: {} })
    ).rejects.toThrow(/baseUrl is not configured/);
  });
});
