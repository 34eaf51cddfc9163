import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigLoader, CONFIG_FILE_NAME, loadConfig } from '../../../src/config/config-loader.js';
import { DEFAULT_CONFIG } from '../../../src/config/config-schema.js';
import type { RuntimeConfigFile } from '../../../src/config/config-schema.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('ConfigLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(content: RuntimeConfigFile | string): Promise<void> {
    const text = typeof content === 'string' ? content : JSON.stringify(content);
    await writeFile(join(dir, CONFIG_FILE_NAME), text);
  }

  it('uses the defaults when there is no config file', async () => {
    const config = await loadConfig(dir, {});

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.distillers.map((d) => [d.name, d.levels])).toEqual([
      ['instant', []],
      ['situation', ['instant']],
      ['episode', ['situation']],
    ]);
    expect(config.memory.durability).toBe('best-effort');
  });

  it('fills in defaults around the values the file sets', async () => {
    await writeConfig({ logging: { level: 'debug' }, memory: { durability: 'strict' } });

    const config = await loadConfig(dir, {});

    expect(config.logging).toEqual({ ...DEFAULT_CONFIG.logging, level: 'debug' });
    expect(config.memory).toEqual({ durability: 'strict', flushIntervalMs: 5_000 });
  });

  it('lets the environment override the file', async () => {
    await writeConfig({ logging: { level: 'debug' }, llm: { model: 'test/model' } });

    const config = await loadConfig(dir, {
      LOG_LEVEL: 'warn',
      OPENROUTER_API_KEY: 'test-secret',
      DATA_PATH: '/srv/mind',
      INGRESS_SOCKET: '7700',
    });

    expect(config.logging.level).toBe('warn');
    expect(config.logging.logDir).toBe(join('/srv/mind', 'logs'));
    expect(config.llm).toEqual({ openRouterApiKey: 'test-secret', model: 'test/model', baseUrl: null });
    expect(config.paths).toEqual({
      data: '/srv/mind',
      config: join('/srv/mind', 'config'),
      state: join('/srv/mind', 'state'),
    });
    expect(config.ingress).toMatchObject({ port: 7700, socketPath: null });
  });

  it('ignores an unknown LOG_LEVEL and takes a socket path from INGRESS_SOCKET', async () => {
    await writeConfig({ logging: { level: 'debug' } });

    const config = await loadConfig(dir, { LOG_LEVEL: 'loud', INGRESS_SOCKET: '/tmp/mind.sock' });

    expect(config.logging.level).toBe('debug');
    expect(config.ingress).toMatchObject({ socketPath: '/tmp/mind.sock', port: null });
  });

  it('rejects a file that is not JSON', async () => {
    await writeConfig('{ not json');

    await expect(loadConfig(dir, {})).rejects.toBeInstanceOf(ConfigError);
    await expect(loadConfig(dir, {})).rejects.toThrow(/is not valid JSON/);
  });

  it('names the offending field of an invalid file', async () => {
    await writeConfig('{"memory":{"durability":"sometimes"}}');

    await expect(loadConfig(dir, {})).rejects.toThrow(/^Invalid runtime\.json: memory\.durability: /);
  });

  it('rejects duplicate distiller names and unknown feedback targets', async () => {
    const distiller = { name: 'instant', level: 'instant', instructions: 'Describe it.' } as const;

    await writeConfig({ distillers: [distiller, distiller] });
    await expect(loadConfig(dir, {})).rejects.toThrow('Duplicate distiller name "instant"');

    await writeConfig({ distillers: [{ ...distiller, feedback: 'dream' }] });
    await expect(loadConfig(dir, {})).rejects.toThrow('Distiller "instant" feeds back to unknown distiller "dream"');
  });

  it('accepts a prompt template with known fields only', async () => {
    const distiller = { name: 'instant', level: 'instant', instructions: 'Describe it.' } as const;

    await writeConfig({ distillers: [{ ...distiller, promptTemplate: 'Events:\n{{timeline}}' }] });
    expect((await loadConfig(dir, {})).distillers[0]?.promptTemplate).toBe('Events:\n{{timeline}}');

    await writeConfig({ distillers: [{ ...distiller, promptTemplate: '{{weather}}' }] });
    await expect(loadConfig(dir, {})).rejects.toThrow(
      'Invalid runtime.json: distillers.0.promptTemplate: Template fields are {{timeline}} and {{recalled}}'
    );
  });

  it('keeps the raw file for inspection', async () => {
    await writeConfig({ health: { degradedThreshold: 2 } });
    const loader = new ConfigLoader(dir, {});

    const config = await loader.load();

    expect(config.health.degradedThreshold).toBe(2);
    expect(loader.getLoadedConfigFile()).toEqual({ health: { degradedThreshold: 2 } });
  });
});
