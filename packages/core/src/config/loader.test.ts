import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'fs';
import { loadConfig, parseConfig, resolveConfigPath } from './loader.js';
import { ConfigError } from '../errors/index.js';

vi.mock('fs', async () => {
  const actual = await vi.importActual<typeof import('fs')>('fs');
  return {
    ...actual,
    existsSync: vi.fn(),
    readFileSync: vi.fn(),
  };
});

describe('loadConfig', () => {
  beforeEach(() => {
    vi.mocked(fs.existsSync).mockReturnValue(false);
    vi.mocked(fs.readFileSync).mockReturnValue('');
  });

  it('resolves the config path under .relgate', () => {
    expect(resolveConfigPath('/repo')).toBe('/repo/.relgate/config.yml');
  });

  it('returns defaults when no config file exists', () => {
    const config = loadConfig('/fake/root', {});

    expect(config.analysis).toEqual({
      concurrency: 4,
      timeoutMs: 300_000,
      maxComponents: 100,
      maxDependencies: 50,
      fallbackComponentLimit: 10,
    });
    expect(config.logging).toEqual({ level: 'info', format: 'text' });
    expect(config.ai.enabled).toBe(false);
    expect(config.ai.apiKey).toBeUndefined();
    expect(config.ai.maxCallsPerMinute).toBe(5);
  });

  it('returns defaults when the file holds non-object YAML', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue('null');

    expect(loadConfig('/fake/root', {}).analysis.concurrency).toBe(4);
  });

  it('merges partial sections with defaults', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(`
analysis:
  concurrency: 8
logging:
  format: json
`);

    const config = loadConfig('/fake/root', {});
    expect(config.analysis.concurrency).toBe(8);
    expect(config.analysis.maxComponents).toBe(100);
    expect(config.logging).toEqual({ level: 'info', format: 'json' });
  });

  it('interpolates environment variables and enables AI when a key resolves', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(`
ai:
  apiKey: "\${RELGATE_TEST_KEY}"
  model: test-model
`);

    const config = loadConfig('/fake/root', { RELGATE_TEST_KEY: 'test-secret' });
    expect(config.ai.apiKey).toBe('test-secret');
    expect(config.ai.model).toBe('test-model');
    expect(config.ai.enabled).toBe(true);
  });

  it('leaves AI disabled when the referenced variable is unset', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(`
ai:
  apiKey: "\${RELGATE_MISSING_KEY}"
`);

    const config = loadConfig('/fake/root', {});
    expect(config.ai.apiKey).toBeUndefined();
    expect(config.ai.enabled).toBe(false);
  });

  it('throws ConfigError listing invalid fields', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(`
analysis:
  concurrency: 0
`);

    expect(() => loadConfig('/fake/root', {})).toThrow(ConfigError);
    expect(() => loadConfig('/fake/root', {})).toThrow('analysis.concurrency');
  });

  it('throws ConfigError on malformed YAML', () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue('analysis: [unclosed');

    expect(() => loadConfig('/fake/root', {})).toThrow(/Failed to parse/);
  });
});

describe('parseConfig', () => {
  it('validates inline objects', () => {
    const config = parseConfig({ analysis: { timeoutMs: 1000 } }, {});
    expect(config.analysis.timeoutMs).toBe(1000);
  });

  it('rejects unknown log levels', () => {
    expect(() => parseConfig({ logging: { level: 'loud' } }, {})).toThrow(ConfigError);
  });
});
