import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { createMockOS, resetOS, setOS } from './common/os/index.ts';
import { getProfile, loadConfig, parseConfig } from './config.ts';
import { ValidationError } from './errors.ts';

describe('config', () => {
  let mockOs: ReturnType<typeof createMockOS>;

  beforeEach(() => {
    mockOs = createMockOS();
    setOS(mockOs);
  });

  afterEach(() => {
    resetOS();
  });

  test('defaults', () => {
    const config = parseConfig({});
    expect(config.driver).toBe('docker');
    expect(config.labelPrefix).toBe('shoal');
    expect(config.idempotency).toEqual({ enabled: true, ttlSeconds: 3600 });
    expect(config.profiles.map((p) => p.id)).toEqual(['python-default', 'python-data']);
    expect(getProfile(config, 'python-data')?.resources).toEqual({ cpus: 2, memory: '4g' });
    expect(getProfile(config, 'python-default')?.idleTimeoutSeconds).toBe(1800);
  });

  test('reports the path of the first invalid field', () => {
    expect(() => parseConfig({ gc: { itemConcurrency: 0 } })).toThrow(
      'Invalid configuration at gc.itemConcurrency',
    );
    expect(() => parseConfig({ labelPrefix: 'Bad Prefix' })).toThrow(ValidationError);
  });

  test('reads the config file named by SHOAL_CONFIG_FILE', () => {
    mockOs.env.set('SHOAL_CONFIG_FILE', '/etc/shoal.json');
    mockOs.fs.write('/etc/shoal.json', JSON.stringify({ driver: 'mock', retryAfterMs: 250 }));

    const config = loadConfig();
    expect(config.driver).toBe('mock');
    expect(config.retryAfterMs).toBe(250);
  });

  test('falls back to shoal.config.json in the working directory', () => {
    mockOs.fs.write(path.join(process.cwd(), 'shoal.config.json'), '{"maxTtlSeconds": 60}');
    expect(loadConfig().maxTtlSeconds).toBe(60);
  });

  test('environment wins over file and overrides', () => {
    mockOs.fs.write(
      path.join(process.cwd(), 'shoal.config.json'),
      JSON.stringify({ driver: 'docker', gc: { enabled: true, itemConcurrency: 8 } }),
    );
    mockOs.env.set('SHOAL_DRIVER', 'mock');
    mockOs.env.set('SHOAL_DB_PATH', '/tmp/test.db');
    mockOs.env.set('SHOAL_GC_ENABLED', 'false');
    mockOs.env.set('SHOAL_IDEMPOTENCY_TTL_SECONDS', '120');
    mockOs.env.set('SHOAL_START_TIMEOUT_MS', '5000');

    const config = loadConfig({ driver: 'docker' });
    expect(config.driver).toBe('mock');
    expect(config.databasePath).toBe('/tmp/test.db');
    expect(config.gc.enabled).toBe(false);
    expect(config.gc.itemConcurrency).toBe(8);
    expect(config.idempotency.ttlSeconds).toBe(120);
    expect(config.startTimeoutMs).toBe(5000);
  });

  test('rejects malformed files and numbers', () => {
    mockOs.fs.write(path.join(process.cwd(), 'shoal.config.json'), '{nope');
    expect(() => loadConfig()).toThrow('is not valid JSON');

    mockOs.fs.write(path.join(process.cwd(), 'shoal.config.json'), '[]');
    expect(() => loadConfig()).toThrow('must contain a JSON object');

    mockOs.fs.write(path.join(process.cwd(), 'shoal.config.json'), '{}');
    mockOs.env.set('SHOAL_START_TIMEOUT_MS', 'soon');
    expect(() => loadConfig()).toThrow('SHOAL_START_TIMEOUT_MS must be a number, got "soon"');
  });
});
