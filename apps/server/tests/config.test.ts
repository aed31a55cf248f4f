import { describe, it, expect } from 'vitest';
import { loadConfig, ConfigError } from '../src/config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ QUADRANT_DB_PATH: '/tmp/quadrant-test.db' });
    expect(config).toEqual({
      port: 8000,
      host: '127.0.0.1',
      dbPath: '/tmp/quadrant-test.db',
      logLevel: 'info',
      seed: false,
      urgentWindowDays: 3,
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      PORT: '9090',
      HOST: '0.0.0.0',
      QUADRANT_DB_PATH: '/var/lib/quadrant.db',
      LOG_LEVEL: 'debug',
      QUADRANT_SEED: '1',
      QUADRANT_URGENT_WINDOW_DAYS: '7',
    });
    expect(config).toEqual({
      port: 9090,
      host: '0.0.0.0',
      dbPath: '/var/lib/quadrant.db',
      logLevel: 'debug',
      seed: true,
      urgentWindowDays: 7,
    });
  });

  it('falls back to the platform database path', () => {
    const config = loadConfig({});
    expect(config.dbPath).toMatch(/quadrant[\\/]quadrant\.db$/);
  });

  it('reports each invalid variable', () => {
    try {
      loadConfig({ PORT: 'http', LOG_LEVEL: 'loud' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.issues).toHaveLength(2);
      expect(err.issues[0]).toMatch(/^PORT: /);
      expect(err.issues[1]).toMatch(/^LOG_LEVEL: /);
    }
  });

  it('rejects out-of-range ports', () => {
    expect(() => loadConfig({ PORT: '70000' })).toThrow(ConfigError);
  });
});
