import { describe, it, expect, afterEach, vi } from 'vitest';
import { EnvironmentError, getEnvironmentConfig, resetEnvironmentConfig } from './env';

describe('getEnvironmentConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnvironmentConfig();
  });

  it('should cache the parsed environment until reset', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    resetEnvironmentConfig();
    expect(getEnvironmentConfig().LOG_LEVEL).toBe('warn');

    vi.stubEnv('LOG_LEVEL', 'error');
    expect(getEnvironmentConfig().LOG_LEVEL).toBe('warn');

    resetEnvironmentConfig();
    expect(getEnvironmentConfig().LOG_LEVEL).toBe('error');
  });

  it('should reject an unknown log level', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    resetEnvironmentConfig();
    expect(() => getEnvironmentConfig()).toThrow(
      'LOG_LEVEL must be one of: trace, debug, info, warn, error, fatal, silent. Got: verbose'
    );
  });

  it('should reject a malformed Supabase URL', () => {
    vi.stubEnv('SUPABASE_URL', 'not a url');
    resetEnvironmentConfig();
    expect(() => getEnvironmentConfig()).toThrow(EnvironmentError);
  });

  it('should pass the CLI config path through', () => {
    vi.stubEnv('TRADE_BOT_CONFIG_PATH', 'config/trade-bot.example.json');
    resetEnvironmentConfig();
    expect(getEnvironmentConfig().TRADE_BOT_CONFIG_PATH).toBe('config/trade-bot.example.json');
  });
});
