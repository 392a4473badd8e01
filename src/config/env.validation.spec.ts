import { createAppConfig } from './app.config';
import { validateEnv } from './env.validation';

describe('validateEnv', () => {
  it('applies defaults to an empty environment', () => {
    expect(validateEnv({})).toEqual({
      NODE_ENV: 'development',
      EVENT_LOG_PATH: 'user_status_dashboard.json',
      DISPLAY_TIMEZONE: 'Asia/Kolkata',
      DISPLAY_TIMEZONE_LABEL: 'IST',
      TIMESTAMP_AMBIGUITY_POLICY: 'tag-or-utc',
      WINDOW_ANCHOR_WEEKDAY: 'friday',
      DEFAULT_VIEW: 'latest-per-user',
      DEFAULT_WINDOW: 'friday-to-today',
      LEFT_FOR_DAY_MARKER: 'left for the day',
    });
  });

  it('normalizes the anchor weekday', () => {
    expect(validateEnv({ WINDOW_ANCHOR_WEEKDAY: ' Monday ' }).WINDOW_ANCHOR_WEEKDAY).toBe(
      'monday',
    );
  });

  it('rejects an unknown timezone', () => {
    expect(() => validateEnv({ DISPLAY_TIMEZONE: 'Mars/Olympus_Mons' })).toThrow(
      'DISPLAY_TIMEZONE: DISPLAY_TIMEZONE must be a valid IANA timezone',
    );
  });

  it('reports every invalid field', () => {
    expect(() =>
      validateEnv({ EVENT_LOG_URL: 'not a url', PREFER_TODAY: 'yes' }),
    ).toThrow(
      'EVENT_LOG_URL: EVENT_LOG_URL must be a valid URL\nPREFER_TODAY: Expected "true" or "false"',
    );
  });
});

describe('createAppConfig', () => {
  it('groups settings by concern', () => {
    const config = createAppConfig(
      validateEnv({
        NODE_ENV: 'production',
        PORT: '8080',
        CORS_ORIGINS: 'https://board.example.test, https://ops.example.test,',
        EVENT_LOG_URL: 'https://status.example.test/log.json',
        EVENT_LOG_CACHE_TTL_SECONDS: '120',
        WINDOW_ROLLBACK_ON_ANCHOR_DAY: 'TRUE',
        PREFER_TODAY: 'false',
      }),
    );

    expect(config.app).toEqual({
      nodeEnv: 'production',
      host: '0.0.0.0',
      port: 8080,
      corsOrigins: ['https://board.example.test', 'https://ops.example.test'],
    });
    expect(config.eventLog).toEqual({
      url: 'https://status.example.test/log.json',
      path: 'user_status_dashboard.json',
      cacheTtlSeconds: 120,
      fetchTimeoutMs: 30000,
    });
    expect(config.statusBoard.rollbackOnAnchorDay).toBe(true);
    expect(config.statusBoard.preferToday).toBe(false);
  });

  it('falls back when numeric limits are out of range', () => {
    const config = createAppConfig(
      validateEnv({ EVENT_LOG_CACHE_TTL_SECONDS: '0', EVENT_LOG_FETCH_TIMEOUT_MS: '50' }),
    );

    expect(config.eventLog.cacheTtlSeconds).toBe(600);
    expect(config.eventLog.fetchTimeoutMs).toBe(30000);
    expect(config.app.corsOrigins).toBeNull();
  });
});
