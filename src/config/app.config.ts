import { Env, validateEnv } from './env.validation';
import type {
  AmbiguityPolicy,
  ViewMode,
  Weekday,
  WindowMode,
} from '../status-board/status-board.types';

export interface AppConfig {
  app: {
    nodeEnv: Env['NODE_ENV'];
    host: string;
    port: number;
    corsOrigins: string[] | null;
  };
  eventLog: {
    url: string | null;
    path: string;
    cacheTtlSeconds: number;
    fetchTimeoutMs: number;
  };
  statusBoard: {
    displayTimeZone: string;
    displayTimeZoneLabel: string;
    ambiguityPolicy: AmbiguityPolicy;
    windowAnchorWeekday: Weekday;
    rollbackOnAnchorDay: boolean;
    defaultView: ViewMode;
    defaultWindow: WindowMode;
    preferToday: boolean;
    leftForDayMarker: string;
  };
}

const toBoolean = (value: string | undefined, fallback: boolean): boolean =>
  value !== undefined ? value.toLowerCase() === 'true' : fallback;

export const createAppConfig = (env: Env): AppConfig => {
  const rawTtl = env.EVENT_LOG_CACHE_TTL_SECONDS
    ? Number(env.EVENT_LOG_CACHE_TTL_SECONDS)
    : 600;
  const cacheTtlSeconds = Number.isFinite(rawTtl) && rawTtl >= 1 ? rawTtl : 600;

  const rawTimeout = env.EVENT_LOG_FETCH_TIMEOUT_MS
    ? Number(env.EVENT_LOG_FETCH_TIMEOUT_MS)
    : 30000;
  const fetchTimeoutMs =
    Number.isFinite(rawTimeout) && rawTimeout >= 100 ? rawTimeout : 30000;

  return {
    app: {
      nodeEnv: env.NODE_ENV,
      host: env.HOST ?? '0.0.0.0',
      port: env.PORT ? Number(env.PORT) : 4000,
      corsOrigins: env.CORS_ORIGINS
        ? env.CORS_ORIGINS.split(',')
            .map((origin) => origin.trim())
            .filter(Boolean)
        : null,
    },
    eventLog: {
      url: env.EVENT_LOG_URL?.trim() || null,
      path: env.EVENT_LOG_PATH,
      cacheTtlSeconds,
      fetchTimeoutMs,
    },
    statusBoard: {
      displayTimeZone: env.DISPLAY_TIMEZONE,
      displayTimeZoneLabel: env.DISPLAY_TIMEZONE_LABEL,
      ambiguityPolicy: env.TIMESTAMP_AMBIGUITY_POLICY,
      windowAnchorWeekday: env.WINDOW_ANCHOR_WEEKDAY,
      rollbackOnAnchorDay: toBoolean(env.WINDOW_ROLLBACK_ON_ANCHOR_DAY, false),
      defaultView: env.DEFAULT_VIEW,
      defaultWindow: env.DEFAULT_WINDOW,
      preferToday: toBoolean(env.PREFER_TODAY, false),
      leftForDayMarker: env.LEFT_FOR_DAY_MARKER,
    },
  };
};

export const configuration = (): AppConfig => {
  const env = validateEnv(process.env);
  return createAppConfig(env);
};
