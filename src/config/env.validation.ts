import { z } from 'zod';

const isKnownTimeZone = (value: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
};

const booleanString = z
  .string()
  .regex(/^(true|false)$/i, 'Expected "true" or "false"')
  .optional();

const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('development'),
  PORT: z.string().optional(),
  HOST: z.string().optional(),
  CORS_ORIGINS: z.string().optional(),
  EVENT_LOG_URL: z.string().url('EVENT_LOG_URL must be a valid URL').optional(),
  EVENT_LOG_PATH: z.string().min(1).default('user_status_dashboard.json'),
  EVENT_LOG_CACHE_TTL_SECONDS: z
    .string()
    .regex(/^\d+$/, 'EVENT_LOG_CACHE_TTL_SECONDS must be a whole number')
    .optional(),
  EVENT_LOG_FETCH_TIMEOUT_MS: z
    .string()
    .regex(/^\d+$/, 'EVENT_LOG_FETCH_TIMEOUT_MS must be a whole number')
    .optional(),
  DISPLAY_TIMEZONE: z
    .string()
    .default('Asia/Kolkata')
    .refine(isKnownTimeZone, 'DISPLAY_TIMEZONE must be a valid IANA timezone'),
  DISPLAY_TIMEZONE_LABEL: z.string().min(1).default('IST'),
  TIMESTAMP_AMBIGUITY_POLICY: z
    .enum(['assume-utc', 'assume-local', 'tag-or-utc'])
    .default('tag-or-utc'),
  WINDOW_ANCHOR_WEEKDAY: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(
      z.enum([
        'sunday',
        'monday',
        'tuesday',
        'wednesday',
        'thursday',
        'friday',
        'saturday',
      ]),
    )
    .default('friday'),
  WINDOW_ROLLBACK_ON_ANCHOR_DAY: booleanString,
  DEFAULT_VIEW: z.enum(['latest-per-user', 'all-events']).default('latest-per-user'),
  DEFAULT_WINDOW: z
    .enum(['friday-to-today', 'today-only', 'none'])
    .default('friday-to-today'),
  PREFER_TODAY: booleanString,
  LEFT_FOR_DAY_MARKER: z.string().min(1).default('left for the day'),
});

export type Env = z.infer<typeof envSchema>;

export const validateEnv = (config: Record<string, unknown>): Env => {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const { formErrors, fieldErrors } = parsed.error.flatten();
    const messages = [
      ...formErrors,
      ...Object.entries(fieldErrors).map(
        ([field, errors]) => `${field}: ${(errors ?? []).join(', ')}`,
      ),
    ];
    throw new Error(messages.join('\n'));
  }
  return parsed.data;
};
