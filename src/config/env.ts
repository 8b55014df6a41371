/**
 * Environment Variable Validation
 *
 * Reads the environment once into an immutable AppConfig. Every component
 * receives the piece of configuration it needs; nothing reads process.env
 * mid-pipeline.
 */

import { z } from 'zod';
import { ConfigurationError } from '../types/errors.js';
import type { SearchCriteria } from '../types/notice.js';
import { formatIsoDate, isIsoDate, shiftIsoDate } from '../utils/dateUtils.js';
import { PNCP_DEFAULTS, RETRY_DEFAULTS, SEARCH_DEFAULTS, SMTP_DEFAULTS, TIMEOUTS } from './constants.js';

export interface PncpConfig {
  readonly baseUrl: string;
  readonly modalities: readonly number[];
  readonly pageSize: number;
  readonly maxPages: number;
  readonly maxAttempts: number;
  readonly retryBaseDelayMs: number;
  readonly timeoutMs: number;
}

export interface EmailConfig {
  readonly senderEmail: string;
  readonly senderCredential: string;
  readonly recipientEmail: string;
  readonly smtpHost: string;
  readonly smtpPort: number;
  readonly maxAttempts: number;
  readonly retryBaseDelayMs: number;
  readonly timeoutMs: number;
}

export interface AppConfig {
  readonly timeZone: string;
  readonly criteria: SearchCriteria;
  readonly pncp: PncpConfig;
  readonly email: EmailConfig;
}

const required = (name: string) => z.string({ required_error: `${name} is required` });

const stringList = z.string().transform((value) =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
);

const integerList = z.string().transform((value, ctx) => {
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  const codes: number[] = [];
  for (const item of items) {
    if (!/^\d+$/.test(item)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `contains a non-numeric code "${item}"` });
      return z.NEVER;
    }
    codes.push(parseInt(item, 10));
  }
  return codes;
});

const isoDate = z.string().refine(isIsoDate, { message: 'must be a date in YYYY-MM-DD format' });
const positiveInt = z.coerce.number().int().positive();

const envSchema = z
  .object({
    SENDER_EMAIL: required('SENDER_EMAIL').email('must be an email address'),
    SENDER_CREDENTIAL: required('SENDER_CREDENTIAL'),
    RECIPIENT_EMAIL: required('RECIPIENT_EMAIL').email('must be an email address'),

    SEARCH_KEYWORDS: stringList
      .default(SEARCH_DEFAULTS.KEYWORDS.join(','))
      .refine((list) => list.length > 0, { message: 'must list at least one keyword' }),
    SEARCH_DAYS_BACK: z.coerce.number().int().min(0).max(PNCP_DEFAULTS.MAX_WINDOW_DAYS).default(SEARCH_DEFAULTS.DAYS_BACK),
    SEARCH_DATE_FROM: isoDate.optional(),
    SEARCH_DATE_TO: isoDate.optional(),
    SEARCH_MIN_VALUE: z.coerce.number().nonnegative().optional(),
    SEARCH_MAX_VALUE: z.coerce.number().nonnegative().optional(),
    SEARCH_CATEGORIES: integerList.optional(),
    SEARCH_UF: z
      .string()
      .regex(/^[A-Za-z]{2}$/, 'must be a two-letter state code')
      .transform((uf) => uf.toUpperCase())
      .optional(),
    SEARCH_TIMEZONE: z.string().default(SEARCH_DEFAULTS.TIME_ZONE),

    PNCP_BASE_URL: z.string().url('must be a URL').default(PNCP_DEFAULTS.BASE_URL),
    PNCP_MODALITIES: integerList
      .default(PNCP_DEFAULTS.MODALITIES.join(','))
      .refine((list) => list.length > 0, { message: 'must list at least one modality code' }),
    PNCP_PAGE_SIZE: z.coerce
      .number()
      .int()
      .min(PNCP_DEFAULTS.MIN_PAGE_SIZE)
      .max(PNCP_DEFAULTS.MAX_PAGE_SIZE)
      .default(PNCP_DEFAULTS.PAGE_SIZE),
    PNCP_MAX_PAGES: positiveInt.default(PNCP_DEFAULTS.MAX_PAGES),
    PNCP_MAX_ATTEMPTS: positiveInt.default(RETRY_DEFAULTS.FETCH_MAX_ATTEMPTS),
    PNCP_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(RETRY_DEFAULTS.BASE_DELAY_MS),
    PNCP_TIMEOUT_MS: positiveInt.default(TIMEOUTS.HTTP_REQUEST_MS),

    SMTP_HOST: z.string().default(SMTP_DEFAULTS.HOST),
    SMTP_PORT: positiveInt.max(65535).default(SMTP_DEFAULTS.PORT),
    SMTP_MAX_ATTEMPTS: positiveInt.default(RETRY_DEFAULTS.DELIVERY_MAX_ATTEMPTS),
    SMTP_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(RETRY_DEFAULTS.BASE_DELAY_MS),
    SMTP_TIMEOUT_MS: positiveInt.default(TIMEOUTS.EMAIL_SEND_MS),
  })
  .superRefine((env, ctx) => {
    if (env.SEARCH_MIN_VALUE !== undefined && env.SEARCH_MAX_VALUE !== undefined && env.SEARCH_MIN_VALUE > env.SEARCH_MAX_VALUE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SEARCH_MIN_VALUE'],
        message: 'must not be greater than SEARCH_MAX_VALUE',
      });
    }
    try {
      new Intl.DateTimeFormat('en-CA', { timeZone: env.SEARCH_TIMEZONE });
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SEARCH_TIMEZONE'], message: 'must be an IANA time zone' });
    }
  });

type ParsedEnv = z.infer<typeof envSchema>;

function formatIssue(issue: z.ZodIssue): string {
  const name = issue.path.join('.');
  // required_error messages already carry the variable name
  return issue.message.startsWith(name) ? issue.message : `${name} ${issue.message}`;
}

function buildWindow(env: ParsedEnv, now: Date): SearchCriteria['window'] {
  const to = env.SEARCH_DATE_TO ?? formatIsoDate(now, env.SEARCH_TIMEZONE);
  const from = env.SEARCH_DATE_FROM ?? shiftIsoDate(to, -env.SEARCH_DAYS_BACK);

  if (from > to) {
    throw new ConfigurationError(['SEARCH_DATE_FROM must not be after SEARCH_DATE_TO']);
  }
  if (shiftIsoDate(from, PNCP_DEFAULTS.MAX_WINDOW_DAYS) < to) {
    throw new ConfigurationError([`publication window must not exceed ${PNCP_DEFAULTS.MAX_WINDOW_DAYS} days`]);
  }
  return Object.freeze({ from, to });
}

/**
 * Validate the environment and build the run configuration
 *
 * @param now - Reference instant for the default publication window
 * @throws ConfigurationError listing every missing or invalid variable (names only, never values)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, now: Date = new Date()): AppConfig {
  // Blank variables count as unset
  const input = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1].trim() !== '')
  );

  const result = envSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map(formatIssue));
  }
  const parsed = result.data;

  const criteria: SearchCriteria = Object.freeze({
    keywords: Object.freeze([...parsed.SEARCH_KEYWORDS]),
    window: buildWindow(parsed, now),
    ...(parsed.SEARCH_MIN_VALUE !== undefined && { minValue: parsed.SEARCH_MIN_VALUE }),
    ...(parsed.SEARCH_MAX_VALUE !== undefined && { maxValue: parsed.SEARCH_MAX_VALUE }),
    ...(parsed.SEARCH_CATEGORIES !== undefined &&
      parsed.SEARCH_CATEGORIES.length > 0 && { categories: Object.freeze([...parsed.SEARCH_CATEGORIES]) }),
    ...(parsed.SEARCH_UF !== undefined && { uf: parsed.SEARCH_UF }),
  });

  return Object.freeze({
    timeZone: parsed.SEARCH_TIMEZONE,
    criteria,
    pncp: Object.freeze({
      baseUrl: parsed.PNCP_BASE_URL.replace(/\/+$/, ''),
      modalities: Object.freeze([...parsed.PNCP_MODALITIES]),
      pageSize: parsed.PNCP_PAGE_SIZE,
      maxPages: parsed.PNCP_MAX_PAGES,
      maxAttempts: parsed.PNCP_MAX_ATTEMPTS,
      retryBaseDelayMs: parsed.PNCP_RETRY_BASE_DELAY_MS,
      timeoutMs: parsed.PNCP_TIMEOUT_MS,
    }),
    email: Object.freeze({
      senderEmail: parsed.SENDER_EMAIL,
      senderCredential: parsed.SENDER_CREDENTIAL,
      recipientEmail: parsed.RECIPIENT_EMAIL,
      smtpHost: parsed.SMTP_HOST,
      smtpPort: parsed.SMTP_PORT,
      maxAttempts: parsed.SMTP_MAX_ATTEMPTS,
      retryBaseDelayMs: parsed.SMTP_RETRY_BASE_DELAY_MS,
      timeoutMs: parsed.SMTP_TIMEOUT_MS,
    }),
  });
}
