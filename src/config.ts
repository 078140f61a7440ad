import path from 'path';
import { z } from 'zod';
import { LogLevel } from './logger';
import { assertTimeZone } from './services/periodService';
import { PaySplit, PeriodKind, SaleWithoutAppointmentPolicy } from './types';

export interface AppConfig {
  slack: {
    botToken?: string;
    signingSecret?: string;
    appToken?: string;
    socketMode: boolean;
    port: number;
  };
  dataFilePath: string;
  timeZone: string;
  saleWithoutAppointment: SaleWithoutAppointmentPolicy;
  revenueRatePerKw?: number;
  paySplit?: PaySplit;
  adminUsers: string[];
  leaderboardChannels: Partial<Record<PeriodKind, string>>;
  noSaleReasonTimeoutMs: number;
  logLevel: LogLevel;
}

const DEFAULT_DATA_FILE = path.join(__dirname, '../data/deals.json');

const LOG_LEVELS: Record<'debug' | 'info' | 'warn' | 'error', LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR
};

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const isTimeZone = (timeZone: string): boolean => {
  try {
    assertTimeZone(timeZone);
    return true;
  } catch {
    return false;
  }
};

const envSchema = z
  .object({
    SLACK_BOT_TOKEN: optionalString,
    SLACK_SIGNING_SECRET: optionalString,
    SLACK_APP_TOKEN: optionalString,
    SOCKET_MODE: z.preprocess(blankToUndefined, z.enum(['true', 'false']).default('false')),
    PORT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(3000)),
    DATA_FILE_PATH: optionalString,
    TIME_ZONE: z.preprocess(
      blankToUndefined,
      z.string().default('America/Chicago').refine(isTimeZone, 'must be an IANA time zone name')
    ),
    SALE_WITHOUT_APPOINTMENT: z.preprocess(blankToUndefined, z.enum(['create', 'reject']).default('create')),
    REVENUE_RATE_PER_KW: z.preprocess(blankToUndefined, z.coerce.number().positive().optional()),
    PAY_SPLIT_MODE: z.preprocess(blankToUndefined, z.enum(['percent', 'flat']).optional()),
    PAY_SPLIT_VALUE: z.preprocess(blankToUndefined, z.coerce.number().nonnegative().optional()),
    ADMIN_USERS: z.preprocess(blankToUndefined, z.string().default('')),
    LEADERBOARD_CHANNEL_DAY: optionalString,
    LEADERBOARD_CHANNEL_WEEK: optionalString,
    LEADERBOARD_CHANNEL_MONTH: optionalString,
    NO_SALE_REASON_TIMEOUT_MS: z.preprocess(
      blankToUndefined,
      z.coerce.number().int().min(60000).max(180000).default(120000)
    ),
    LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(['debug', 'info', 'warn', 'error']).default('info'))
  })
  .superRefine((env, ctx) => {
    if (env.PAY_SPLIT_MODE && env.PAY_SPLIT_VALUE === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PAY_SPLIT_VALUE'],
        message: 'is required when PAY_SPLIT_MODE is set'
      });
    }
    if (env.PAY_SPLIT_MODE === 'percent' && env.PAY_SPLIT_VALUE !== undefined && env.PAY_SPLIT_VALUE > 100) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PAY_SPLIT_VALUE'],
        message: 'must be at most 100 for a percent split'
      });
    }
  });

const toPaySplit = (mode: 'percent' | 'flat' | undefined, value: number | undefined): PaySplit | undefined => {
  if (!mode || value === undefined) return undefined;
  return mode === 'percent' ? { mode, percent: value } : { mode, amountPerDeal: value };
};

/**
 * Read and validate configuration from environment variables
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const parsed = result.data;
  const leaderboardChannels: Partial<Record<PeriodKind, string>> = {};
  if (parsed.LEADERBOARD_CHANNEL_DAY) leaderboardChannels.day = parsed.LEADERBOARD_CHANNEL_DAY;
  if (parsed.LEADERBOARD_CHANNEL_WEEK) leaderboardChannels.week = parsed.LEADERBOARD_CHANNEL_WEEK;
  if (parsed.LEADERBOARD_CHANNEL_MONTH) leaderboardChannels.month = parsed.LEADERBOARD_CHANNEL_MONTH;

  return {
    slack: {
      botToken: parsed.SLACK_BOT_TOKEN,
      signingSecret: parsed.SLACK_SIGNING_SECRET,
      appToken: parsed.SLACK_APP_TOKEN,
      socketMode: parsed.SOCKET_MODE === 'true',
      port: parsed.PORT
    },
    dataFilePath: parsed.DATA_FILE_PATH ?? DEFAULT_DATA_FILE,
    timeZone: parsed.TIME_ZONE,
    saleWithoutAppointment: parsed.SALE_WITHOUT_APPOINTMENT,
    revenueRatePerKw: parsed.REVENUE_RATE_PER_KW,
    paySplit: toPaySplit(parsed.PAY_SPLIT_MODE, parsed.PAY_SPLIT_VALUE),
    adminUsers: parsed.ADMIN_USERS.split(',').map(id => id.trim()).filter(id => id.length > 0),
    leaderboardChannels,
    noSaleReasonTimeoutMs: parsed.NO_SALE_REASON_TIMEOUT_MS,
    logLevel: LOG_LEVELS[parsed.LOG_LEVEL]
  };
};
