import * as z from 'zod/v4';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export const DEFAULT_CATEGORIES = ['Company Research', 'Applications', 'Interview Prep', 'Portfolio', 'Other'];

const booleanFlag = z.enum(['true', 'false', '1', '0']).transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  MCP_PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  MCP_HOST: z.string().trim().min(1).default('127.0.0.1'),
  ACTIVITY_LOG_PATH: z.string().trim().min(1).default('data/activity_log.csv'),
  ACTIVITY_LOG_CREATE: booleanFlag.default(false),
  ACTIVITY_CATEGORIES: z.string()
    .transform(value => value.split(',').map(label => label.trim()).filter(label => label !== ''))
    .pipe(z.array(z.string()).min(1, { message: 'At least one category label is required' }))
    .optional(),
  LOG_LEVEL: z.string().transform(value => value.toLowerCase()).pipe(z.enum(LOG_LEVELS)).default('info')
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Parses the process environment. Blank variables count as unset.
 * Throws with the offending variable names when a value is invalid.
 */
export const parseConfig = (env: Record<string, string | undefined>): AppConfig => {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  return result.data;
};

const config = parseConfig(process.env);

export const MCP_PORT = config.MCP_PORT;
export const MCP_HOST = config.MCP_HOST;
export const ACTIVITY_LOG_PATH = config.ACTIVITY_LOG_PATH;
export const ACTIVITY_LOG_CREATE = config.ACTIVITY_LOG_CREATE;
export const ACTIVITY_CATEGORIES = config.ACTIVITY_CATEGORIES ?? DEFAULT_CATEGORIES;
export const LOG_LEVEL: LogLevel = config.LOG_LEVEL;
