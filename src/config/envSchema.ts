import { z, ZodError } from 'zod';
import { ConfigError } from '../utils/errors.js';

const boolStrictTrue = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() === 'true';
    return v;
}, z.boolean());

const boolUnlessFalse = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() !== 'false';
    return v;
}, z.boolean());

const numFromEnv = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().finite());

const positiveInt = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().int().positive());

export const LOG_LEVEL_NAMES = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'OFF'] as const;

const logLevel = z.preprocess(
    (v) => (typeof v === 'string' && v.trim() !== '' ? v.trim().toUpperCase() : undefined),
    z.enum(LOG_LEVEL_NAMES),
);

export const envSchema = z.object({
    LOG_LEVEL: logLevel.default('INFO'),
    LOG_JSON: boolStrictTrue.default(false),
    /** Mirror of all console output; empty disables it. */
    LOG_FILE: z.string().default('log.txt'),

    JOBS_FILE: z.string().default('jobs.json'),
    SCHEDULER_TICK_MS: positiveInt.default(1000),
    SCHEDULER_MAX_CONCURRENCY: positiveInt.default(4),
    DEFAULT_INTERVAL_SECONDS: positiveInt.default(300),
    DEFAULT_MAX_RETRIES: numFromEnv.pipe(z.number().int().min(0)).default(3),
    BACKOFF_BASE_MS: positiveInt.default(1000),
    BACKOFF_MAX_MS: positiveInt.default(300_000),
    FETCH_TIMEOUT_MS: positiveInt.default(30_000),
    USER_AGENT: z.string().default(''),
    PROXY_URL: z.string().default(''),

    PRICE_ALERT_THRESHOLD_PCT: numFromEnv.pipe(z.number().min(0)).default(5),
    /** Written on shutdown when set. */
    PRICE_EXPORT_PATH: z.string().default(''),

    ALERT_SLACK_WEBHOOK: z.string().default(''),
    ALERT_WEBHOOK_URL: z.string().default(''),
    ALERT_COOLDOWN_MIN: numFromEnv.default(15),
    ENABLE_ALERTS: boolUnlessFalse.default(true),

    METRICS_SUMMARY_INTERVAL_MS: numFromEnv.default(10 * 60_000),
}).passthrough();

export type Env = z.infer<typeof envSchema>;

/** Throws ConfigError listing every invalid variable. */
export function parseEnv(raw: NodeJS.ProcessEnv): Env {
    try {
        return envSchema.parse(raw);
    } catch (err) {
        if (err instanceof ZodError) {
            const lines = err.issues.map((i) => {
                const key = i.path.join('.') || '(root)';
                return `- ${key}: ${i.message}`;
            });
            throw new ConfigError('Invalid environment variables:\n' + lines.join('\n'), { cause: err });
        }
        throw err;
    }
}
