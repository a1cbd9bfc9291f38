import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const flag = (fallback: 'true' | 'false') =>
    z.enum(['true', 'false']).default(fallback).transform((v) => v === 'true');

export const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3001),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    CORS_ORIGIN: z.string().default('*'),

    // Upstream portal
    PORTAL_BASE_URL: z.string().url().default('https://e-jagriti.gov.in'),
    PORTAL_COMMISSION_TYPE: z.string().default('DCDRC'),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    MAX_RETRIES: z.coerce.number().int().min(0).default(3),
    BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(1000),
    MIN_REQUEST_INTERVAL_MS: z.coerce.number().int().min(0).default(1000),
    RATE_LIMIT_COOLDOWN_MS: z.coerce.number().int().min(0).default(60000),

    // Cache TTLs (seconds)
    CACHE_TTL_STATES_S: z.coerce.number().int().positive().default(6 * 60 * 60),
    CACHE_TTL_COMMISSIONS_S: z.coerce.number().int().positive().default(60 * 60),
    CACHE_TTL_SEARCH_S: z.coerce.number().int().positive().default(5 * 60),

    // Browser automation tier
    BROWSER_ENABLED: flag('true'),
    BROWSER_HEADLESS: flag('true'),
    BROWSER_TIMEOUT_MS: z.coerce.number().int().positive().default(45000),

    SUGGESTION_LIMIT: z.coerce.number().int().min(0).default(50),
    API_RATE_LIMIT_PER_15_MIN: z.coerce.number().int().positive().default(100),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
