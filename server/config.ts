import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

export const RECORD_TYPES = ['album', 'ep', 'single', 'compile'] as const;
export type RecordType = (typeof RECORD_TYPES)[number];

const DEFAULT_BLACKLIST = '@eaDir,#recycle,lost+found,$RECYCLE.BIN,System Volume Information';

function splitList(value: string): string[] {
    return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

const envSchema = z.object({
    DATABASE_PATH: z.string().min(1).default('./crategap.db'),
    MUSIC_LIBRARY_PATH: z.string().optional(),
    PORT: z.coerce.number().int().min(0).max(65535).default(3001),
    DEEZER_BASE_URL: z.string().url('DEEZER_BASE_URL must be a URL').default('https://api.deezer.com'),
    PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    // Deezer allows 50 requests per 5 seconds
    PROVIDER_MIN_INTERVAL_MS: z.coerce.number().int().min(0).default(120),
    RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(2),
    RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),
    SCAN_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
    SCAN_BLACKLIST: z.string().default(DEFAULT_BLACKLIST).transform(splitList),
    SCAN_RECORD_TYPES: z
        .string()
        .default('album')
        .transform(splitList)
        .pipe(z.array(z.enum(RECORD_TYPES)).min(1, 'SCAN_RECORD_TYPES needs at least one record type')),
    REFRESH_AFTER_HOURS: z.coerce.number().min(0).default(168),
    IMAGE_FILE_NAME: z
        .string()
        .min(1)
        .default('artist.jpg')
        .refine((name) => path.basename(name) === name, 'IMAGE_FILE_NAME must be a plain file name'),
});

export interface ProviderConfig {
    baseUrl: string;
    timeoutMs: number;
    minIntervalMs: number;
}

export interface RetryPolicy {
    attempts: number;
    delayMs: number;
}

export interface ScanConfig {
    concurrency: number;
    blacklist: string[];
    recordTypes: RecordType[];
    refreshAfterHours: number;
    imageFileName: string;
}

export interface AppConfig {
    databasePath: string;
    musicLibraryPath: string | null;
    port: number;
    provider: ProviderConfig;
    retry: RetryPolicy;
    scan: ScanConfig;
}

/**
 * Validate the environment and build the application config.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);

    if (!parsed.success) {
        const problems = parsed.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
        throw new ConfigError(`Invalid configuration:\n   - ${problems.join('\n   - ')}`, problems);
    }

    const vars = parsed.data;
    return {
        databasePath: vars.DATABASE_PATH,
        musicLibraryPath: vars.MUSIC_LIBRARY_PATH?.trim() || null,
        port: vars.PORT,
        provider: {
            baseUrl: vars.DEEZER_BASE_URL.replace(/\/+$/, ''),
            timeoutMs: vars.PROVIDER_TIMEOUT_MS,
            minIntervalMs: vars.PROVIDER_MIN_INTERVAL_MS,
        },
        retry: {
            attempts: vars.RETRY_ATTEMPTS,
            delayMs: vars.RETRY_DELAY_MS,
        },
        scan: {
            concurrency: vars.SCAN_CONCURRENCY,
            blacklist: vars.SCAN_BLACKLIST,
            recordTypes: vars.SCAN_RECORD_TYPES,
            refreshAfterHours: vars.REFRESH_AFTER_HOURS,
            imageFileName: vars.IMAGE_FILE_NAME,
        },
    };
}

export default { loadConfig };
