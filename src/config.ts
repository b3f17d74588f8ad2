import { z } from 'zod';
import { ConfigError } from './errors';
import { ScraperConfig } from './types';

export const BASE_URL = 'https://www.taan.org.np';

export const DEFAULT_CONFIG: ScraperConfig = Object.freeze({
    baseUrl: BASE_URL,
    listingPaths: Object.freeze(['/members', '/associate-members', '/regional-members']),
    workers: 10,
    listingWorkers: 5,
    timeoutMs: 30000,
    maxAttempts: 3,
    backoffBaseMs: 1000,
    backoffMaxMs: 60000,
    requestDelayMs: 500,
    outputFile: 'ScrapedData.xlsx',
    placeholder: '0',
    includeMemberType: false,
    verbose: false,
});

export const REQUEST_HEADERS = {
    'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
    'Cache-Control': 'no-cache',
    'Pragma': 'no-cache',
};

const configSchema = z
    .object({
        baseUrl: z.string().url(),
        listingPaths: z.array(z.string().startsWith('/')).min(1),
        workers: z.number().int().min(1).max(50),
        listingWorkers: z.number().int().min(1).max(20),
        timeoutMs: z.number().int().positive(),
        maxAttempts: z.number().int().min(1).max(10),
        backoffBaseMs: z.number().int().min(0),
        backoffMaxMs: z.number().int().min(0),
        requestDelayMs: z.number().int().min(0),
        outputFile: z
            .string()
            .min(1)
            .refine((file) => /\.(xlsx|csv)$/i.test(file), 'must end with .xlsx or .csv'),
        placeholder: z.string().min(1),
        includeMemberType: z.boolean(),
        idsFile: z.string().min(1).optional(),
        referenceCount: z.number().int().positive().optional(),
        verbose: z.boolean(),
    })
    .refine((config) => config.backoffMaxMs >= config.backoffBaseMs, {
        message: 'must not be smaller than backoffBaseMs',
        path: ['backoffMaxMs'],
    });

/**
 * Layers `overrides` over the defaults, validates and freezes the result.
 * Keys explicitly set to `undefined` fall back to the default.
 */
export function resolveConfig(overrides: Partial<ScraperConfig> = {}): ScraperConfig {
    const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
    const result = configSchema.safeParse({ ...DEFAULT_CONFIG, ...defined });

    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration - ${details}`);
    }

    const config: ScraperConfig = {
        ...result.data,
        listingPaths: Object.freeze([...result.data.listingPaths]),
    };
    return Object.freeze(config);
}
