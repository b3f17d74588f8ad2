import * as fs from 'fs';
import * as path from 'path';
import { Command, InvalidArgumentError, Option } from 'commander';
import { DEFAULT_CONFIG } from './config';
import { errorMessage } from './errors';
import { logger } from './logger';
import { ScraperConfig } from './types';

// A type alias rather than an interface so it satisfies commander's OptionValues
export type CliOptions = {
    workers?: number;
    listingWorkers?: number;
    timeout?: number;
    maxAttempts?: number;
    backoffBase?: number;
    backoffMax?: number;
    delay?: number;
    output?: string;
    placeholder?: string;
    memberType?: boolean;
    idsFile?: string;
    referenceCount?: number;
    baseUrl?: string;
    verbose?: boolean;
};

export function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
        throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}".`);
    }
    return parsed;
}

function readVersion(): string {
    const packageJsonPath = path.join(__dirname, '..', 'package.json');
    try {
        const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
        if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
            return String(packageJson.version);
        }
    } catch (error) {
        logger.debug(`Could not read ${packageJsonPath}: ${errorMessage(error)}`);
    }
    return '0.0.0';
}

export function buildProgram(): Command {
    const program = new Command();

    program
        .name('taan-scraper')
        .description('Scrapes TAAN member records into a spreadsheet')
        .version(readVersion())
        .addOption(new Option('-w, --workers <n>', `concurrent member workers (default: ${DEFAULT_CONFIG.workers})`)
            .env('SCRAPER_WORKERS').argParser(parseInteger))
        .addOption(new Option('--listing-workers <n>', `concurrent listing-page fetches (default: ${DEFAULT_CONFIG.listingWorkers})`)
            .env('SCRAPER_LISTING_WORKERS').argParser(parseInteger))
        .addOption(new Option('-t, --timeout <ms>', `request timeout (default: ${DEFAULT_CONFIG.timeoutMs})`)
            .env('SCRAPER_TIMEOUT_MS').argParser(parseInteger))
        .addOption(new Option('-a, --max-attempts <n>', `attempts per request (default: ${DEFAULT_CONFIG.maxAttempts})`)
            .env('SCRAPER_MAX_ATTEMPTS').argParser(parseInteger))
        .addOption(new Option('--backoff-base <ms>', `first retry delay (default: ${DEFAULT_CONFIG.backoffBaseMs})`)
            .env('SCRAPER_BACKOFF_BASE_MS').argParser(parseInteger))
        .addOption(new Option('--backoff-max <ms>', `retry delay cap (default: ${DEFAULT_CONFIG.backoffMaxMs})`)
            .env('SCRAPER_BACKOFF_MAX_MS').argParser(parseInteger))
        .addOption(new Option('--delay <ms>', `delay before every request (default: ${DEFAULT_CONFIG.requestDelayMs})`)
            .env('SCRAPER_DELAY_MS').argParser(parseInteger))
        .addOption(new Option('-o, --output <file>', `output .xlsx or .csv file (default: ${DEFAULT_CONFIG.outputFile})`)
            .env('SCRAPER_OUTPUT'))
        .addOption(new Option('-p, --placeholder <value>', `value for missing fields (default: "${DEFAULT_CONFIG.placeholder}")`)
            .env('SCRAPER_PLACEHOLDER'))
        .addOption(new Option('--base-url <url>', `site root (default: ${DEFAULT_CONFIG.baseUrl})`)
            .env('SCRAPER_BASE_URL'))
        .option('--member-type', 'add a Member Type column')
        .option('--ids-file <file>', 'read member URLs from a file instead of the listing pages')
        .option('--reference-count <n>', 'published member count to compare against', parseInteger)
        .option('-v, --verbose', 'enable debug logging');

    return program;
}

export function toConfigOverrides(options: CliOptions): Partial<ScraperConfig> {
    return {
        workers: options.workers,
        listingWorkers: options.listingWorkers,
        timeoutMs: options.timeout,
        maxAttempts: options.maxAttempts,
        backoffBaseMs: options.backoffBase,
        backoffMaxMs: options.backoffMax,
        requestDelayMs: options.delay,
        outputFile: options.output,
        placeholder: options.placeholder,
        baseUrl: options.baseUrl,
        includeMemberType: options.memberType,
        idsFile: options.idsFile,
        referenceCount: options.referenceCount,
        verbose: options.verbose,
    };
}
