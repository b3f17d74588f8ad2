import * as fs from 'fs';
import * as qs from 'qs';
import chalk from 'chalk';
import { FatalScrapeError, FetchError, errorMessage } from './errors';
import { extractMemberUrls } from './extractor';
import { logger } from './logger';
import { createTask, MemberScraper } from './scraper';
import { ListingPage, MemberId, MemberType, ScraperConfig } from './types';
import { WorkerPool } from './worker-pool';

// '' is the section's landing page, followed by its alphabetical filters
export const ALPHABET_FILTERS = ['', ...'abcdefghijklmnopqrstuvwxyz'];

export function memberTypeForPath(listingPath: string): MemberType {
    if (listingPath.includes('associate')) {
        return 'Associate';
    }
    if (listingPath.includes('regional')) {
        return 'Regional';
    }
    return 'General';
}

export function listingPages(config: ScraperConfig): ListingPage[] {
    return config.listingPaths.flatMap((listingPath) => {
        const memberType = memberTypeForPath(listingPath);
        return ALPHABET_FILTERS.map((letter) => {
            const query = letter ? `?${qs.stringify({ l: letter })}` : '';
            return { url: new URL(`${listingPath}${query}`, config.baseUrl).toString(), memberType };
        });
    });
}

type ListingOutcome = { ok: true; urls: string[] } | { ok: false; error: string };

/**
 * Walks every listing page and returns member identifiers in page order.
 * Pages are fetched concurrently but merged by position, and the first
 * occurrence of a URL fixes both its place and its member type.
 */
export async function discoverMemberIds(scraper: MemberScraper, config: ScraperConfig): Promise<MemberId[]> {
    const pages = listingPages(config);
    logger.info(chalk.blue(`Collecting member URLs from ${pages.length} listing pages...`));

    const pool = new WorkerPool<ListingPage, ListingOutcome>(
        config.listingWorkers,
        async (page, index) => {
            try {
                const html = await scraper.fetchHtml(createTask(page.url, index));
                const urls = extractMemberUrls(html, config.baseUrl);
                if (urls.length > 0) {
                    logger.debug(chalk.gray(`Found ${urls.length} member URLs on ${page.url}`));
                }
                return { ok: true, urls };
            } catch (error) {
                if (!(error instanceof FetchError)) {
                    throw error;
                }
                logger.error(chalk.red(`Failed to get URLs from ${page.url}: ${error.message}`));
                return { ok: false, error: error.message };
            }
        },
        { isFailure: (outcome) => !outcome.ok },
    );

    const outcomes = await pool.run(pages);

    const ids: MemberId[] = [];
    const seen = new Set<string>();
    let failedPages = 0;

    outcomes.forEach((outcome, index) => {
        if (!outcome.ok) {
            failedPages++;
            return;
        }
        for (const url of outcome.urls) {
            if (!seen.has(url)) {
                seen.add(url);
                ids.push({ url, memberType: pages[index].memberType });
            }
        }
    });

    if (failedPages === pages.length) {
        throw new FatalScrapeError(`Could not reach ${config.baseUrl}: all ${pages.length} listing pages failed`);
    }
    if (failedPages > 0) {
        logger.warn(chalk.yellow(`${failedPages} of ${pages.length} listing pages could not be fetched`));
    }

    return ids;
}

/** Newline-separated identifiers; blank lines and `#` comments are skipped, duplicates dropped. */
export function parseIdList(content: string): MemberId[] {
    const seen = new Set<string>();
    const ids: MemberId[] = [];
    for (const line of content.split(/\r?\n/)) {
        const url = line.trim();
        if (!url || url.startsWith('#') || seen.has(url)) {
            continue;
        }
        seen.add(url);
        ids.push({ url, memberType: 'General' });
    }
    return ids;
}

export async function readIdsFile(filePath: string): Promise<MemberId[]> {
    let content: string;
    try {
        content = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
        throw new FatalScrapeError(`Cannot read ids file ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
    return parseIdList(content);
}

/**
 * Fetches the site root once. Any HTTP answer counts as reachable; a
 * transient failure that outlasts the retries aborts the run.
 */
export async function ensureSiteReachable(scraper: MemberScraper, config: ScraperConfig): Promise<void> {
    try {
        await scraper.fetchHtml(createTask(config.baseUrl, 0));
    } catch (error) {
        if (!(error instanceof FetchError)) {
            throw error;
        }
        if (error.transient) {
            throw new FatalScrapeError(`Could not reach ${config.baseUrl}: ${error.message}`, { cause: error });
        }
        logger.debug(chalk.gray(`${config.baseUrl} answered with ${error.message}; continuing`));
    }
}

/**
 * The ordered, duplicate-free identifiers for one run. Calling it again
 * enumerates from scratch.
 */
export async function enumerateMemberIds(scraper: MemberScraper, config: ScraperConfig): Promise<MemberId[]> {
    const ids = config.idsFile ? await readIdsFile(config.idsFile) : await discoverMemberIds(scraper, config);

    if (ids.length === 0) {
        throw new FatalScrapeError('No member URLs found. Scraping aborted.');
    }
    // listing mode has already proven the site answers
    if (config.idsFile) {
        await ensureSiteReachable(scraper, config);
    }

    logger.info(chalk.green(`Total unique member URLs found: ${ids.length}`));
    if (config.referenceCount !== undefined && ids.length !== config.referenceCount) {
        logger.info(chalk.gray(`Published member count is ${config.referenceCount}; keeping all ${ids.length} discovered`));
    }

    return ids;
}
