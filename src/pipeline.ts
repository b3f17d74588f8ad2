import chalk from 'chalk';
import { enumerateMemberIds } from './enumerator';
import { logger } from './logger';
import { MemberScraper, ScraperDeps } from './scraper';
import { MemberId, MemberResult, PoolProgress, RunSummary, ScraperConfig } from './types';
import { formatDuration } from './utils';
import { WorkerPool } from './worker-pool';
import { outputFormat, writeSpreadsheet } from './writer';

/** Logs the first ten completions, then every fiftieth, with the running rate. */
export function createProgressLogger(startedAt: number = Date.now()): (progress: PoolProgress) => void {
    return (progress) => {
        if (progress.processed > 10 && progress.processed % 50 !== 0 && progress.processed !== progress.total) {
            return;
        }
        const elapsed = (Date.now() - startedAt) / 1000;
        const rate = elapsed > 0 ? progress.processed / elapsed : 0;
        logger.info(chalk.gray(
            `Progress: ${progress.processed}/${progress.total} members | Failed: ${progress.failed} | ` +
            `Rate: ${rate.toFixed(2)} members/sec | Elapsed: ${elapsed.toFixed(1)}s`
        ));
    };
}

export async function scrapeMembers(
    scraper: MemberScraper,
    ids: readonly MemberId[],
    config: ScraperConfig,
    onProgress?: (progress: PoolProgress) => void,
): Promise<MemberResult[]> {
    logger.info(chalk.blue(`Starting to scrape ${ids.length} members with ${config.workers} concurrent workers...`));

    const pool = new WorkerPool<MemberId, MemberResult>(
        config.workers,
        (member, index) => scraper.scrapeMember(member, index),
        {
            isFailure: (result) => result.status === 'failed',
            onProgress: (progress) => onProgress?.(progress),
        },
    );
    return pool.run(ids);
}

/**
 * Enumerate, scrape, write. Any throw from here is fatal; the output file
 * only appears once the whole batch has been written.
 */
export async function runScraper(config: ScraperConfig, deps: ScraperDeps = {}): Promise<RunSummary> {
    const startedAt = Date.now();
    outputFormat(config.outputFile);

    const scraper = new MemberScraper(config, deps);
    const ids = await enumerateMemberIds(scraper, config);
    const results = await scrapeMembers(scraper, ids, config, createProgressLogger(startedAt));
    await writeSpreadsheet(results, config);

    const failed = results.filter((result) => result.status === 'failed').length;
    const durationMs = Date.now() - startedAt;

    logger.info(chalk.green('Scraping completed!'));
    logger.info(`Total members: ${results.length} | Scraped: ${results.length - failed} | Failed: ${failed}`);
    logger.info(`Total time: ${formatDuration(durationMs)}`);

    return {
        total: results.length,
        scraped: results.length - failed,
        failed,
        durationMs,
        outputFile: config.outputFile,
        results,
    };
}
