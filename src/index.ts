#!/usr/bin/env node
import chalk from 'chalk';
import { buildProgram, CliOptions, toConfigOverrides } from './cli';
import { resolveConfig } from './config';
import { errorMessage } from './errors';
import { logger, setVerboseMode } from './logger';
import { runScraper } from './pipeline';
import { RunSummary } from './types';

const FAILED_PREVIEW = 5;

function printSummary(summary: RunSummary): void {
    const line = '='.repeat(60);
    logger.info(`\n${line}`);
    logger.info(chalk.green.bold('SCRAPING COMPLETED'));
    logger.info(`Total members: ${summary.total}`);
    logger.info(`Data exported to: ${summary.outputFile}`);
    logger.info(`Failed members: ${summary.failed}`);

    const failures = summary.results.filter((result) => result.status === 'failed');
    if (failures.length > 0) {
        logger.info(chalk.yellow('\nFailed member URLs (written as placeholder rows):'));
        for (const failure of failures.slice(0, FAILED_PREVIEW)) {
            logger.info(chalk.yellow(`  - ${failure.id} (${failure.error ?? 'unknown error'})`));
        }
        if (failures.length > FAILED_PREVIEW) {
            logger.info(chalk.yellow(`  ... and ${failures.length - FAILED_PREVIEW} more`));
        }
    }
    logger.info(line);
}

async function main(): Promise<void> {
    const program = buildProgram();
    await program.parseAsync(process.argv);

    const config = resolveConfig(toConfigOverrides(program.opts<CliOptions>()));
    setVerboseMode(config.verbose);

    logger.info(chalk.cyan.bold('TAAN Member Data Scraper'));
    logger.debug(chalk.gray(`Configuration: ${JSON.stringify(config)}`));

    const summary = await runScraper(config);
    printSummary(summary);
}

(async () => {
    try {
        await main();
    } catch (error) {
        logger.error(chalk.red(`Fatal error during scraping: ${errorMessage(error)}`));
        process.exit(1);
    }
})();
