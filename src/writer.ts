import * as fs from 'fs';
import * as path from 'path';
import * as ExcelJS from 'exceljs';
import chalk from 'chalk';
import { ConfigError } from './errors';
import { logger } from './logger';
import { MEMBER_FIELDS, MEMBER_TYPE_COLUMN, MemberResult, ScraperConfig } from './types';

export type OutputFormat = 'xlsx' | 'csv';

export const SHEET_NAME = 'Members';

export function outputFormat(outputFile: string): OutputFormat {
    const extension = path.extname(outputFile).toLowerCase();
    if (extension === '.xlsx') {
        return 'xlsx';
    }
    if (extension === '.csv') {
        return 'csv';
    }
    throw new ConfigError(`Unsupported output file extension "${extension}" (expected .xlsx or .csv)`);
}

export function columnsFor(includeMemberType: boolean): string[] {
    return includeMemberType ? [...MEMBER_FIELDS, MEMBER_TYPE_COLUMN] : [...MEMBER_FIELDS];
}

/** One row per result, ordered by enumerator position rather than completion. */
export function toRows(results: readonly MemberResult[], includeMemberType: boolean): string[][] {
    return [...results]
        .sort((a, b) => a.index - b.index)
        .map((result) => {
            const row = MEMBER_FIELDS.map((field) => result.record[field]);
            return includeMemberType ? [...row, result.memberType] : row;
        });
}

export interface FillSummary {
    totalCells: number;
    filledCells: number;
    fillRate: number; // percent
    columns: Array<{ name: string; filled: number; rate: number }>;
}

export function summarizeFill(header: readonly string[], rows: readonly string[][], placeholder: string): FillSummary {
    const columns = header.map((name, column) => {
        const filled = rows.filter((row) => row[column] !== placeholder).length;
        return { name, filled, rate: rows.length > 0 ? (filled / rows.length) * 100 : 0 };
    });
    const totalCells = header.length * rows.length;
    const filledCells = columns.reduce((sum, column) => sum + column.filled, 0);
    return {
        totalCells,
        filledCells,
        fillRate: totalCells > 0 ? (filledCells / totalCells) * 100 : 0,
        columns,
    };
}

export function logFillSummary(summary: FillSummary, rowCount: number): void {
    logger.info(chalk.bold('=== Data Quality Summary ==='));
    logger.info(`Total data points: ${summary.totalCells}`);
    logger.info(`Filled data points: ${summary.filledCells}`);
    logger.info(`Data fill rate: ${summary.fillRate.toFixed(1)}%`);
    for (const column of summary.columns) {
        logger.info(chalk.gray(`${column.name}: ${column.filled}/${rowCount} (${column.rate.toFixed(1)}%)`));
    }
}

export function buildWorkbook(header: readonly string[], rows: readonly string[][]): ExcelJS.Workbook {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet(SHEET_NAME, { views: [{ state: 'frozen', ySplit: 1 }] });

    sheet.columns = header.map((name) => ({ header: name, width: Math.max(14, name.length + 4) }));
    sheet.getRow(1).font = { bold: true };
    sheet.addRows(rows.map((row) => [...row]));

    return workbook;
}

/**
 * Writes every result in one batch. The file is produced beside the target
 * and renamed into place, so an interrupted write never leaves a truncated
 * spreadsheet at `config.outputFile`.
 */
export async function writeSpreadsheet(
    results: readonly MemberResult[],
    config: ScraperConfig,
): Promise<FillSummary> {
    const format = outputFormat(config.outputFile);
    const header = columnsFor(config.includeMemberType);
    const rows = toRows(results, config.includeMemberType);
    const workbook = buildWorkbook(header, rows);

    const target = path.resolve(config.outputFile);
    const temporary = `${target}.${process.pid}.tmp`;
    await fs.promises.mkdir(path.dirname(target), { recursive: true });

    try {
        if (format === 'csv') {
            await workbook.csv.writeFile(temporary);
        } else {
            await workbook.xlsx.writeFile(temporary);
        }
        await fs.promises.rename(temporary, target);
    } catch (error) {
        await fs.promises.rm(temporary, { force: true });
        throw error;
    }

    logger.info(chalk.green(`Data exported successfully to ${config.outputFile}`));
    logger.info(`Exported ${rows.length} rows and ${header.length} columns`);

    const summary = summarizeFill(header, rows, config.placeholder);
    logFillSummary(summary, rows.length);
    return summary;
}
