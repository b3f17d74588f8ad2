import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { wrapper } from 'axios-cookiejar-support';
import { CookieJar } from 'tough-cookie';
import chalk from 'chalk';
import { REQUEST_HEADERS } from './config';
import { classifyFetchError, errorMessage, FetchError, PermanentFetchError } from './errors';
import { extractMemberRecord, isLowQuality, placeholderRecord } from './extractor';
import { logger } from './logger';
import { FetchTask, MemberId, MemberResult, ScraperConfig } from './types';
import { calculateBackoff, isHttpUrl, sleep } from './utils';

export interface ScraperDeps {
    client?: AxiosInstance;
    sleep?: (ms: number) => Promise<void>;
}

/** Axios instance with a cookie jar shared by every request of the run. */
export function createHttpClient(config: ScraperConfig): AxiosInstance {
    const jar = new CookieJar();
    return wrapper(axios.create({
        baseURL: config.baseUrl,
        jar,
        withCredentials: true,
        headers: { ...REQUEST_HEADERS, 'Referer': config.baseUrl },
        timeout: config.timeoutMs,
    }));
}

export const createTask = (id: string, index: number): FetchTask => ({ id, index, attempt: 0, nextDelayMs: 0 });

export class MemberScraper {
    private client: AxiosInstance;
    private config: ScraperConfig;
    private wait: (ms: number) => Promise<void>;

    constructor(config: ScraperConfig, deps: ScraperDeps = {}) {
        this.config = config;
        this.client = deps.client ?? createHttpClient(config);
        this.wait = deps.sleep ?? sleep;
    }

    /**
     * GETs `task.id`, retrying transient failures with exponential backoff
     * until `maxAttempts` is reached. Advances `task.attempt` and
     * `task.nextDelayMs`; throws a FetchError once the task is terminal.
     */
    public async fetchHtml(task: FetchTask): Promise<string> {
        task.attempt++;

        if (this.config.requestDelayMs > 0) {
            await this.wait(this.config.requestDelayMs);
        }

        let response: AxiosResponse<string>;
        try {
            response = await this.client.get<string>(task.id, {
                responseType: 'text',
                timeout: this.config.timeoutMs,
            });
        } catch (error) {
            const failure = classifyFetchError(error, task.id, task.attempt);
            if (!failure.transient || task.attempt >= this.config.maxAttempts) {
                throw failure;
            }
            task.nextDelayMs = calculateBackoff(task.attempt, this.config.backoffBaseMs, this.config.backoffMaxMs);
            logger.debug(chalk.yellow(
                `Attempt ${task.attempt}/${this.config.maxAttempts} failed for ${task.id}: ${failure.message}. Retrying in ${task.nextDelayMs}ms...`
            ));
            await this.wait(task.nextDelayMs);
            return this.fetchHtml(task);
        }

        return readHtml(response, task);
    }

    /** Always resolves: unrecoverable failures become a placeholder-filled record. */
    public async scrapeMember(member: MemberId, index: number): Promise<MemberResult> {
        const task = createTask(member.url, index);
        const { placeholder } = this.config;

        try {
            if (!isHttpUrl(member.url)) {
                throw new PermanentFetchError('Malformed identifier', { url: member.url, attempts: 0 });
            }
            const html = await this.fetchHtml(task);
            const record = extractMemberRecord(html, placeholder);
            if (isLowQuality(record, placeholder)) {
                logger.warn(chalk.yellow(`Low quality data extracted from: ${member.url}`));
            }
            return {
                id: member.url,
                index,
                memberType: member.memberType,
                record,
                status: 'scraped',
                attempts: task.attempt,
            };
        } catch (error) {
            const message = error instanceof FetchError ? error.message : `Extraction failed: ${errorMessage(error)}`;
            logger.error(chalk.red(`Failed: ${member.url} - ${message} (${task.attempt} attempt(s))`));
            return {
                id: member.url,
                index,
                memberType: member.memberType,
                record: placeholderRecord(placeholder),
                status: 'failed',
                attempts: task.attempt,
                error: message,
            };
        }
    }
}

function readHtml(response: AxiosResponse<string>, task: FetchTask): string {
    const contentType = String(response.headers['content-type'] ?? '');
    if (contentType && !/html|xml/i.test(contentType)) {
        throw new PermanentFetchError(`Unexpected content type ${contentType}`, { url: task.id, attempts: task.attempt });
    }
    const body = typeof response.data === 'string' ? response.data : '';
    if (!body.trim()) {
        throw new PermanentFetchError('Empty response body', { url: task.id, attempts: task.attempt });
    }
    return body;
}
