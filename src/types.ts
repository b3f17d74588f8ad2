export const MEMBER_FIELDS = [
    'Organization Name',
    'Registration Number',
    'VAT Number',
    'Address',
    'Country',
    'Website URL',
    'Email',
    'Telephone Number',
    'Mobile Number',
    'Fax',
    'PO Box',
    'Key Person',
    'Establishment Date',
] as const;

export type MemberField = (typeof MEMBER_FIELDS)[number];

/** One organization's data. Every field holds an extracted value or the placeholder. */
export type MemberRecord = Readonly<Record<MemberField, string>>;

export const MEMBER_TYPE_COLUMN = 'Member Type';

export type MemberType = 'General' | 'Associate' | 'Regional';

export interface MemberId {
    url: string; // Absolute detail-page URL, unique within a run
    memberType: MemberType;
}

/**
 * A unit of work held by exactly one worker. `attempt` and `nextDelayMs`
 * are advanced by the retry loop.
 */
export interface FetchTask {
    id: string;
    index: number;
    attempt: number;
    nextDelayMs: number;
}

export type MemberStatus = 'scraped' | 'failed';

export interface MemberResult {
    id: string;
    index: number;
    memberType: MemberType;
    record: MemberRecord;
    status: MemberStatus;
    attempts: number;
    error?: string;
}

export interface ListingPage {
    url: string;
    memberType: MemberType;
}

export interface ScraperConfig {
    baseUrl: string;
    listingPaths: readonly string[];
    workers: number;
    listingWorkers: number;
    timeoutMs: number;
    maxAttempts: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    requestDelayMs: number; // ms, applied before every request
    outputFile: string;
    placeholder: string;
    includeMemberType: boolean;
    idsFile?: string;
    referenceCount?: number;
    verbose: boolean;
}

export interface PoolProgress {
    total: number;
    processed: number;
    failed: number;
}

export interface RunSummary {
    total: number;
    scraped: number;
    failed: number;
    durationMs: number;
    outputFile: string;
    results: MemberResult[];
}
