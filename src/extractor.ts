import * as cheerio from 'cheerio';
import { MEMBER_FIELDS, MemberField, MemberRecord } from './types';
import { cleanText } from './utils';

// Elements that carry "Label: value" text on member pages
const LABELLED_SELECTOR = 'li, p, td, div, dt';

// First match wins, so narrower labels come before broader ones
// (e.g. "email address" must not land in Address).
const FIELD_RULES: ReadonlyArray<{ field: MemberField; pattern: RegExp }> = [
    { field: 'Organization Name', pattern: /organi[sz]ation name|company name/ },
    { field: 'Registration Number', pattern: /\breg(istration|d)?\b.*\b(no|number)\b/ },
    { field: 'VAT Number', pattern: /\b(vat|pan)\b/ },
    { field: 'Email', pattern: /e-?mail/ },
    { field: 'Website URL', pattern: /\b(website|web|url)\b/ },
    { field: 'Mobile Number', pattern: /\b(mobile|cell)\b/ },
    { field: 'Telephone Number', pattern: /\b(telephone|phone|tel)\b/ },
    { field: 'Fax', pattern: /\bfax\b/ },
    { field: 'PO Box', pattern: /\bp\.?\s*o\.?\s*box\b|\bp\.\s*o\b/ },
    { field: 'Address', pattern: /\baddress\b/ },
    { field: 'Country', pattern: /\bcountry\b/ },
    { field: 'Key Person', pattern: /\b(key|contact) person\b/ },
    { field: 'Establishment Date', pattern: /\bestablish|\bdate\b/ },
];

export function matchField(label: string): MemberField | undefined {
    const normalized = cleanText(label).toLowerCase();
    if (!normalized) {
        return undefined;
    }
    return FIELD_RULES.find((rule) => rule.pattern.test(normalized))?.field;
}

function buildRecord(valueOf: (field: MemberField) => string): MemberRecord {
    return Object.freeze({
        'Organization Name': valueOf('Organization Name'),
        'Registration Number': valueOf('Registration Number'),
        'VAT Number': valueOf('VAT Number'),
        'Address': valueOf('Address'),
        'Country': valueOf('Country'),
        'Website URL': valueOf('Website URL'),
        'Email': valueOf('Email'),
        'Telephone Number': valueOf('Telephone Number'),
        'Mobile Number': valueOf('Mobile Number'),
        'Fax': valueOf('Fax'),
        'PO Box': valueOf('PO Box'),
        'Key Person': valueOf('Key Person'),
        'Establishment Date': valueOf('Establishment Date'),
    });
}

export function placeholderRecord(placeholder: string): MemberRecord {
    return buildRecord(() => placeholder);
}

function resolveValue(field: MemberField, text: string, href: string | undefined): string {
    const link = href?.trim();
    if (field === 'Website URL' && link) {
        return link;
    }
    if (field === 'Email' && link && /^mailto:/i.test(link)) {
        return link.slice('mailto:'.length).split('?')[0].trim();
    }
    return text;
}

/**
 * Pulls the 13 member fields out of a detail page. Two passes run in order:
 * "Label: value" leaf elements, then two-cell table rows, so a table row
 * overrides a list item for the same field. Empty values never overwrite.
 */
export function extractMemberRecord(html: string, placeholder: string): MemberRecord {
    const $ = cheerio.load(html);
    const values = new Map<MemberField, string>();

    const assign = (label: string, text: string, href: string | undefined) => {
        const field = matchField(label);
        if (!field) {
            return;
        }
        const value = cleanText(resolveValue(field, text, href));
        if (value) {
            values.set(field, value);
        }
    };

    const heading = cleanText($('h1').first().text()) || cleanText($('title').first().text());
    if (heading) {
        values.set('Organization Name', heading);
    }

    $(LABELLED_SELECTOR).each((_, el) => {
        const $el = $(el);
        if ($el.find(LABELLED_SELECTOR).length > 0) {
            return;
        }
        const text = cleanText($el.text());
        const colon = text.indexOf(':');
        if (colon < 0) {
            return;
        }
        assign(text.slice(0, colon), text.slice(colon + 1), $el.find('a').first().attr('href'));
    });

    $('tr').each((_, row) => {
        const cells = $(row).children('td, th');
        if (cells.length < 2) {
            return;
        }
        const label = cleanText(cells.eq(0).text()).replace(/:/g, '');
        const valueCell = cells.eq(1);
        assign(label, valueCell.text(), valueCell.find('a').first().attr('href'));
    });

    return buildRecord((field) => values.get(field) ?? placeholder);
}

/**
 * Member detail links on a listing page, resolved against `baseUrl`,
 * fragments dropped, first occurrence kept.
 */
export function extractMemberUrls(html: string, baseUrl: string): string[] {
    const $ = cheerio.load(html);
    const urls: string[] = [];
    const seen = new Set<string>();

    $('a[href]').each((_, el) => {
        const href = $(el).attr('href')?.trim();
        if (!href || !href.includes('/members/') || href === '/members/' || !URL.canParse(href, baseUrl)) {
            return;
        }
        const url = new URL(href, baseUrl);
        url.hash = '';
        const absolute = url.toString();
        if (!seen.has(absolute)) {
            seen.add(absolute);
            urls.push(absolute);
        }
    });

    return urls;
}

/** Fewer than three populated fields, or no name, marks a page worth a second look. */
export function isLowQuality(record: MemberRecord, placeholder: string): boolean {
    return record['Organization Name'] === placeholder || countPopulated(record, placeholder) < 3;
}

export function countPopulated(record: MemberRecord, placeholder: string): number {
    return MEMBER_FIELDS.filter((field) => record[field] !== placeholder).length;
}
