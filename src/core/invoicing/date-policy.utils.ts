// src/core/invoicing/date-policy.utils.ts
import { DateMode, DatePolicy, ParseResult, RawRow } from '../common/interfaces/models';
import { formatDateToDDMMYYYY, isEmptyCell } from '../common/utils';
import { SALE_DATE_COLUMN } from './column-rules';

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

export const DATE_MODES: readonly DateMode[] = ['current', 'sale', 'choose'];

export interface EmissionDateResolution {
    /** DD/MM/YYYY, or the sale-date text verbatim */
    value: string;
    /** Set when the policy could not be applied and `now` was used instead */
    fallbackReason?: string;
}

export function isDateMode(value: unknown): value is DateMode {
    return typeof value === 'string' && DATE_MODES.some(mode => mode === value);
}

/** Maps the upload form's `dateMode`/`customDate` pair onto a policy */
export function toDatePolicy(mode: DateMode, customDate?: string): DatePolicy {
    switch (mode) {
        case 'current':
            return { kind: 'current' };
        case 'sale':
            return { kind: 'saleDate' };
        case 'choose':
            return { kind: 'custom', date: customDate ?? '' };
    }
}

/**
 * Parses YYYY-MM-DD (one or two digit month/day), rejecting impossible calendar dates.
 */
export function tryParseIsoDate(text: string): ParseResult<Date> {
    const match = ISO_DATE.exec(text.trim());
    if (!match) {
        return { ok: false, reason: `Expected YYYY-MM-DD, got "${text}"` };
    }
    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);

    const date = new Date(2000, 0, 1);
    date.setFullYear(year, month - 1, day);
    if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
        return { ok: false, reason: `Not a calendar date: "${text}"` };
    }
    return { ok: true, value: date };
}

/**
 * Resolves the emission date of one row. Evaluated per row since the sale-date
 * policy reads row data.
 */
export function resolveEmissionDateDetailed(policy: DatePolicy, row: RawRow, now: Date): EmissionDateResolution {
    const current = formatDateToDDMMYYYY(now);

    switch (policy.kind) {
        case 'current':
            return { value: current };

        case 'custom': {
            const parsed = tryParseIsoDate(policy.date);
            return parsed.ok
                ? { value: formatDateToDDMMYYYY(parsed.value) }
                : { value: current, fallbackReason: parsed.reason };
        }

        case 'saleDate': {
            const cell = row.get(SALE_DATE_COLUMN);
            if (cell === undefined || cell === null || isEmptyCell(cell)) {
                return { value: current, fallbackReason: `Column "${SALE_DATE_COLUMN}" is missing or empty` };
            }
            // Free text is kept as written; its format is not constrained.
            return { value: cell instanceof Date ? formatDateToDDMMYYYY(cell) : String(cell) };
        }
    }
}

export function resolveEmissionDate(policy: DatePolicy, row: RawRow, now: Date): string {
    return resolveEmissionDateDetailed(policy, row, now).value;
}
