// src/core/invoicing/normalization.utils.ts
import { CellValue, ParseResult, RawRow } from '../common/interfaces/models';
import { isEmptyCell } from '../common/utils';

// --- Currency ---

const CURRENCY_SYMBOL = /R\$/g;
// Plain decimal after separators are normalized: optional sign, digits, optional fraction and exponent
const DECIMAL_NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses a currency cell written in the "R$ 1.234,56" convention.
 * Numbers pass through unchanged; text has the symbol stripped, `.` thousands
 * separators removed and the `,` decimal separator turned into `.`.
 */
export function tryParseCurrency(value: CellValue | undefined): ParseResult<number> {
    if (typeof value === 'number') {
        return Number.isFinite(value)
            ? { ok: true, value }
            : { ok: false, reason: `Non-finite number: ${value}` };
    }
    if (typeof value !== 'string') {
        return { ok: false, reason: `Unsupported currency cell: ${value === null || value === undefined ? 'empty' : typeof value}` };
    }

    const cleaned = value
        .replace(CURRENCY_SYMBOL, '')
        .replace(/\./g, '')
        .replace(/,/g, '.')
        .trim();

    if (!DECIMAL_NUMBER.test(cleaned)) {
        return { ok: false, reason: `Not a currency value: "${value}"` };
    }
    const parsed = Number(cleaned);
    return Number.isFinite(parsed)
        ? { ok: true, value: parsed }
        : { ok: false, reason: `Out of range currency value: "${value}"` };
}

/** Like tryParseCurrency, with 0 for anything unparseable. Never throws. */
export function normalizeCurrency(value: CellValue | undefined): number {
    const result = tryParseCurrency(value);
    return result.ok ? result.value : 0;
}

// toFixed switches to exponent notation from 1e21; doubles that large carry no fraction
function toFixedDigits(magnitude: number): [string, string] {
    if (magnitude >= 1e21) {
        return [BigInt(magnitude).toString(), '00'];
    }
    const [integerPart, fractionPart] = magnitude.toFixed(2).split('.');
    return [integerPart, fractionPart];
}

/**
 * Formats a value as "R$ 1.234,56" regardless of the host locale.
 */
export function formatCurrency(value: number): string {
    const safeValue = Number.isFinite(value) ? value : 0;
    const [integerPart, fractionPart] = toFixedDigits(Math.abs(safeValue));
    const grouped = integerPart.replace(/\B(?=(\d{3})+(?!\d))/g, '.');
    const sign = safeValue < 0 && `${integerPart}${fractionPart}` !== '000' ? '-' : '';
    return `R$ ${sign}${grouped},${fractionPart}`;
}

// --- Column resolution ---

/** "Resp. Fin" -> "respfin" */
export function normalizeHeader(header: string): string {
    return header.replace(/\./g, '').replace(/ /g, '').toLowerCase();
}

/**
 * Returns the first usable cell for a logical field.
 *
 * Exact candidates are tried in priority order first. Only when none of them
 * holds a value are the row's own headers scanned, in column order, comparing
 * their normalized form against `fallbackKeys`.
 */
export function resolveColumn<P>(
    row: RawRow,
    exactCandidates: readonly string[],
    fallbackKeys: ReadonlySet<string>,
    placeholder: P
): Exclude<CellValue, null> | P {
    for (const header of exactCandidates) {
        const cell = row.get(header);
        if (cell !== undefined && cell !== null && !isEmptyCell(cell)) {
            return cell;
        }
    }

    for (const [header, cell] of row) {
        if (cell !== null && !isEmptyCell(cell) && fallbackKeys.has(normalizeHeader(header))) {
            return cell;
        }
    }

    return placeholder;
}
