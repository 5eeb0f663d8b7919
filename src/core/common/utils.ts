// src/core/common/utils.ts

import { v4 as uuidv4 } from 'uuid';
import { CellValue } from './interfaces/models';

/**
 * Generates a unique Version 4 UUID.
 * Used to correlate the log lines of one processing batch.
 */
export function generateUniqueId(): string {
    return uuidv4();
}

/**
 * Formats a Date as DD/MM/YYYY using local calendar fields.
 */
export function formatDateToDDMMYYYY(date: Date): string {
    const day = String(date.getDate()).padStart(2, '0');
    const month = String(date.getMonth() + 1).padStart(2, '0'); // +1 because months are 0-indexed
    const year = String(date.getFullYear()).padStart(4, '0');
    return `${day}/${month}/${year}`;
}

/**
 * True for cells that carry no usable value: null, NaN, invalid dates and blank text.
 */
export function isEmptyCell(value: CellValue | undefined): boolean {
    if (value === null || value === undefined) return true;
    if (typeof value === 'number') return isNaN(value);
    if (typeof value === 'string') return value.trim() === '';
    if (value instanceof Date) return isNaN(value.getTime());
    return false;
}

/**
 * Renders a cell as text. Dates become DD/MM/YYYY, everything else goes through String().
 */
export function cellToText(value: CellValue): string {
    if (value === null) return '';
    if (value instanceof Date) return formatDateToDDMMYYYY(value);
    return String(value);
}
