// src/core/storage/record-input.utils.ts
import { ValidationError } from '../common/errors';
import { InvoiceRecordInput } from '../common/interfaces/models';

export const DEFAULT_RECORD_STATUS = 'Emitida';

const REQUIRED_TEXT_FIELDS = ['customerName', 'emissionDate', 'amountDue'] as const;

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireText(source: Record<string, unknown>, field: string, position: number): string {
    const value = source[field];
    if (typeof value !== 'string' || value.trim() === '') {
        throw new ValidationError(`Record ${position}: "${field}" must be a non-empty string.`);
    }
    return value;
}

function optionalText(source: Record<string, unknown>, field: string, fallback: string, position: number): string {
    const value = source[field];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'string') {
        throw new ValidationError(`Record ${position}: "${field}" must be a string.`);
    }
    return value;
}

/**
 * Validates one submitted record and fills in the optional fields.
 */
export function parseInvoiceRecordInput(raw: unknown, position: number = 0): InvoiceRecordInput {
    if (!isPlainObject(raw)) {
        throw new ValidationError(`Record ${position} must be an object.`);
    }

    const [customerName, emissionDate, amountDue] = REQUIRED_TEXT_FIELDS.map(field => requireText(raw, field, position));

    const registered = raw.registered ?? false;
    if (typeof registered !== 'boolean') {
        throw new ValidationError(`Record ${position}: "registered" must be a boolean.`);
    }

    const details = raw.details ?? {};
    if (!isPlainObject(details)) {
        throw new ValidationError(`Record ${position}: "details" must be an object.`);
    }

    return {
        customerName,
        emissionDate,
        amountDue,
        status: optionalText(raw, 'status', DEFAULT_RECORD_STATUS, position),
        registered,
        documentBlob: optionalText(raw, 'documentBlob', '', position),
        details,
    };
}

/** Request body of a save: a JSON array of records. */
export function parseInvoiceRecordInputs(body: unknown): InvoiceRecordInput[] {
    if (!Array.isArray(body)) {
        throw new ValidationError('Expected a JSON array of invoice records.');
    }
    return body.map((raw: unknown, index) => parseInvoiceRecordInput(raw, index));
}
