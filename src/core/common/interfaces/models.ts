// src/core/common/interfaces/models.ts

/**
 * A single cell as loaded from an uploaded table.
 * `null` marks an empty or missing cell.
 */
export type CellValue = string | number | boolean | Date | null;

/**
 * One data row of an uploaded table: trimmed header -> cell value,
 * in the column order of the source file.
 */
export type RawRow = ReadonlyMap<string, CellValue>;

/**
 * Rule deciding how the emission date of each invoice is derived.
 * - `current`: the instant the batch is processed
 * - `saleDate`: the row's `Data` column, falling back to `current`
 * - `custom`: a caller supplied `YYYY-MM-DD` date, falling back to `current` when unparseable
 */
export type DatePolicy =
    | { kind: 'current' }
    | { kind: 'saleDate' }
    | { kind: 'custom'; date: string };

/** Wire names of the date policies, as sent by the upload form */
export type DateMode = 'current' | 'sale' | 'choose';

export interface CurrencyAmount {
    /** Canonical numeric value */
    value: number;
    /** Display string, e.g. "R$ 1.234,56" */
    display: string;
}

/**
 * Normalized invoice built from one uploaded row, before its document is rendered.
 */
export interface InvoiceDraft {
    /** Zero-based position of the source row */
    sequenceIndex: number;
    /** Display invoice number (1000 + sequenceIndex) */
    invoiceNumber: number;
    /** "NF-<number> - <customer name, max 30 chars>" */
    displayName: string;
    customerName: string;
    origin: string;
    taxId: string;
    title: string;
    species: string;
    accountPlan: string;
    responsibleTaxId: string;
    amountDue: CurrencyAmount;
    amountReceived: CurrencyAmount;
    amountDiscount: CurrencyAmount;
    /** DD/MM/YYYY */
    emissionDate: string;
    dueDate: string;
}

/**
 * Output unit of the row transformation: the draft plus its rendered workbook.
 */
export interface InvoiceData extends InvoiceDraft {
    /** Base64 encoded .xlsx document */
    documentBlob: string;
}

/**
 * Outcome of a parse that never throws. Callers pick the default explicitly.
 */
export type ParseResult<T> =
    | { ok: true; value: T }
    | { ok: false; reason: string };

/**
 * A record submitted for storage, typically built by the client from an InvoiceData.
 */
export interface InvoiceRecordInput {
    customerName: string;
    emissionDate: string;
    /** Amount due as displayed, part of the fingerprint */
    amountDue: string;
    status: string;
    registered: boolean;
    documentBlob: string;
    details: Record<string, unknown>;
}

/** Result of a deduplicated save */
export interface SaveInvoicesResult {
    savedCount: number;
    duplicateCount: number;
}

/** Stored record as returned by the list operation */
export interface StoredInvoiceRecord {
    id: number;
    customerName: string;
    emissionDate: string;
    amountDue: string;
    status: string;
    registered: boolean;
    documentBlob: string;
    details: Record<string, unknown>;
    fingerprint: string;
    createdAt: Date;
    updatedAt: Date;
}
