// src/core/invoicing/interfaces/services.ts
import { DatePolicy, InvoiceData, InvoiceDraft, RawRow } from '../../common/interfaces/models';

/** An uploaded table as received from the HTTP layer */
export interface UploadedTable {
    buffer: Buffer;
    originalName: string;
}

/** Defines the contract for the per-row invoice transformation */
export interface IInvoiceTransformerService {
    /** Resolves every field of the invoice for the row at `sequenceIndex` */
    buildDraft(row: RawRow, sequenceIndex: number, policy: DatePolicy, now: Date): InvoiceDraft;

    /** buildDraft plus the rendered document */
    transform(row: RawRow, sequenceIndex: number, policy: DatePolicy, now: Date): Promise<InvoiceData>;
}

/** Defines the contract for the ingestion entry point */
export interface IInvoiceProcessingService {
    /**
     * Parses the upload and transforms every row, in order.
     * Any failure aborts the whole batch; there is no partial result.
     */
    processUpload(upload: UploadedTable, policy: DatePolicy, now?: Date): Promise<InvoiceData[]>;

    processRows(rows: readonly RawRow[], policy: DatePolicy, now?: Date): Promise<InvoiceData[]>;
}
