// src/core/storage/interfaces/services.ts
import { InvoiceRecordInput, SaveInvoicesResult, StoredInvoiceRecord } from '../../common/interfaces/models';

/** Defines the contract for the deduplicating invoice store */
export interface IInvoiceStoreService {
    list(): Promise<StoredInvoiceRecord[]>;

    /**
     * Stores the records whose fingerprint is new. Records repeated within
     * `records` or already stored count as duplicates.
     */
    save(records: readonly InvoiceRecordInput[]): Promise<SaveInvoicesResult>;

    /** @throws {NotFoundError} when no record has this id. */
    updateRegistered(id: number, registered: boolean): Promise<StoredInvoiceRecord>;
}
