// src/core/common/interfaces/repositories/IInvoiceRecordRepository.ts

import { InvoiceRecord } from "../../entities";
import { InvoiceRecordInput } from "../models";

/** A validated record with its fingerprint, ready to insert */
export interface NewInvoiceRecord extends InvoiceRecordInput {
    fingerprint: string;
}

/**
 * Defines the contract for data access operations on stored invoice records.
 */
export interface IInvoiceRecordRepository {
    /** All records, highest id first. */
    findAllNewestFirst(): Promise<InvoiceRecord[]>;

    /**
     * Inserts the records whose fingerprint is not stored yet, in a single transaction.
     * Input fingerprints are expected to be unique among themselves.
     *
     * @returns the number of records actually inserted.
     */
    insertMissing(records: NewInvoiceRecord[]): Promise<number>;

    /**
     * Sets the registered flag of one record.
     *
     * @returns the updated record, or null when the id does not exist.
     */
    setRegistered(id: number, registered: boolean): Promise<InvoiceRecord | null>;
}

export const INVOICE_RECORD_REPOSITORY_TOKEN = Symbol.for("IInvoiceRecordRepository");
