// src/core/invoicing/fingerprint.utils.ts
import * as crypto from 'crypto';
import { InvoiceRecordInput } from '../common/interfaces/models';

export const FINGERPRINT_DELIMITER = '-';

/**
 * MD5 hex digest of the identity fields joined by "-".
 * A duplicate-detection key, not a security mechanism.
 */
export function computeFingerprint(fields: readonly string[]): string {
    return crypto.createHash('md5').update(fields.join(FINGERPRINT_DELIMITER), 'utf8').digest('hex');
}

/** Fingerprint of a record submitted to the store: (customer, emission date, amount due) */
export function invoiceRecordFingerprint(record: Pick<InvoiceRecordInput, 'customerName' | 'emissionDate' | 'amountDue'>): string {
    return computeFingerprint([record.customerName, record.emissionDate, record.amountDue]);
}
