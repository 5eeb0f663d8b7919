// src/core/storage/invoice-store.service.ts
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { NotFoundError } from '../common/errors';
import {
    InvoiceRecordInput,
    SaveInvoicesResult,
    StoredInvoiceRecord
} from '../common/interfaces/models';
import {
    IInvoiceRecordRepository,
    INVOICE_RECORD_REPOSITORY_TOKEN,
    NewInvoiceRecord
} from '../common/interfaces/repositories';
import { invoiceRecordFingerprint } from '../invoicing/fingerprint.utils';
import { IInvoiceStoreService } from './interfaces/services';

@injectable()
export class InvoiceStoreService implements IInvoiceStoreService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(INVOICE_RECORD_REPOSITORY_TOKEN) private repository: IInvoiceRecordRepository
    ) {
        this.logger.info('InvoiceStoreService initialized.');
    }

    async list(): Promise<StoredInvoiceRecord[]> {
        return this.repository.findAllNewestFirst();
    }

    async save(records: readonly InvoiceRecordInput[]): Promise<SaveInvoicesResult> {
        const unique = new Map<string, NewInvoiceRecord>();
        for (const record of records) {
            const fingerprint = invoiceRecordFingerprint(record);
            if (!unique.has(fingerprint)) {
                unique.set(fingerprint, { ...record, fingerprint });
            }
        }

        const savedCount = await this.repository.insertMissing([...unique.values()]);
        const duplicateCount = records.length - savedCount;
        this.logger.info(`Saved ${savedCount} invoice records (${duplicateCount} duplicates skipped).`);
        return { savedCount, duplicateCount };
    }

    async updateRegistered(id: number, registered: boolean): Promise<StoredInvoiceRecord> {
        const updated = await this.repository.setRegistered(id, registered);
        if (!updated) {
            throw new NotFoundError(`Invoice record ${id} not found.`);
        }
        this.logger.info(`Invoice record ${id} marked as ${registered ? 'registered' : 'not registered'}.`);
        return updated;
    }
}
