// src/core/invoicing/invoice-processing.service.ts
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { errorMessage } from '../common/errors';
import { DatePolicy, InvoiceData, RawRow } from '../common/interfaces/models';
import { generateUniqueId } from '../common/utils';
import { FileParserService, inferTableFileType } from '../parsing';
import { IInvoiceProcessingService, UploadedTable } from './interfaces/services';
import { InvoiceTransformerService } from './invoice-transformer.service';

@injectable()
export class InvoiceProcessingService implements IInvoiceProcessingService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(FileParserService) private fileParser: FileParserService,
        @inject(InvoiceTransformerService) private transformer: InvoiceTransformerService
    ) {
        this.logger.info('InvoiceProcessingService initialized.');
    }

    async processUpload(upload: UploadedTable, policy: DatePolicy, now: Date = new Date()): Promise<InvoiceData[]> {
        this.logger.info(`Processing upload "${upload.originalName}" with date policy "${policy.kind}".`);
        const rows = await this.fileParser.parseFile(upload.buffer, {
            fileTypeHint: inferTableFileType(upload.originalName)
        });
        return this.processRows(rows, policy, now);
    }

    async processRows(rows: readonly RawRow[], policy: DatePolicy, now: Date = new Date()): Promise<InvoiceData[]> {
        const batchId = generateUniqueId();
        this.logger.info(`[${batchId}] Transforming ${rows.length} rows...`);

        const results: InvoiceData[] = [];
        // Sequential on purpose: the row index is the invoice number.
        for (const [index, row] of rows.entries()) {
            try {
                results.push(await this.transformer.transform(row, index, policy, now));
            } catch (error) {
                this.logger.error(`[${batchId}] Row ${index} failed; aborting batch.`, {
                    message: errorMessage(error),
                    stack: error instanceof Error ? error.stack : undefined
                });
                throw error;
            }
        }

        this.logger.info(`[${batchId}] Produced ${results.length} invoices.`);
        return results;
    }
}
