// src/infrastructure/webserver/controllers/invoice-processing.controller.ts
import { NextFunction, Request, Response } from 'express';
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';
import { ValidationError } from '../../../core/common/errors';
import { DatePolicy } from '../../../core/common/interfaces/models';
import { DATE_MODES, InvoiceProcessingService, isDateMode, toDatePolicy } from '../../../core/invoicing';
import { LOGGER_TOKEN } from '../../logger';

/**
 * Reads `dateMode` (default "current") and `customDate` from the multipart form fields.
 */
export function readDatePolicy(body: unknown): DatePolicy {
    const fields: Record<string, unknown> = typeof body === 'object' && body !== null ? { ...body } : {};
    const rawMode = fields.dateMode ?? 'current';
    if (!isDateMode(rawMode)) {
        throw new ValidationError(`Invalid dateMode "${String(rawMode)}". Allowed: ${DATE_MODES.join(', ')}.`);
    }
    const customDate = typeof fields.customDate === 'string' ? fields.customDate : undefined;
    return toDatePolicy(rawMode, customDate);
}

@injectable()
export class InvoiceProcessingController {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(InvoiceProcessingService) private processingService: InvoiceProcessingService
    ) {
        this.logger.info('InvoiceProcessingController initialized.');
    }

    /**
     * POST /api/invoices/process
     * One invoice per data row of the uploaded table, in row order.
     */
    public handleProcess = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const file = req.file;
            if (!file) {
                throw new ValidationError('An uploaded table ("file") is required.');
            }
            const policy = readDatePolicy(req.body);
            this.logger.info(`Received "${file.originalname}" (${(file.size / 1024).toFixed(2)} KB) for processing.`);

            const invoices = await this.processingService.processUpload(
                { buffer: file.buffer, originalName: file.originalname },
                policy
            );
            res.status(200).json(invoices);
        } catch (error) {
            next(error);
        }
    };
}
