// src/infrastructure/webserver/controllers/invoice-records.controller.ts
import { NextFunction, Request, Response } from 'express';
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';
import { ValidationError } from '../../../core/common/errors';
import { InvoiceStoreService, parseInvoiceRecordInputs } from '../../../core/storage';
import { LOGGER_TOKEN } from '../../logger';

function parseRecordId(raw: string): number {
    const id = Number(raw);
    if (!Number.isInteger(id) || id <= 0) {
        throw new ValidationError(`Invalid invoice record id "${raw}".`);
    }
    return id;
}

function readRegisteredFlag(body: unknown): boolean {
    if (typeof body === 'object' && body !== null && 'registered' in body && typeof body.registered === 'boolean') {
        return body.registered;
    }
    throw new ValidationError('Body must be {"registered": boolean}.');
}

@injectable()
export class InvoiceRecordsController {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(InvoiceStoreService) private store: InvoiceStoreService
    ) {
        this.logger.info('InvoiceRecordsController initialized.');
    }

    /** GET /api/invoices */
    public handleList = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            res.status(200).json(await this.store.list());
        } catch (error) {
            next(error);
        }
    };

    /** POST /api/invoices */
    public handleSave = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const records = parseInvoiceRecordInputs(req.body);
            const { savedCount, duplicateCount } = await this.store.save(records);
            res.status(201).json({
                message: `Saved ${savedCount} invoice(s); ${duplicateCount} duplicate(s) already existed.`,
                savedCount,
                duplicateCount,
            });
        } catch (error) {
            next(error);
        }
    };

    /** PUT /api/invoices/:id */
    public handleUpdateRegistered = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const id = parseRecordId(req.params.id);
            const registered = readRegisteredFlag(req.body);
            await this.store.updateRegistered(id, registered);
            res.status(200).json({ message: `Invoice record ${id} updated.` });
        } catch (error) {
            next(error);
        }
    };
}
