// src/infrastructure/database/repositories/invoice-record.repository.ts
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import { EntityManager, In, Repository } from 'typeorm';
import winston from 'winston';

import { LOGGER_TOKEN } from '../../logger';
import { AppDataSource } from '../providers/data-source.provider';

import { InvoiceRecord } from '../../../core/common/entities';
import { AppError, errorMessage } from '../../../core/common/errors';
import {
    IInvoiceRecordRepository,
    NewInvoiceRecord
} from '../../../core/common/interfaces/repositories';

// Keeps "IN (...)" lists and multi-row inserts under SQLite's bound parameter limit
const CHUNK_SIZE = 200;

function chunk<T>(items: readonly T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
}

@injectable()
export class InvoiceRecordRepository implements IInvoiceRecordRepository {

    constructor(
        @inject(LOGGER_TOKEN) private readonly logger: winston.Logger,
        @inject(AppDataSource) private readonly dataSourceProvider: AppDataSource
    ) {
        this.logger.info("InvoiceRecordRepository initialized.");
    }

    private async getRepository(): Promise<Repository<InvoiceRecord>> {
        const dataSource = await this.dataSourceProvider.init();
        return dataSource.getRepository(InvoiceRecord);
    }

    async findAllNewestFirst(): Promise<InvoiceRecord[]> {
        const repository = await this.getRepository();
        try {
            return await repository.find({ order: { id: 'DESC' } });
        } catch (error) {
            throw this.databaseError('Failed to list invoice records', error);
        }
    }

    async insertMissing(records: NewInvoiceRecord[]): Promise<number> {
        if (records.length === 0) {
            this.logger.info('InvoiceRecordRepository: No records provided to insertMissing.');
            return 0;
        }

        const repository = await this.getRepository();
        this.logger.info(`InvoiceRecordRepository: Inserting up to ${records.length} invoice records...`);

        try {
            const inserted = await repository.manager.transaction(async (manager: EntityManager) => {
                const stored = new Set<string>();
                for (const fingerprints of chunk(records.map(r => r.fingerprint), CHUNK_SIZE)) {
                    const existing = await manager.find(InvoiceRecord, {
                        select: { fingerprint: true },
                        where: { fingerprint: In(fingerprints) }
                    });
                    existing.forEach(record => stored.add(record.fingerprint));
                }

                const entities = records
                    .filter(record => !stored.has(record.fingerprint))
                    .map(record => Object.assign(new InvoiceRecord(), record));

                await manager.save(entities, { chunk: CHUNK_SIZE });
                return entities.length;
            });

            this.logger.info(`InvoiceRecordRepository: Inserted ${inserted} of ${records.length} records.`);
            return inserted;
        } catch (error) {
            throw this.databaseError('Failed to save invoice records', error, { recordCount: records.length });
        }
    }

    async setRegistered(id: number, registered: boolean): Promise<InvoiceRecord | null> {
        const repository = await this.getRepository();
        try {
            const record = await repository.findOneBy({ id });
            if (!record) {
                this.logger.debug(`InvoiceRecordRepository: Record with ID ${id} not found.`);
                return null;
            }
            record.registered = registered;
            return await repository.save(record);
        } catch (error) {
            throw this.databaseError(`Failed to update record ${id}`, error);
        }
    }

    private databaseError(message: string, error: unknown, context: Record<string, unknown> = {}): AppError {
        this.logger.error(`InvoiceRecordRepository: ${message}.`, {
            errorMessage: errorMessage(error),
            stack: error instanceof Error ? error.stack : undefined,
            ...context,
        });
        return new AppError('DatabaseError', `${message}: ${errorMessage(error)}`, 500, false);
    }
}
