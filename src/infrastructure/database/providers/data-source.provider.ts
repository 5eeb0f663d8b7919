// src/infrastructure/database/providers/data-source.provider.ts
import 'reflect-metadata';
import { inject, injectable } from "tsyringe";
import { DataSource, DataSourceOptions } from "typeorm";
import winston from "winston";

import config, { AppConfig } from "../../../config";
import { LOGGER_TOKEN } from "../../../infrastructure/logger";
import { errorMessage } from "../../../core/common/errors";
import { InvoiceRecord } from "../../../core/common/entities";

export const DATABASE_CONFIG_TOKEN = Symbol.for('DatabaseConfig');
export const IN_MEMORY_DATABASE = ':memory:';

/**
 * sql.js keeps the database in memory; a file path becomes the `location` it is
 * loaded from and written back to after every change.
 */
export function buildDataSourceOptions(dbConfig: AppConfig['database']): DataSourceOptions {
    const persistence = dbConfig.database === IN_MEMORY_DATABASE
        ? {}
        : { location: dbConfig.database, autoSave: true };
    return {
        type: dbConfig.type,
        ...persistence,
        synchronize: dbConfig.synchronize,
        logging: dbConfig.logging,
        entities: [InvoiceRecord],
        subscribers: [],
        migrations: [],
    };
}

@injectable()
export class AppDataSource {

    private _dataSource: DataSource | null = null;
    private initPromise: Promise<DataSource> | null = null;

    constructor(
        @inject(LOGGER_TOKEN) private readonly logger: winston.Logger,
        @inject(DATABASE_CONFIG_TOKEN) private readonly dbConfig: AppConfig['database'] = config.database
    ) {
        this.logger.info('AppDataSource service initialized.');
    }

    /**
     * Initializes the DataSource once; concurrent callers share the same attempt.
     */
    async init(): Promise<DataSource> {
        if (this._dataSource?.isInitialized) {
            return this._dataSource;
        }
        if (!this.initPromise) {
            this.initPromise = this.connect().finally(() => {
                this.initPromise = null;
            });
        }
        return this.initPromise;
    }

    private async connect(): Promise<DataSource> {
        const options = buildDataSourceOptions(this.dbConfig);

        this.logger.info(`AppDataSource: Configuring ${options.type} DataSource for "${this.dbConfig.database}"`);
        const dataSource = new DataSource(options);

        try {
            await dataSource.initialize();
            this.logger.info('AppDataSource: TypeORM DataSource initialized successfully!');
        } catch (err) {
            this.logger.error("AppDataSource: Error during Data Source initialization", {
                message: errorMessage(err),
                stack: err instanceof Error ? err.stack : undefined,
                db_name: this.dbConfig.database
            });
            throw err;
        }

        this._dataSource = dataSource;
        return dataSource;
    }

    async close(): Promise<void> {
        if (this._dataSource?.isInitialized) {
            try {
                this.logger.info("AppDataSource: Attempting to close TypeORM DataSource...");
                await this._dataSource.destroy();
                this.logger.info("AppDataSource: TypeORM DataSource has been closed successfully!");
                this._dataSource = null;
            } catch (err) {
                this.logger.error("AppDataSource: Error during Data Source closing", {
                    message: errorMessage(err),
                    stack: err instanceof Error ? err.stack : undefined
                });
                throw err;
            }
        } else {
            this.logger.warn("AppDataSource: Close called but DataSource was not initialized.");
            this._dataSource = null;
        }
    }

    getDataSource(): DataSource {
        if (!this._dataSource?.isInitialized) {
            this.logger.error("AppDataSource: getDataSource() called before initialization or after close!");
            throw new Error("DataSource is not available or not initialized. Ensure AppDataSource.init() was called successfully.");
        }
        return this._dataSource;
    }
}
