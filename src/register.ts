//src/register.ts

import { container } from "tsyringe";
import config from "./config";
import { INVOICE_RECORD_REPOSITORY_TOKEN } from "./core/common/interfaces/repositories";
import { InvoiceProcessingService, InvoiceTransformerService } from "./core/invoicing";
import { FileParserService } from "./core/parsing";
import { DOCUMENT_TEMPLATE_TOKEN, DocumentRendererService, DocumentTemplate } from "./core/rendering";
import { InvoiceStoreService } from "./core/storage";
import { AppDataSource, DATABASE_CONFIG_TOKEN } from "./infrastructure/database/providers/data-source.provider";
import { InvoiceRecordRepository } from "./infrastructure/database/repositories/invoice-record.repository";
import loggerInstance, { LOGGER_TOKEN } from "./infrastructure/logger";
import { InvoiceProcessingController } from "./infrastructure/webserver/controllers/invoice-processing.controller";
import { InvoiceRecordsController } from "./infrastructure/webserver/controllers/invoice-records.controller";
import { Server } from "./infrastructure/webserver/server";

export function registerDependencies(): void {
    const logger = loggerInstance;
    logger.debug("--- Starting Dependency Registration ---");

    // IMPORTANT: Register Logger FIRST
    container.register(LOGGER_TOKEN, { useValue: loggerInstance });

    // Configuration values
    container.register(DATABASE_CONFIG_TOKEN, { useValue: config.database });
    const template: DocumentTemplate = config.document;
    container.register(DOCUMENT_TEMPLATE_TOKEN, { useValue: template });

    // Infrastructure
    container.registerSingleton(AppDataSource);
    container.register(INVOICE_RECORD_REPOSITORY_TOKEN, { useClass: InvoiceRecordRepository });

    // Core services
    container.registerSingleton(FileParserService);
    container.registerSingleton(DocumentRendererService);
    container.registerSingleton(InvoiceTransformerService);
    container.registerSingleton(InvoiceProcessingService);
    container.registerSingleton(InvoiceStoreService);

    // Web layer
    container.registerSingleton(InvoiceProcessingController);
    container.registerSingleton(InvoiceRecordsController);
    container.registerSingleton(Server);

    logger.debug("--- Dependency Registration Complete ---");
}
