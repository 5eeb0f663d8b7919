// src/infrastructure/webserver/routes/invoice.routes.ts
import { Router } from 'express';
import { InvoiceProcessingController } from '../controllers/invoice-processing.controller';
import { InvoiceRecordsController } from '../controllers/invoice-records.controller';
import { createInvoiceUpload } from '../middleware/upload.middleware';

/**
 * Routes mounted under /api/invoices.
 */
export function createInvoiceRouter(
    processingController: InvoiceProcessingController,
    recordsController: InvoiceRecordsController,
    maxFileSizeMb?: number
): Router {
    const router = Router();

    // POST /api/invoices/process - multipart upload: file, dateMode, customDate
    router.post('/process', createInvoiceUpload(maxFileSizeMb), processingController.handleProcess);

    router.get('/', recordsController.handleList);
    router.post('/', recordsController.handleSave);
    router.put('/:id', recordsController.handleUpdateRegistered);

    return router;
}
