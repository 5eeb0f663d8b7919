// src/infrastructure/webserver/server.ts
import express, { Application, NextFunction, Request, Response } from 'express';
import http from 'http';
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../logger';
import { InvoiceProcessingController } from './controllers/invoice-processing.controller';
import { InvoiceRecordsController } from './controllers/invoice-records.controller';
import { errorHandler } from './middleware/error.middleware';
import { createInvoiceRouter } from './routes/invoice.routes';

@injectable()
export class Server {
    private app: Application;
    private httpServer?: http.Server;

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(InvoiceProcessingController) private processingController: InvoiceProcessingController,
        @inject(InvoiceRecordsController) private recordsController: InvoiceRecordsController
    ) {
        this.logger.info('Initializing Express server...');
        this.app = express();
        this.setupMiddleware();
        this.setupRoutes(); // Setup routes before error handler
        this.setupErrorHandling(); // Setup error handler last
        this.logger.info('Express server initialized.');
    }

    private setupMiddleware(): void {
        // Stored records carry base64 workbooks, hence the generous limit
        this.app.use(express.json({ limit: '50mb' }));
        this.app.use(express.urlencoded({ extended: true, limit: '10mb' }));

        this.app.use((req: Request, res: Response, next: NextFunction) => {
            this.logger.http(`Request: ${req.method} ${req.originalUrl}`, { ip: req.ip });
            next();
        });

        this.logger.info('Standard middleware configured.');
    }

    private setupRoutes(): void {
        this.app.get('/health', (req: Request, res: Response) => {
            res.status(200).json({ status: 'UP', timestamp: new Date().toISOString() });
        });

        this.app.use('/api/invoices', createInvoiceRouter(this.processingController, this.recordsController));

        this.app.use('/api', (req: Request, res: Response) => {
            res.status(404).json({ message: 'API route not found' });
        });

        this.logger.info('API routes configured.');
    }

    private setupErrorHandling(): void {
        // This MUST be the LAST middleware added
        this.app.use(errorHandler);
        this.logger.info('Error handling middleware configured.');
    }

    /** Port actually bound; differs from the requested one when started on port 0 */
    public get port(): number | undefined {
        const address = this.httpServer?.address();
        return address !== null && typeof address === 'object' ? address.port : undefined;
    }

    public start(port: number): Promise<void> {
        return new Promise((resolve, reject) => {
            this.httpServer = this.app.listen(port, () => {
                this.logger.info(`Server started and listening on http://localhost:${this.port ?? port}`);
                resolve();
            })
            .on('error', (error) => {
                this.logger.error('Failed to start server:', error);
                reject(error);
            });
        });
    }

    public stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            const httpServer = this.httpServer;
            if (!httpServer) {
                this.logger.warn('Server was not running.');
                resolve();
                return;
            }
            this.logger.info('Attempting to gracefully stop the server...');
            httpServer.close((error) => {
                if (error) {
                    this.logger.error('Error stopping server:', error);
                    return reject(error);
                }
                this.httpServer = undefined;
                this.logger.info('Server stopped successfully.');
                resolve();
            });
        });
    }
}
