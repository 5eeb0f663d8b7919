// src/infrastructure/webserver/middleware/upload.middleware.ts
import { Request, RequestHandler } from 'express';
import multer from 'multer';
import path from 'path';
import config from '../../../config';
import { FileParsingError } from '../../../core/common/errors';

export const ALLOWED_EXTENSIONS = ['.csv', '.xlsx', '.xls', '.xlsm', '.ods'];

// Browsers disagree on spreadsheet MIME types, so the extension decides
const fileFilter = (req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
    const extension = path.extname(file.originalname).toLowerCase();
    if (ALLOWED_EXTENSIONS.includes(extension)) {
        cb(null, true);
    } else {
        cb(new FileParsingError(`Invalid file type: "${file.originalname}". Allowed: ${ALLOWED_EXTENSIONS.join(', ')}.`));
    }
};

/**
 * Memory-stored single upload under the form field `file`.
 */
export function createInvoiceUpload(maxFileSizeMb: number = config.upload.maxFileSizeMb): RequestHandler {
    const upload = multer({
        storage: multer.memoryStorage(),
        fileFilter,
        limits: {
            fileSize: maxFileSizeMb * 1024 * 1024,
        }
    });
    return upload.single('file');
}
