// src/core/parsing/file-parser.service.ts
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';
import * as XLSX from 'xlsx';

import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { AppError, FileParsingError } from '../common/errors';
import { CellValue, ParseResult, RawRow } from '../common/interfaces/models';
import { cellToText, isEmptyCell } from '../common/utils';
import { FileParsingOptions, IFileParserService, TableFileType } from './interfaces/services';

/** Picks the parser from the uploaded file name; anything but .csv is read as a workbook */
export function inferTableFileType(fileName: string | undefined): TableFileType {
    return fileName?.trim().toLowerCase().endsWith('.csv') ? 'csv' : 'excel';
}

function tryDecodeUtf8(buffer: Buffer): ParseResult<string> {
    try {
        return { ok: true, value: new TextDecoder('utf-8', { fatal: true }).decode(buffer) };
    } catch (error) {
        return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }
}

const MS_PER_MINUTE = 60_000;

function toCellValue(raw: unknown): CellValue {
    if (raw instanceof Date) {
        // Serial-to-Date conversion drifts by seconds in zones whose 1899 offset had seconds (LMT)
        return new Date(Math.round(raw.getTime() / MS_PER_MINUTE) * MS_PER_MINUTE);
    }
    if (typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') {
        return raw;
    }
    return null;
}

/**
 * Trims header cells, names blank ones "Unnamed: <index>" and suffixes repeats with ".1", ".2"...
 */
export function buildHeaders(headerCells: readonly unknown[]): string[] {
    const seen = new Map<string, number>();
    return headerCells.map((raw, index) => {
        const cell = toCellValue(raw);
        const base = isEmptyCell(cell) ? `Unnamed: ${index}` : cellToText(cell).trim();
        const count = seen.get(base) ?? 0;
        seen.set(base, count + 1);
        return count === 0 ? base : `${base}.${count}`;
    });
}

@injectable()
export class FileParserService implements IFileParserService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('FileParserService initialized.');
    }

    async parseFile(
        fileBuffer: Buffer,
        options?: FileParsingOptions
    ): Promise<RawRow[]> {
        const fileType = options?.fileTypeHint ?? 'excel';
        this.logger.info(`Attempting to parse file as ${fileType} (${fileBuffer.length} bytes)`);

        if (fileBuffer.length === 0) {
            throw new FileParsingError('The uploaded file is empty.');
        }

        try {
            const workbook = fileType === 'csv'
                ? this.readCsv(fileBuffer)
                : XLSX.read(fileBuffer, { type: 'buffer', cellDates: true });
            return this.sheetToRows(workbook, options?.sheetName);
        } catch (error) {
            if (error instanceof AppError) {
                throw error;
            }
            this.logger.error(`File parsing failed: ${error instanceof Error ? error.message : String(error)}`);
            throw new FileParsingError('Failed to parse file', error instanceof Error ? error : undefined);
        }
    }

    /**
     * Comma separated UTF-8 first; content that is not valid UTF-8 is re-read
     * as Latin-1 with ";" separators. Cells stay as text.
     */
    private readCsv(buffer: Buffer): XLSX.WorkBook {
        const utf8 = tryDecodeUtf8(buffer);
        if (utf8.ok) {
            this.logger.debug('CSV decoded as UTF-8.');
            return XLSX.read(utf8.value, { type: 'string', raw: true });
        }

        this.logger.warn(`CSV is not valid UTF-8 (${utf8.reason}); retrying as Latin-1 with ";" separators.`);
        // "sep=" pins the delimiter instead of letting the reader guess it
        const latin1 = `sep=;\n${buffer.toString('latin1')}`;
        return XLSX.read(latin1, { type: 'string', raw: true });
    }

    private sheetToRows(workbook: XLSX.WorkBook, requestedSheet?: string): RawRow[] {
        const sheetName = requestedSheet ?? workbook.SheetNames[0];
        if (!sheetName) { throw new FileParsingError('No sheets found in the uploaded file.'); }
        const worksheet = workbook.Sheets[sheetName];
        if (!worksheet) { throw new FileParsingError(`Sheet "${sheetName}" not found.`); }

        // header: 1 keeps the column order and lets us clean the header row ourselves
        const matrix = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
            header: 1,
            raw: true,
            defval: null,
            blankrows: false
        });

        if (matrix.length === 0) {
            throw new FileParsingError('The uploaded table has no header row.');
        }

        const [headerCells, ...dataRows] = matrix;
        const headers = buildHeaders(headerCells);
        this.logger.info(`Parsed ${dataRows.length} rows with ${headers.length} columns from sheet "${sheetName}".`);

        return dataRows.map(cells =>
            new Map<string, CellValue>(headers.map((header, i): [string, CellValue] => [header, toCellValue(cells[i])]))
        );
    }
}
