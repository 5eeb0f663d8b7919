// src/core/parsing/interfaces/services.ts
import { RawRow } from '../../common/interfaces/models';

export type TableFileType = 'csv' | 'excel';

/** Options for loading an uploaded table */
export interface FileParsingOptions {
    fileTypeHint?: TableFileType; // Defaults to 'excel'
    sheetName?: string; // Workbooks only; defaults to the first sheet
}

/** Defines the contract for the File Parser Service */
export interface IFileParserService {
    /**
     * Loads an uploaded CSV or workbook into rows keyed by trimmed header.
     * @throws {FileParsingError} If the content cannot be read or has no header row.
     */
    parseFile(
        fileBuffer: Buffer,
        options?: FileParsingOptions
    ): Promise<RawRow[]>;
}
