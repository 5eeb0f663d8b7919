import ExcelJS from 'exceljs';
import * as XLSX from 'xlsx';
import { silentLogger } from '../../../../test/support';
import { FileParsingError } from '../../common/errors';
import { resolveEmissionDate } from '../../invoicing/date-policy.utils';
import { buildHeaders, FileParserService, inferTableFileType } from '../file-parser.service';

function workbookBuffer(rows: unknown[][]): Buffer {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), 'Planilha1');
    return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

describe('FileParserService', () => {
    const parser = new FileParserService(silentLogger());

    it('reads UTF-8 CSV with comma separators, keeping cells as text', async () => {
        const csv = 'Nome,V. Devido,Venc\nJoão,"R$ 1.234,56",10/07/2024\nBeto,10,\n';
        const rows = await parser.parseFile(Buffer.from(csv, 'utf8'), { fileTypeHint: 'csv' });

        expect(rows).toHaveLength(2);
        expect(Object.fromEntries(rows[0])).toEqual({ Nome: 'João', 'V. Devido': 'R$ 1.234,56', Venc: '10/07/2024' });
        expect(rows[1].get('V. Devido')).toBe('10');
        expect([...rows[1].keys()]).toEqual(['Nome', 'V. Devido', 'Venc']);
    });

    it('falls back to Latin-1 with semicolon separators', async () => {
        const csv = 'Nome;Cidade;V. Devido\nJoão;São Paulo;R$ 1.234,56\n';
        const rows = await parser.parseFile(Buffer.from(csv, 'latin1'), { fileTypeHint: 'csv' });

        expect(rows).toHaveLength(1);
        expect(Object.fromEntries(rows[0])).toEqual({ Nome: 'João', Cidade: 'São Paulo', 'V. Devido': 'R$ 1.234,56' });
    });

    it('reads the first sheet of a workbook and skips blank rows', async () => {
        const buffer = workbookBuffer([
            ['Nome', 'V. Devido'],
            ['Ana', 150.5],
            [],
            ['Beto', 'R$ 10,00'],
            ['Carla'],
        ]);
        const rows = await parser.parseFile(buffer);

        expect(rows.map(row => Object.fromEntries(row))).toEqual([
            { Nome: 'Ana', 'V. Devido': 150.5 },
            { Nome: 'Beto', 'V. Devido': 'R$ 10,00' },
            { Nome: 'Carla', 'V. Devido': null },
        ]);
    });

    it('reads date-formatted cells as dates on the day typed in', async () => {
        const workbook = new ExcelJS.Workbook();
        const sheet = workbook.addWorksheet('Planilha1');
        sheet.addRow(['Nome', 'Data']);
        sheet.addRow(['Ana', new Date(Date.UTC(2024, 0, 10))]);
        sheet.getCell('B2').numFmt = 'dd/mm/yyyy';
        const buffer = Buffer.from(await workbook.xlsx.writeBuffer());

        const [row] = await parser.parseFile(buffer);
        const cell = row.get('Data');

        expect(cell).toBeInstanceOf(Date);
        expect(cell instanceof Date && [cell.getHours(), cell.getMinutes(), cell.getSeconds()]).toEqual([0, 0, 0]);
        expect(resolveEmissionDate({ kind: 'saleDate' }, row, new Date(2024, 5, 15))).toBe('10/01/2024');
    });

    it('keeps local-midnight dates written by the sheet library on their day', async () => {
        const rows = await parser.parseFile(workbookBuffer([['Nome', 'Data'], ['Ana', new Date(2024, 0, 10)]]));

        expect(rows[0].get('Data')).toEqual(new Date(2024, 0, 10));
        expect(resolveEmissionDate({ kind: 'saleDate' }, rows[0], new Date(2024, 5, 15))).toBe('10/01/2024');
    });

    it('rejects an empty upload', async () => {
        await expect(parser.parseFile(Buffer.alloc(0), { fileTypeHint: 'csv' }))
            .rejects.toThrow(new FileParsingError('The uploaded file is empty.'));
    });

    it('rejects a sheet without a header row', async () => {
        await expect(parser.parseFile(workbookBuffer([]))).rejects.toBeInstanceOf(FileParsingError);
    });

    it('rejects an unknown sheet name', async () => {
        await expect(parser.parseFile(workbookBuffer([['Nome']]), { sheetName: 'Outra' }))
            .rejects.toThrow('Sheet "Outra" not found.');
    });
});

describe('buildHeaders', () => {
    it('trims, names blank headers and suffixes repeats', () => {
        expect(buildHeaders([' Nome ', null, 'Nome', '', 42, 'Nome']))
            .toEqual(['Nome', 'Unnamed: 1', 'Nome.1', 'Unnamed: 3', '42', 'Nome.2']);
    });
});

describe('inferTableFileType', () => {
    it('detects CSV by extension, case-insensitively', () => {
        expect(inferTableFileType('notas.CSV')).toBe('csv');
        expect(inferTableFileType('notas.xlsx')).toBe('excel');
        expect(inferTableFileType(undefined)).toBe('excel');
    });
});
