// src/core/rendering/document-renderer.service.ts
import ExcelJS, { Cell, Worksheet } from 'exceljs';
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { DocumentRenderError, errorMessage } from '../common/errors';
import { InvoiceDraft } from '../common/interfaces/models';
import { DEFAULT_DOCUMENT_STYLES } from './document-styles';
import {
    DOCUMENT_TEMPLATE_TOKEN,
    DocumentStyles,
    DocumentTemplate,
    IDocumentRendererService
} from './interfaces/services';

export const SHEET_NAME = 'Nota Fiscal';
const COLUMN_LETTERS = ['A', 'B', 'C', 'D'] as const;
const PAYMENT_HEADERS = ['Descrição (Espécie)', 'Vencimento', 'Desconto', 'Valor Total'];

@injectable()
export class DocumentRendererService implements IDocumentRendererService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(DOCUMENT_TEMPLATE_TOKEN) private template: DocumentTemplate
    ) {
        this.logger.info('DocumentRendererService initialized.');
    }

    async render(draft: InvoiceDraft, styles: DocumentStyles = DEFAULT_DOCUMENT_STYLES): Promise<Buffer> {
        this.logger.debug(`Rendering invoice document ${draft.invoiceNumber}...`);
        try {
            const workbook = new ExcelJS.Workbook();
            workbook.creator = this.template.creator;

            const sheet = workbook.addWorksheet(SHEET_NAME);
            this.layoutHeader(sheet, draft, styles);
            this.layoutServiceTaker(sheet, draft, styles);
            this.layoutPaymentDetails(sheet, draft, styles);
            styles.columnWidths.forEach((width, i) => {
                sheet.getColumn(i + 1).width = width;
            });

            const buffer = Buffer.from(await workbook.xlsx.writeBuffer());
            this.logger.debug(`Invoice document ${draft.invoiceNumber} rendered (${buffer.length} bytes).`);
            return buffer;
        } catch (error) {
            this.logger.error(`Failed to render invoice document ${draft.invoiceNumber}`, {
                message: errorMessage(error),
                stack: error instanceof Error ? error.stack : undefined
            });
            throw new DocumentRenderError(`Failed to render invoice ${draft.invoiceNumber}: ${errorMessage(error)}`);
        }
    }

    async renderBase64(draft: InvoiceDraft, styles: DocumentStyles = DEFAULT_DOCUMENT_STYLES): Promise<string> {
        const buffer = await this.render(draft, styles);
        return buffer.toString('base64');
    }

    private layoutHeader(sheet: Worksheet, draft: InvoiceDraft, styles: DocumentStyles): void {
        sheet.mergeCells('A1:D2');
        const banner = sheet.getCell('A1');
        banner.value = this.template.title;
        banner.font = styles.titleFont;
        banner.fill = styles.titleFill;
        banner.alignment = styles.centered;

        this.setLabel(sheet.getCell('A4'), 'Número da Nota:', styles);
        sheet.getCell('B4').value = draft.invoiceNumber;
        this.setLabel(sheet.getCell('C4'), 'Data Emissão:', styles);
        sheet.getCell('D4').value = draft.emissionDate;
    }

    private layoutServiceTaker(sheet: Worksheet, draft: InvoiceDraft, styles: DocumentStyles): void {
        this.setSectionHeading(sheet, 6, 'DADOS DO TOMADOR DE SERVIÇO', styles);

        sheet.getCell('A8').value = 'Razão Social / Nome:';
        sheet.getCell('B8').value = draft.customerName;
        sheet.getCell('A9').value = 'CPF / CNPJ:';
        sheet.getCell('B9').value = draft.taxId;
        sheet.getCell('A10').value = 'Origem:';
        sheet.getCell('B10').value = draft.origin;
    }

    private layoutPaymentDetails(sheet: Worksheet, draft: InvoiceDraft, styles: DocumentStyles): void {
        this.setSectionHeading(sheet, 12, 'DETALHES DO PAGAMENTO', styles);

        PAYMENT_HEADERS.forEach((header, i) => {
            const cell = sheet.getCell(`${COLUMN_LETTERS[i]}14`);
            cell.value = header;
            cell.font = styles.labelFont;
            cell.border = styles.cellBorder;
            cell.alignment = styles.centered;
        });

        sheet.getCell('A15').value = `${draft.species} - ${draft.title}`;
        sheet.getCell('B15').value = draft.dueDate;
        sheet.getCell('C15').value = draft.amountDiscount.value;
        sheet.getCell('D15').value = draft.amountDue.value;
        sheet.getCell('C15').numFmt = styles.currencyFormat;
        sheet.getCell('D15').numFmt = styles.currencyFormat;

        for (const column of COLUMN_LETTERS) {
            const cell = sheet.getCell(`${column}15`);
            cell.border = styles.cellBorder;
            cell.alignment = { horizontal: 'center' };
        }

        this.setLabel(sheet.getCell('C17'), 'VALOR LÍQUIDO:', styles);
        const net = sheet.getCell('D17');
        net.value = roundToCents(draft.amountDue.value - draft.amountDiscount.value);
        net.numFmt = styles.currencyFormat;
        net.font = styles.totalFont;
    }

    private setLabel(cell: Cell, text: string, styles: DocumentStyles): void {
        cell.value = text;
        cell.font = styles.labelFont;
    }

    private setSectionHeading(sheet: Worksheet, rowNumber: number, text: string, styles: DocumentStyles): void {
        sheet.mergeCells(`A${rowNumber}:D${rowNumber}`);
        const cell = sheet.getCell(`A${rowNumber}`);
        cell.value = text;
        cell.font = styles.sectionFont;
        cell.border = styles.sectionBorder;
    }
}

function roundToCents(value: number): number {
    return Math.round(value * 100) / 100;
}
