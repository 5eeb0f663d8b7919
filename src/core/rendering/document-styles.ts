// src/core/rendering/document-styles.ts
import { DocumentStyles } from './interfaces/services';

const BRAND_BLUE = 'FF2C5282';

export const CURRENCY_FORMAT = 'R$ #,##0.00';

const defaultStyles: DocumentStyles = {
    titleFont: { bold: true, size: 14, color: { argb: 'FFFFFFFF' } },
    titleFill: { type: 'pattern', pattern: 'solid', fgColor: { argb: BRAND_BLUE } },
    labelFont: { bold: true },
    sectionFont: { bold: true, color: { argb: BRAND_BLUE } },
    sectionBorder: { bottom: { style: 'thick', color: { argb: BRAND_BLUE } } },
    cellBorder: {
        top: { style: 'thin' },
        left: { style: 'thin' },
        bottom: { style: 'thin' },
        right: { style: 'thin' }
    },
    centered: { horizontal: 'center', vertical: 'middle' },
    totalFont: { bold: true, size: 12 },
    currencyFormat: CURRENCY_FORMAT,
    columnWidths: [30, 25, 20, 20],
};

export const DEFAULT_DOCUMENT_STYLES: DocumentStyles = Object.freeze(defaultStyles);
