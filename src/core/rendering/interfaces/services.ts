// src/core/rendering/interfaces/services.ts
import { Alignment, Borders, Fill, Font } from 'exceljs';
import { InvoiceDraft } from '../../common/interfaces/models';

/** Texts of the invoice template that vary per deployment */
export interface DocumentTemplate {
    readonly title: string;
    readonly creator: string;
}

/**
 * Immutable style palette of the invoice template.
 * Shared by every render call; never mutated.
 */
export interface DocumentStyles {
    readonly titleFont: Partial<Font>;
    readonly titleFill: Fill;
    readonly labelFont: Partial<Font>;
    readonly sectionFont: Partial<Font>;
    readonly sectionBorder: Partial<Borders>;
    readonly cellBorder: Partial<Borders>;
    readonly centered: Partial<Alignment>;
    readonly totalFont: Partial<Font>;
    readonly currencyFormat: string;
    /** Widths of columns A to D */
    readonly columnWidths: readonly number[];
}

/** Defines the contract for the invoice document renderer */
export interface IDocumentRendererService {
    /**
     * Lays out the fixed invoice template for one draft and serializes it as .xlsx.
     * @throws {DocumentRenderError} when layout or serialization fails.
     */
    render(draft: InvoiceDraft, styles?: DocumentStyles): Promise<Buffer>;

    /** Same as render, base64 encoded for JSON payloads */
    renderBase64(draft: InvoiceDraft, styles?: DocumentStyles): Promise<string>;
}

export const DOCUMENT_TEMPLATE_TOKEN = Symbol.for('DocumentTemplate');
