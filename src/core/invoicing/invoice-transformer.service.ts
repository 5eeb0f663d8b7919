// src/core/invoicing/invoice-transformer.service.ts
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import {
    CurrencyAmount,
    DatePolicy,
    InvoiceData,
    InvoiceDraft,
    RawRow
} from '../common/interfaces/models';
import { cellToText, formatDateToDDMMYYYY } from '../common/utils';
import { DocumentRendererService } from '../rendering';
import {
    ACCOUNT_PLAN_RULE,
    AMOUNT_DISCOUNT_RULE,
    AMOUNT_DUE_RULE,
    AMOUNT_RECEIVED_RULE,
    ColumnRule,
    CUSTOMER_NAME_RULE,
    DISPLAY_NAME_MAX_CUSTOMER_CHARS,
    DUE_DATE_RULE,
    INVOICE_NUMBER_OFFSET,
    ORIGIN_RULE,
    PLACEHOLDERS,
    RESPONSIBLE_TAX_ID_RULE,
    SPECIES_RULE,
    TAX_ID_RULE,
    TITLE_RULE
} from './column-rules';
import { resolveEmissionDateDetailed } from './date-policy.utils';
import { IInvoiceTransformerService } from './interfaces/services';
import { formatCurrency, resolveColumn, tryParseCurrency } from './normalization.utils';

/** "NF-1003 - <first 30 characters of the customer name>" */
export function buildDisplayName(invoiceNumber: number, customerName: string): string {
    // Array.from splits by code point so a name is never cut inside a surrogate pair
    const shortName = Array.from(customerName).slice(0, DISPLAY_NAME_MAX_CUSTOMER_CHARS).join('');
    return `NF-${invoiceNumber} - ${shortName}`;
}

@injectable()
export class InvoiceTransformerService implements IInvoiceTransformerService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(DocumentRendererService) private renderer: DocumentRendererService
    ) {
        this.logger.info('InvoiceTransformerService initialized.');
    }

    buildDraft(row: RawRow, sequenceIndex: number, policy: DatePolicy, now: Date): InvoiceDraft {
        const emission = resolveEmissionDateDetailed(policy, row, now);
        if (emission.fallbackReason) {
            this.logger.debug(`Row ${sequenceIndex}: emission date falls back to processing date (${emission.fallbackReason}).`);
        }

        const customerName = this.resolveText(row, CUSTOMER_NAME_RULE, PLACEHOLDERS.customerName);
        const taxId = this.resolveText(row, TAX_ID_RULE, PLACEHOLDERS.taxId);
        const invoiceNumber = INVOICE_NUMBER_OFFSET + sequenceIndex;

        const dueCell = resolveColumn(row, DUE_DATE_RULE.candidates, DUE_DATE_RULE.fallbackKeys, null);

        return {
            sequenceIndex,
            invoiceNumber,
            displayName: buildDisplayName(invoiceNumber, customerName),
            customerName,
            origin: this.resolveText(row, ORIGIN_RULE, PLACEHOLDERS.origin),
            taxId,
            title: this.resolveText(row, TITLE_RULE, PLACEHOLDERS.title),
            species: this.resolveText(row, SPECIES_RULE, PLACEHOLDERS.species),
            accountPlan: this.resolveText(row, ACCOUNT_PLAN_RULE, PLACEHOLDERS.accountPlan),
            responsibleTaxId: this.resolveText(row, RESPONSIBLE_TAX_ID_RULE, taxId),
            amountDue: this.resolveAmount(row, AMOUNT_DUE_RULE, sequenceIndex),
            amountReceived: this.resolveAmount(row, AMOUNT_RECEIVED_RULE, sequenceIndex),
            amountDiscount: this.resolveAmount(row, AMOUNT_DISCOUNT_RULE, sequenceIndex),
            emissionDate: emission.value,
            dueDate: dueCell === null ? formatDateToDDMMYYYY(now) : cellToText(dueCell),
        };
    }

    async transform(row: RawRow, sequenceIndex: number, policy: DatePolicy, now: Date): Promise<InvoiceData> {
        const draft = this.buildDraft(row, sequenceIndex, policy, now);
        const documentBlob = await this.renderer.renderBase64(draft);
        return { ...draft, documentBlob };
    }

    private resolveText(row: RawRow, rule: ColumnRule, placeholder: string): string {
        const value = resolveColumn(row, rule.candidates, rule.fallbackKeys, placeholder);
        return typeof value === 'string' ? value : cellToText(value);
    }

    private resolveAmount(row: RawRow, rule: ColumnRule, sequenceIndex: number): CurrencyAmount {
        const cell = resolveColumn(row, rule.candidates, rule.fallbackKeys, null);
        let value = 0;
        if (cell !== null) {
            const parsed = tryParseCurrency(cell);
            if (parsed.ok) {
                value = parsed.value;
            } else {
                this.logger.debug(`Row ${sequenceIndex}: ${rule.candidates[0]} defaults to 0 (${parsed.reason}).`);
            }
        }
        return { value, display: formatCurrency(value) };
    }
}
