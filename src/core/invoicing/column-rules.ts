// src/core/invoicing/column-rules.ts

/** Header variants tried for one logical field of an uploaded billing row */
export interface ColumnRule {
    readonly candidates: readonly string[];
    readonly fallbackKeys: ReadonlySet<string>;
}

const rule = (candidates: readonly string[], fallbackKeys: readonly string[]): ColumnRule =>
    Object.freeze({ candidates, fallbackKeys: new Set(fallbackKeys) });

// Candidate order decides which ambiguous column wins when several are filled.
export const CUSTOMER_NAME_RULE = rule(
    ['Resp. Fin', 'Resp Fin', 'Resp. Fin.', 'Nome', 'Cliente', 'Razão Social'],
    ['respfin', 'nome', 'cliente', 'razaosocial']
);
export const ORIGIN_RULE = rule(['Origem'], ['origem']);
export const TAX_ID_RULE = rule(['CPF/CNPJ', 'CPF'], ['cpf/cnpj', 'cpf']);
export const TITLE_RULE = rule(['Título'], ['título', 'titulo']);
export const SPECIES_RULE = rule(['Espécie'], ['espécie', 'especie']);
export const ACCOUNT_PLAN_RULE = rule(['P. Contas'], ['pcontas']);
export const RESPONSIBLE_TAX_ID_RULE = rule(['CPF Resp'], ['cpfresp']);
export const DUE_DATE_RULE = rule(['Venc'], ['venc', 'vencimento']);
export const AMOUNT_DUE_RULE = rule(['V. Devido'], ['vdevido']);
export const AMOUNT_RECEIVED_RULE = rule(['V. Receb'], ['vreceb']);
export const AMOUNT_DISCOUNT_RULE = rule(['V. Desc'], ['vdesc']);

/** Read by the sale-date policy; matched literally, no fallback */
export const SALE_DATE_COLUMN = 'Data';

export const PLACEHOLDERS = Object.freeze({
    customerName: 'Consumidor',
    origin: '-',
    taxId: '-',
    title: 'Serviço',
    species: 'NF-e',
    accountPlan: 'Fidelizado',
});

export const INVOICE_NUMBER_OFFSET = 1000;
export const DISPLAY_NAME_MAX_CUSTOMER_CHARS = 30;
