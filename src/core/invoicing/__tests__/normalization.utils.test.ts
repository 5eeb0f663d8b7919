import { rowOf } from '../../../../test/support';
import { CUSTOMER_NAME_RULE, PLACEHOLDERS } from '../column-rules';
import {
    formatCurrency,
    normalizeCurrency,
    normalizeHeader,
    resolveColumn,
    tryParseCurrency
} from '../normalization.utils';

describe('normalizeCurrency', () => {
    it('parses the R$ display convention', () => {
        expect(normalizeCurrency('R$ 1.234,56')).toBe(1234.56);
        expect(normalizeCurrency('R$ 12.345.678,90')).toBe(12345678.9);
        expect(normalizeCurrency('10,5')).toBe(10.5);
        expect(normalizeCurrency('R$ -10,50')).toBe(-10.5);
    });

    it('passes finite numbers through unchanged', () => {
        expect(normalizeCurrency(1500)).toBe(1500);
        expect(normalizeCurrency(-2.75)).toBe(-2.75);
    });

    it('treats dots as thousands separators', () => {
        expect(normalizeCurrency('1.5')).toBe(15);
    });

    it('returns 0 for anything unparseable', () => {
        expect(normalizeCurrency('abc')).toBe(0);
        expect(normalizeCurrency('')).toBe(0);
        expect(normalizeCurrency('12,3,4')).toBe(0);
        expect(normalizeCurrency(null)).toBe(0);
        expect(normalizeCurrency(undefined)).toBe(0);
        expect(normalizeCurrency(NaN)).toBe(0);
        expect(normalizeCurrency(Infinity)).toBe(0);
        expect(normalizeCurrency(true)).toBe(0);
    });

    it('reports why a value was rejected', () => {
        const result = tryParseCurrency('abc');
        expect(result).toEqual({ ok: false, reason: 'Not a currency value: "abc"' });
    });
});

describe('formatCurrency', () => {
    it('groups thousands with dots and uses a decimal comma', () => {
        expect(formatCurrency(1234.56)).toBe('R$ 1.234,56');
        expect(formatCurrency(1000)).toBe('R$ 1.000,00');
        expect(formatCurrency(0)).toBe('R$ 0,00');
        expect(formatCurrency(-1234567.891)).toBe('R$ -1.234.567,89');
    });

    it('never prints a negative zero', () => {
        expect(formatCurrency(-0.001)).toBe('R$ 0,00');
    });

    it('spells out amounts past the exponent-notation threshold', () => {
        expect(formatCurrency(1e21)).toBe('R$ 1.000.000.000.000.000.000.000,00');
        expect(formatCurrency(-2e21)).toBe('R$ -2.000.000.000.000.000.000.000,00');
        const text = 'R$ 1.000.000.000.000.000.000.000,00';
        expect(formatCurrency(normalizeCurrency(text))).toBe(text);
    });

    it('formats non-finite values as zero', () => {
        expect(formatCurrency(NaN)).toBe('R$ 0,00');
    });

    it('round-trips well-formed display strings', () => {
        for (const text of ['R$ 1.234,56', 'R$ 0,99', 'R$ 12.345.678,90']) {
            expect(formatCurrency(normalizeCurrency(text))).toBe(text);
        }
    });
});

describe('normalizeHeader', () => {
    it('drops dots and spaces and lowercases', () => {
        expect(normalizeHeader('Resp. Fin')).toBe('respfin');
        expect(normalizeHeader('V. Devido')).toBe('vdevido');
        expect(normalizeHeader('CPF/CNPJ')).toBe('cpf/cnpj');
    });
});

describe('resolveColumn', () => {
    const resolveCustomer = (cells: Parameters<typeof rowOf>[0]) =>
        resolveColumn(rowOf(cells), CUSTOMER_NAME_RULE.candidates, CUSTOMER_NAME_RULE.fallbackKeys, PLACEHOLDERS.customerName);

    it('prefers Nome over Cliente regardless of column order', () => {
        expect(resolveCustomer({ Cliente: 'Beta', Nome: 'Alfa' })).toBe('Alfa');
    });

    it('skips candidates holding blank cells', () => {
        expect(resolveCustomer({ Nome: '   ', Cliente: 'Beta' })).toBe('Beta');
    });

    it('falls back to normalized header matching', () => {
        expect(resolveCustomer({ 'RESP FIN.': 'Gama' })).toBe('Gama');
    });

    it('scans fallback headers in column order', () => {
        expect(resolveCustomer({ 'NOME ': 'Xis', CLIENTE: 'Ypsilon' })).toBe('Xis');
    });

    it('returns the placeholder when nothing matches', () => {
        expect(resolveCustomer({ Produto: 'Cadeira' })).toBe('Consumidor');
        expect(resolveCustomer({ Nome: null })).toBe('Consumidor');
    });

    it('keeps zero as a value', () => {
        expect(resolveColumn(rowOf({ 'V. Devido': 0 }), ['V. Devido'], new Set(['vdevido']), null)).toBe(0);
    });
});
