import { rowOf, silentLogger, TEST_TEMPLATE } from '../../../../test/support';
import { DocumentRendererService } from '../../rendering';
import { buildDisplayName, InvoiceTransformerService } from '../invoice-transformer.service';

const NOW = new Date(2024, 5, 15, 9, 0);

describe('InvoiceTransformerService', () => {
    const logger = silentLogger();
    const transformer = new InvoiceTransformerService(logger, new DocumentRendererService(logger, TEST_TEMPLATE));

    it('resolves every field of a complete row', () => {
        const row = rowOf({
            'Resp. Fin': 'Maria Souza',
            'CPF/CNPJ': '123.456.789-00',
            Origem: 'Loja Centro',
            'Título': 'Mensalidade',
            'Espécie': 'Boleto',
            'P. Contas': 'Plano A',
            'CPF Resp': '987.654.321-00',
            Venc: '10/07/2024',
            'V. Devido': 'R$ 1.234,56',
            'V. Receb': 1000,
            'V. Desc': 'R$ 34,56',
            Data: '01/06/2024',
        });

        expect(transformer.buildDraft(row, 3, { kind: 'current' }, NOW)).toEqual({
            sequenceIndex: 3,
            invoiceNumber: 1003,
            displayName: 'NF-1003 - Maria Souza',
            customerName: 'Maria Souza',
            origin: 'Loja Centro',
            taxId: '123.456.789-00',
            title: 'Mensalidade',
            species: 'Boleto',
            accountPlan: 'Plano A',
            responsibleTaxId: '987.654.321-00',
            amountDue: { value: 1234.56, display: 'R$ 1.234,56' },
            amountReceived: { value: 1000, display: 'R$ 1.000,00' },
            amountDiscount: { value: 34.56, display: 'R$ 34,56' },
            emissionDate: '15/06/2024',
            dueDate: '10/07/2024',
        });
    });

    it('fills placeholders for an empty row', () => {
        const draft = transformer.buildDraft(rowOf({}), 0, { kind: 'current' }, NOW);
        expect(draft).toMatchObject({
            invoiceNumber: 1000,
            displayName: 'NF-1000 - Consumidor',
            customerName: 'Consumidor',
            origin: '-',
            taxId: '-',
            title: 'Serviço',
            species: 'NF-e',
            accountPlan: 'Fidelizado',
            responsibleTaxId: '-',
            amountDue: { value: 0, display: 'R$ 0,00' },
            amountReceived: { value: 0, display: 'R$ 0,00' },
            amountDiscount: { value: 0, display: 'R$ 0,00' },
            dueDate: '15/06/2024',
        });
    });

    it('uses the tax id for the responsible party when it has none of its own', () => {
        const draft = transformer.buildDraft(rowOf({ CPF: '111.222.333-44' }), 0, { kind: 'current' }, NOW);
        expect(draft.taxId).toBe('111.222.333-44');
        expect(draft.responsibleTaxId).toBe('111.222.333-44');
    });

    it('prefers Nome over Cliente', () => {
        const draft = transformer.buildDraft(rowOf({ Cliente: 'Beta', Nome: 'Alfa' }), 0, { kind: 'current' }, NOW);
        expect(draft.customerName).toBe('Alfa');
    });

    it('keeps 30 characters of a long customer name in the display name', () => {
        const name = 'Companhia Brasileira de Distribuição Ltda';
        const draft = transformer.buildDraft(rowOf({ Nome: name }), 7, { kind: 'current' }, NOW);
        expect(draft.customerName).toBe(name);
        expect(draft.displayName).toBe('NF-1007 - Companhia Brasileira de Distri');
        expect(draft.displayName.slice('NF-1007 - '.length)).toHaveLength(30);
    });

    it('renders non-text cells as text', () => {
        const draft = transformer.buildDraft(
            rowOf({ 'CPF/CNPJ': 12345678900, Venc: new Date(2024, 6, 10) }),
            0,
            { kind: 'current' },
            NOW
        );
        expect(draft.taxId).toBe('12345678900');
        expect(draft.dueDate).toBe('10/07/2024');
    });

    it('defaults malformed amounts to zero', () => {
        const draft = transformer.buildDraft(rowOf({ 'V. Devido': 'a combinar' }), 0, { kind: 'current' }, NOW);
        expect(draft.amountDue).toEqual({ value: 0, display: 'R$ 0,00' });
    });

    it('applies the date policy', () => {
        const row = rowOf({ Data: '01/06/2024' });
        expect(transformer.buildDraft(row, 0, { kind: 'saleDate' }, NOW).emissionDate).toBe('01/06/2024');
        expect(transformer.buildDraft(row, 0, { kind: 'custom', date: '2024-03-05' }, NOW).emissionDate).toBe('05/03/2024');
    });

    it('attaches the rendered workbook', async () => {
        const row = rowOf({ Nome: 'Ana', 'V. Devido': 'R$ 10,00' });
        const invoice = await transformer.transform(row, 2, { kind: 'current' }, NOW);

        expect(invoice.displayName).toBe('NF-1002 - Ana');
        expect(invoice.amountDue.value).toBe(10);
        // .xlsx files are zip archives
        expect(Buffer.from(invoice.documentBlob, 'base64').subarray(0, 2).toString('latin1')).toBe('PK');
    });
});

describe('buildDisplayName', () => {
    it('does not split characters outside the basic plane', () => {
        const name = `${'a'.repeat(29)}😀b`;
        expect(buildDisplayName(1000, name)).toBe(`NF-1000 - ${'a'.repeat(29)}😀`);
    });
});
