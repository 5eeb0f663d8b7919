import { computeFingerprint, invoiceRecordFingerprint } from '../fingerprint.utils';

describe('computeFingerprint', () => {
    it('is the md5 hex digest of the fields joined by "-"', () => {
        expect(computeFingerprint(['Acme', '2024-01-01', '100'])).toBe('4a2a1db9da19cd4c3b8b575e8e47fb83');
        expect(computeFingerprint([])).toBe('d41d8cd98f00b204e9800998ecf8427e');
    });

    it('is deterministic', () => {
        const fields = ['Maria Souza', '15/06/2024', 'R$ 1.234,56'];
        expect(computeFingerprint(fields)).toBe(computeFingerprint([...fields]));
    });

    it('changes when any field changes', () => {
        expect(computeFingerprint(['Acme', '2024-01-01', '101'])).toBe('cf79b89774251550f04e0fce71d4ccbb');
        expect(computeFingerprint(['Acme', '2024-01-02', '100'])).not.toBe('4a2a1db9da19cd4c3b8b575e8e47fb83');
        expect(computeFingerprint(['acme', '2024-01-01', '100'])).not.toBe('4a2a1db9da19cd4c3b8b575e8e47fb83');
    });

    it('is sensitive to field order', () => {
        expect(computeFingerprint(['a', 'b'])).not.toBe(computeFingerprint(['b', 'a']));
    });
});

describe('invoiceRecordFingerprint', () => {
    it('uses customer, emission date and amount due', () => {
        expect(invoiceRecordFingerprint({ customerName: 'Acme', emissionDate: '2024-01-01', amountDue: '100' }))
            .toBe('4a2a1db9da19cd4c3b8b575e8e47fb83');
    });
});
