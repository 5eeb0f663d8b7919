// test/support.ts
import winston from 'winston';
import { CellValue, RawRow } from '../src/core/common/interfaces/models';
import { DocumentTemplate } from '../src/core/rendering';

export const silentLogger = (): winston.Logger => winston.createLogger({ silent: true });

/** Builds a row in the key order of `cells` */
export const rowOf = (cells: Record<string, CellValue>): RawRow => new Map(Object.entries(cells));

export const TEST_TEMPLATE: DocumentTemplate = {
    title: 'NOTA FISCAL DE SERVIÇO',
    creator: 'test-suite',
};
