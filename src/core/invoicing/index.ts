// src/core/invoicing/index.ts

export * from './invoice-transformer.service';
export * from './invoice-processing.service';
export * from './interfaces/services';

export * from './column-rules';
export * from './date-policy.utils';
export * from './fingerprint.utils';
export * from './normalization.utils';
