// src/core/storage/index.ts

export * from './invoice-store.service';
export * from './record-input.utils';
export * from './interfaces/services';
