// src/core/common/entities/index.ts
export * from './invoice-record.entity';
