// src/core/parsing/index.ts

export * from './file-parser.service';
export * from './interfaces/services';
