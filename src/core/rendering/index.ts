// src/core/rendering/index.ts

export * from './document-renderer.service';
export * from './document-styles';
export * from './interfaces/services';
