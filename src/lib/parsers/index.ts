/**
 * Source parsers
 */

export * from './interfaces';
export * from './numeric-value';
export * from './category-rules';
export * from './row-extractor';
export * from './document-sections';
export * from './text-extractor';
export * from './report-structure';
export * from './workbook-reader';
