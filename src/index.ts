/**
 * Annual statements core
 */

export * from './types/financial';
export * from './types/report';
export * from './types/validation';
export * from './lib/parsers';
export * from './lib/statements/derived-values';
export * from './lib/validation/reconciliation-validator';
export * from './lib/config/engagement';
export * from './lib/config/featureFlags';
export * from './lib/augmentation/interfaces';
export * from './lib/augmentation/augment';
export * from './lib/augmentation/openrouter-adapter';
export * from './lib/pipeline/statement-pipeline';
export * from './lib/utils/currency';
export * from './lib/utils/errors';
export * from './lib/utils/progress-tracker';
