export * from './errors/index.js';
export * from './schemas/transaction.js';
export * from './types/account.js';
export * from './utils/decimal-utils.js';
export * from './utils/transaction-utils.js';
export * from './utils/type-guard-utils.js';
export * from './utils/zod-utils.js';
