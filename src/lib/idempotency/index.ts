export * from './IdempotencyLedger.ts';
