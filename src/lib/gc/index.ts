export { GcScheduler } from './GcScheduler.ts';
export * from './tasks.ts';
export * from './types.ts';
