export { Orchestrator } from './Orchestrator.ts';
export * from './types.ts';
