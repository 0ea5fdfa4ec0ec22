export * from './CapabilityRouter.ts';
