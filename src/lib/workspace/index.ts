export * from './WorkspaceManager.ts';
