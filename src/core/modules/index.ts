export * from './types';
export * from './Module';
export * from './ModuleRegistry';
export * from './hooks';
